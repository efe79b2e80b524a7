export * from './gapBuffer'
export { BufferError } from './bufferError'
export type { BufferErrorKind, BufferResult } from './bufferError'
export {
	countCodePoints,
	isSingleCodePoint,
	isWordText,
	toCodePoints,
} from './codePoints'
