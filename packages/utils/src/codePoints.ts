/**
 * Helpers for working in code points rather than UTF-16 units. Every index the
 * editor core exposes counts code points, so surrogate pairs never split.
 */

export const toCodePoints = (text: string): string[] => Array.from(text)

export const countCodePoints = (text: string): number => {
	let count = 0
	for (const _char of text) count++
	return count
}

export const isSingleCodePoint = (text: string): boolean => {
	const first = text.codePointAt(0)
	if (first === undefined) return false
	return String.fromCodePoint(first).length === text.length
}

const WORD_TEXT = /^[\p{Alphabetic}\p{Nd}\p{Nl}\p{No}_]+$/u

/** Non-empty and made only of letters, digits and underscores. */
export const isWordText = (text: string): boolean => WORD_TEXT.test(text)
