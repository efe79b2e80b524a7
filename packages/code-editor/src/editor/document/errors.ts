import type { BufferError } from '@gapline/utils'

export type EditErrorKind =
	| 'out-of-range'
	| 'invalid-range'
	| 'invalid-character'
	| 'reentrant-edit'

export class EditError extends Error {
	constructor(
		readonly kind: EditErrorKind,
		message: string
	) {
		super(message)
		this.name = 'EditError'
	}

	static fromBufferError(error: BufferError): EditError {
		return new EditError(error.kind, error.message)
	}
}
