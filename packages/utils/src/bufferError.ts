export type BufferErrorKind = 'out-of-range' | 'invalid-character'

export class BufferError extends Error {
	constructor(
		readonly kind: BufferErrorKind,
		message: string,
		readonly position?: number
	) {
		super(message)
		this.name = 'BufferError'
	}
}

export const outOfRange = (position: number, length: number): BufferError =>
	new BufferError(
		'out-of-range',
		`position ${position} is out of range for length ${length}`,
		position
	)

export type BufferResult<T> =
	| { ok: true; value: T }
	| { ok: false; error: BufferError }

export const ok = <T>(value: T): BufferResult<T> => ({ ok: true, value })

export const fail = <T>(error: BufferError): BufferResult<T> => ({
	ok: false,
	error,
})
