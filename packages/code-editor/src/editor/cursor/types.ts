export type CursorPosition = {
	offset: number // code-point index in the document
	line: number // 0-based line index
	column: number // 0-based column in code points
}

export type CursorMovement =
	| 'forward'
	| 'backward'
	| 'up'
	| 'down'
	| 'line-start'
	| 'line-end'
	| 'buffer-start'
	| 'buffer-end'

/**
 * Line starts of a text snapshot, in code points. There is always at least
 * one line; every `\n` opens a new one.
 */
export type LineIndex = {
	lineStarts: number[]
	length: number
}

export type CursorMoveResult = {
	position: CursorPosition
	// Column kept across consecutive up/down moves; null after any other move.
	preferredColumn: number | null
	moved: boolean
}

export const createCursorPosition = (
	offset: number,
	line: number,
	column: number
): CursorPosition => ({
	offset,
	line,
	column,
})

export const cloneCursorPosition = (
	position: CursorPosition
): CursorPosition => ({
	offset: position.offset,
	line: position.line,
	column: position.column,
})

export const isSamePosition = (a: CursorPosition, b: CursorPosition) =>
	a.offset === b.offset && a.line === b.line && a.column === b.column
