import type {
	CursorMovement,
	CursorMoveResult,
	CursorPosition,
	LineIndex,
} from '../types'
import { createCursorPosition } from '../types'
import { getLineCount, getLineLength, getLineStart, offsetToPosition } from './position'

const result = (
	from: CursorPosition,
	to: CursorPosition,
	preferredColumn: number | null = null
): CursorMoveResult => ({
	position: to,
	preferredColumn,
	moved: to.offset !== from.offset,
})

export const moveForward = (
	position: CursorPosition,
	index: LineIndex
): CursorPosition => {
	if (position.offset >= index.length) return position
	return offsetToPosition(position.offset + 1, index)
}

export const moveBackward = (
	position: CursorPosition,
	index: LineIndex
): CursorPosition => {
	if (position.offset <= 0) return position
	return offsetToPosition(position.offset - 1, index)
}

/**
 * Moves one line up or down. The target column is the preferred column when
 * one is carried over from a previous vertical move, else the current column,
 * clamped to the target line's length.
 */
export const moveVertically = (
	position: CursorPosition,
	direction: 'up' | 'down',
	index: LineIndex,
	preferredColumn: number | null = null
): { position: CursorPosition; preferredColumn: number } => {
	const desiredColumn = preferredColumn ?? position.column
	const targetLine = direction === 'up' ? position.line - 1 : position.line + 1

	if (targetLine < 0 || targetLine >= getLineCount(index)) {
		return { position, preferredColumn: desiredColumn }
	}

	const column = Math.min(desiredColumn, getLineLength(targetLine, index))
	return {
		position: createCursorPosition(
			getLineStart(targetLine, index) + column,
			targetLine,
			column
		),
		preferredColumn: desiredColumn,
	}
}

export const moveToLineStart = (
	position: CursorPosition,
	index: LineIndex
): CursorPosition =>
	createCursorPosition(getLineStart(position.line, index), position.line, 0)

export const moveToLineEnd = (
	position: CursorPosition,
	index: LineIndex
): CursorPosition => {
	const column = getLineLength(position.line, index)
	return createCursorPosition(
		getLineStart(position.line, index) + column,
		position.line,
		column
	)
}

export const moveToBufferStart = (): CursorPosition =>
	createCursorPosition(0, 0, 0)

export const moveToBufferEnd = (index: LineIndex): CursorPosition =>
	offsetToPosition(index.length, index)

/**
 * Applies a movement to a position. Moving past a boundary is not an error:
 * the position comes back unchanged with `moved: false`.
 */
export const moveCursor = (
	position: CursorPosition,
	movement: CursorMovement,
	index: LineIndex,
	preferredColumn: number | null = null
): CursorMoveResult => {
	switch (movement) {
		case 'forward':
			return result(position, moveForward(position, index))
		case 'backward':
			return result(position, moveBackward(position, index))
		case 'up':
		case 'down': {
			const next = moveVertically(position, movement, index, preferredColumn)
			return result(position, next.position, next.preferredColumn)
		}
		case 'line-start':
			return result(position, moveToLineStart(position, index))
		case 'line-end':
			return result(position, moveToLineEnd(position, index))
		case 'buffer-start':
			return result(position, moveToBufferStart())
		case 'buffer-end':
			return result(position, moveToBufferEnd(index))
	}
}
