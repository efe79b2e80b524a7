import type { CursorPosition, LineIndex } from '../types'
import { createCursorPosition } from '../types'

const clampLine = (line: number, index: LineIndex) =>
	Math.max(0, Math.min(line, index.lineStarts.length - 1))

export const getLineCount = (index: LineIndex): number =>
	index.lineStarts.length

export const getLineStart = (line: number, index: LineIndex): number =>
	index.lineStarts[clampLine(line, index)]

/** Length of a line in code points, excluding its newline. */
export const getLineLength = (line: number, index: LineIndex): number => {
	const clamped = clampLine(line, index)
	const start = index.lineStarts[clamped]
	if (clamped < index.lineStarts.length - 1) {
		return index.lineStarts[clamped + 1] - start - 1
	}
	return index.length - start
}

export const offsetToLineIndex = (offset: number, index: LineIndex): number => {
	const lookup = Math.min(Math.max(0, offset), index.length)
	let low = 0
	let high = index.lineStarts.length - 1
	let found = 0

	while (low <= high) {
		const mid = (low + high) >> 1
		if (index.lineStarts[mid] <= lookup) {
			found = mid
			low = mid + 1
		} else {
			high = mid - 1
		}
	}

	return found
}

/** Resolves an offset, clamped to `[0, length]`, into a full position. */
export const offsetToPosition = (
	offset: number,
	index: LineIndex
): CursorPosition => {
	const lookup = Math.min(Math.max(0, offset), index.length)
	const line = offsetToLineIndex(lookup, index)
	return createCursorPosition(lookup, line, lookup - index.lineStarts[line])
}

/** Resolves a line/column pair, clamping both to the text. */
export const positionToOffset = (
	line: number,
	column: number,
	index: LineIndex
): number => {
	const clampedLine = clampLine(line, index)
	const clampedColumn = Math.max(
		0,
		Math.min(column, getLineLength(clampedLine, index))
	)
	return index.lineStarts[clampedLine] + clampedColumn
}
