import { countCodePoints } from '@gapline/utils'
import type { LineIndex } from '../types'

const NEWLINE = 0x0a

/** Code-point offsets, relative to the start of `text`, just past each `\n`. */
const collectNewlineEnds = (text: string): number[] => {
	const ends: number[] = []
	let offset = 0
	for (const char of text) {
		offset++
		if (char.codePointAt(0) === NEWLINE) ends.push(offset)
	}
	return ends
}

export const buildLineIndex = (text: string): LineIndex => {
	const lineStarts = [0]
	let length = 0
	for (const char of text) {
		length++
		if (char.codePointAt(0) === NEWLINE) lineStarts.push(length)
	}
	return { lineStarts, length }
}

/** Last line whose start is at or before `offset`. */
const findLineAtOrBefore = (lineStarts: number[], offset: number): number => {
	let low = 0
	let high = lineStarts.length - 1
	let found = 0
	while (low <= high) {
		const mid = (low + high) >> 1
		if (lineStarts[mid] <= offset) {
			found = mid
			low = mid + 1
		} else {
			high = mid - 1
		}
	}
	return found
}

/** First line whose start is strictly after `offset`. */
const findFirstLineAfter = (lineStarts: number[], offset: number): number => {
	let low = 0
	let high = lineStarts.length
	while (low < high) {
		const mid = (low + high) >> 1
		if (lineStarts[mid] > offset) {
			high = mid
		} else {
			low = mid + 1
		}
	}
	return low
}

/**
 * Updates a line index for replacing `deletedText` at `position` with
 * `insertedText`, touching only the lines after the edit. The result equals
 * `buildLineIndex` of the edited text.
 */
export const applyEditToLineIndex = (
	index: LineIndex,
	position: number,
	deletedText: string,
	insertedText: string
): LineIndex => {
	const { lineStarts } = index
	const deletedLength = countCodePoints(deletedText)
	const insertedLength = countCodePoints(insertedText)
	const delta = insertedLength - deletedLength
	const oldEnd = position + deletedLength

	const keepCount = findLineAtOrBefore(lineStarts, position) + 1
	const firstAfterDeletion = findFirstLineAfter(lineStarts, oldEnd)

	const next = lineStarts.slice(0, keepCount)
	for (const end of collectNewlineEnds(insertedText)) {
		next.push(position + end)
	}
	for (let i = firstAfterDeletion; i < lineStarts.length; i++) {
		next.push(lineStarts[i] + delta)
	}

	return { lineStarts: next, length: index.length + delta }
}
