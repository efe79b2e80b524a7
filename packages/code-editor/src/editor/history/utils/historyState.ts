import type { HistoryEntry, HistoryPushOutcome, HistoryState } from '../types'
import { mergeHistoryEntries } from './historyEntries'

export const createEmptyHistoryState = (): HistoryState => ({
	undoStack: [],
	redoStack: [],
})

export type HistoryPushResult = {
	state: HistoryState
	outcome: HistoryPushOutcome
	trimmed: number
}

/**
 * Records a new entry, merging it into the top of the undo stack when
 * possible. Either way the redo stack is cleared and the undo stack is cut to
 * `maxEntries`, dropping the oldest entries.
 */
export const pushHistoryEntry = (
	state: HistoryState,
	entry: HistoryEntry,
	maxEntries = Number.POSITIVE_INFINITY
): HistoryPushResult => {
	const undoStack = state.undoStack.slice()
	const lastEntry = undoStack[undoStack.length - 1]
	const merged = lastEntry ? mergeHistoryEntries(lastEntry, entry) : null

	if (merged) {
		undoStack[undoStack.length - 1] = merged
	} else {
		undoStack.push(entry)
	}

	const trimmed = Math.max(0, undoStack.length - maxEntries)
	if (trimmed > 0) undoStack.splice(0, trimmed)

	return {
		state: { undoStack, redoStack: [] },
		outcome: merged ? 'merged' : 'pushed',
		trimmed,
	}
}
