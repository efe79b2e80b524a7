import type { CursorPosition } from '../cursor/types'
import type { HistoryReplayError } from './errors'

export type HistoryCommandKind =
	| 'insert-char'
	| 'delete-backward'
	| 'delete-forward'
	| 'other'

export type AtomicEdit = {
	type: 'insert' | 'delete'
	position: number
	text: string
}

export type HistoryEntry = {
	kind: HistoryCommandKind
	edits: AtomicEdit[]
	cursorBefore: CursorPosition
	cursorAfter: CursorPosition
}

/** Newest entry last on both stacks. */
export type HistoryState = {
	undoStack: HistoryEntry[]
	redoStack: HistoryEntry[]
}

export type HistoryDirection = 'undo' | 'redo'

export type HistoryResult =
	| { success: true; applied: boolean }
	| { success: false; error: HistoryReplayError }

export type HistoryPushOutcome = 'pushed' | 'merged'
