import { loggers } from '@gapline/logger'
import { countCodePoints } from '@gapline/utils'
import { resolveEditorOptions, type EditorOptionsInput } from '../../config'
import type { EditResult } from '../document/types'
import type { TextDocument } from '../document/textDocument'
import { HistoryReplayError } from './errors'
import { HistoryRecorder } from './historyRecorder'
import type {
	AtomicEdit,
	HistoryCommandKind,
	HistoryDirection,
	HistoryEntry,
	HistoryResult,
	HistoryState,
} from './types'
import { cloneHistoryEntry, summarizeEntry } from './utils/historyEntries'
import { createEmptyHistoryState, pushHistoryEntry } from './utils/historyState'

const historyLogger = loggers.editor.withTag('history')

export type HistoryOptions = Pick<EditorOptionsInput, 'maxHistoryEntries'>

export type History = {
	beginCommand: (kind: HistoryCommandKind) => void
	endCommand: (success?: boolean) => HistoryEntry | null
	runCommand: <T>(
		kind: HistoryCommandKind,
		run: () => EditResult<T>
	) => EditResult<T>
	undo: () => HistoryResult
	redo: () => HistoryResult
	canUndo: () => boolean
	canRedo: () => boolean
	getState: () => HistoryState
	clear: () => void
	dispose: () => void
}

const applyEdit = (
	document: TextDocument,
	edit: AtomicEdit,
	invert: boolean
): EditResult<unknown> => {
	const removes = (edit.type === 'insert') === invert
	if (removes) {
		return document.deleteRange(
			edit.position,
			edit.position + countCodePoints(edit.text)
		)
	}
	return document.insertText(edit.position, edit.text)
}

/**
 * Undo/redo for one document. Text changes made between `beginCommand` and
 * `endCommand` become one entry; consecutive typing or backspacing of word
 * characters collapses into a single entry. Entries handed out are copies.
 */
export const createHistory = (
	document: TextDocument,
	options: HistoryOptions = {}
): History => {
	const { maxHistoryEntries } = resolveEditorOptions(options)
	const recorder = new HistoryRecorder()
	const registration = document.addChangeListener(recorder)
	let state = createEmptyHistoryState()

	const setHistoryState = (next: HistoryState) => {
		state = next
		historyLogger.debug('updated history state', {
			undoDepth: next.undoStack.length,
			redoDepth: next.redoStack.length,
		})
	}

	const beginCommand = (kind: HistoryCommandKind) => {
		recorder.begin(kind, document.getCursor())
	}

	const endCommand = (success = true) => {
		const entry = recorder.end(document.getCursor(), success)
		if (!entry) return null

		const pushed = pushHistoryEntry(state, entry, maxHistoryEntries)
		historyLogger.debug(
			pushed.outcome === 'merged'
				? 'merged history entry'
				: 'pushed new history entry',
			summarizeEntry(entry)
		)
		if (pushed.trimmed > 0) {
			historyLogger.debug('trimmed history stack to max entries', {
				max: maxHistoryEntries,
			})
		}
		setHistoryState(pushed.state)
		const top = pushed.state.undoStack[pushed.state.undoStack.length - 1]
		return top ? cloneHistoryEntry(top) : null
	}

	const runCommand = <T>(
		kind: HistoryCommandKind,
		run: () => EditResult<T>
	): EditResult<T> => {
		beginCommand(kind)
		let succeeded = false
		try {
			const result = run()
			succeeded = result.success
			return result
		} finally {
			endCommand(succeeded)
		}
	}

	const replay = (
		entry: HistoryEntry,
		direction: HistoryDirection
	): HistoryReplayError | null => {
		const invert = direction === 'undo'
		const edits = invert ? entry.edits.slice().reverse() : entry.edits
		const cursor = invert ? entry.cursorBefore : entry.cursorAfter

		recorder.suspend()
		try {
			for (const [step, edit] of edits.entries()) {
				const result = applyEdit(document, edit, invert)
				if (!result.success) {
					return new HistoryReplayError(direction, step, result.error)
				}
			}
			const moved = document.setCursor(cursor.offset)
			if (!moved.success) {
				return new HistoryReplayError(direction, edits.length, moved.error)
			}
			return null
		} finally {
			recorder.resume()
		}
	}

	const travel = (direction: HistoryDirection): HistoryResult => {
		const from = direction === 'undo' ? state.undoStack : state.redoStack
		const to = direction === 'undo' ? state.redoStack : state.undoStack
		const entry = from[from.length - 1]
		if (!entry) return { success: true, applied: false }

		historyLogger.debug(direction, summarizeEntry(entry))
		const error = replay(entry, direction)
		if (error) {
			historyLogger.warn(`${direction} failed, entry kept`, {
				step: error.step,
				reason: error.editError.kind,
			})
			return { success: false, error }
		}

		const remaining = from.slice(0, -1)
		const moved = [...to, entry]
		setHistoryState(
			direction === 'undo'
				? { undoStack: remaining, redoStack: moved }
				: { undoStack: moved, redoStack: remaining }
		)
		return { success: true, applied: true }
	}

	return {
		beginCommand,
		endCommand,
		runCommand,
		undo: () => travel('undo'),
		redo: () => travel('redo'),
		canUndo: () => state.undoStack.length > 0,
		canRedo: () => state.redoStack.length > 0,
		getState: () => ({
			undoStack: state.undoStack.map(cloneHistoryEntry),
			redoStack: state.redoStack.map(cloneHistoryEntry),
		}),
		clear: () => {
			historyLogger.debug('clearing history state')
			setHistoryState(createEmptyHistoryState())
		},
		dispose: () => {
			registration.dispose()
			recorder.reset()
		},
	}
}
