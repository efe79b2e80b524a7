import { countCodePoints, isWordText } from '@gapline/utils'
import { cloneCursorPosition, type CursorPosition } from '../../cursor/types'
import type { AtomicEdit, HistoryCommandKind, HistoryEntry } from '../types'

const cloneEdit = (edit: AtomicEdit): AtomicEdit => ({
	type: edit.type,
	position: edit.position,
	text: edit.text,
})

export const createHistoryEntry = (
	kind: HistoryCommandKind,
	edits: AtomicEdit[],
	cursorBefore: CursorPosition,
	cursorAfter: CursorPosition
): HistoryEntry => ({
	kind,
	edits: edits.map(cloneEdit),
	cursorBefore: cloneCursorPosition(cursorBefore),
	cursorAfter: cloneCursorPosition(cursorAfter),
})

export const cloneHistoryEntry = (entry: HistoryEntry): HistoryEntry =>
	createHistoryEntry(
		entry.kind,
		entry.edits,
		entry.cursorBefore,
		entry.cursorAfter
	)

const singleEdit = (entry: HistoryEntry): AtomicEdit | undefined =>
	entry.edits.length === 1 ? entry.edits[0] : undefined

const canMergeInsert = (prev: AtomicEdit, next: AtomicEdit) =>
	next.position === prev.position + countCodePoints(prev.text)

// Backspace chain: the new deletion ends where the previous one started.
const canMergeDelete = (prev: AtomicEdit, next: AtomicEdit) =>
	next.position + countCodePoints(next.text) === prev.position

// Only typing merges insertions and only backspacing merges deletions.
const MERGEABLE_KIND: Record<AtomicEdit['type'], HistoryCommandKind> = {
	insert: 'insert-char',
	delete: 'delete-backward',
}

/**
 * Folds `next` into `prev` when both are single word-text edits of the same
 * command kind that continue each other. Returns null when they do not merge.
 */
export const mergeHistoryEntries = (
	prev: HistoryEntry,
	next: HistoryEntry
): HistoryEntry | null => {
	if (prev.kind !== next.kind) return null

	const prevEdit = singleEdit(prev)
	const nextEdit = singleEdit(next)
	if (!prevEdit || !nextEdit || prevEdit.type !== nextEdit.type) return null
	if (MERGEABLE_KIND[prevEdit.type] !== prev.kind) return null
	if (!isWordText(prevEdit.text) || !isWordText(nextEdit.text)) return null

	if (prevEdit.type === 'insert' && canMergeInsert(prevEdit, nextEdit)) {
		return {
			kind: prev.kind,
			edits: [
				{
					type: 'insert',
					position: prevEdit.position,
					text: prevEdit.text + nextEdit.text,
				},
			],
			cursorBefore: cloneCursorPosition(prev.cursorBefore),
			cursorAfter: cloneCursorPosition(next.cursorAfter),
		}
	}

	if (prevEdit.type === 'delete' && canMergeDelete(prevEdit, nextEdit)) {
		return {
			kind: prev.kind,
			edits: [
				{
					type: 'delete',
					position: nextEdit.position,
					text: nextEdit.text + prevEdit.text,
				},
			],
			cursorBefore: cloneCursorPosition(prev.cursorBefore),
			cursorAfter: cloneCursorPosition(next.cursorAfter),
		}
	}

	return null
}

export const summarizeEntry = (entry: HistoryEntry) => ({
	kind: entry.kind,
	edits: entry.edits.length,
	first: entry.edits[0]?.position,
})
