import { cloneCursorPosition, type CursorPosition } from '../cursor/types'
import type { ChangeEvent, ChangeListener } from '../document/types'
import type { AtomicEdit, HistoryCommandKind, HistoryEntry } from './types'
import { createHistoryEntry } from './utils/historyEntries'

type ActiveCommand = {
	kind: HistoryCommandKind
	cursorBefore: CursorPosition
}

/**
 * Collects the text changes of one bracketed command. Outside a command, or
 * while suspended for undo/redo replay, notifications are ignored.
 */
export class HistoryRecorder implements ChangeListener {
	private command: ActiveCommand | null = null
	private edits: AtomicEdit[] = []
	private suspended = false

	get isRecording(): boolean {
		return this.command !== null
	}

	get isSuspended(): boolean {
		return this.suspended
	}

	begin(kind: HistoryCommandKind, cursorBefore: CursorPosition): void {
		this.command = { kind, cursorBefore: cloneCursorPosition(cursorBefore) }
		this.edits = []
	}

	end(cursorAfter: CursorPosition, success: boolean): HistoryEntry | null {
		const command = this.command
		const edits = this.edits
		this.command = null
		this.edits = []

		if (!command || !success || edits.length === 0) return null
		return createHistoryEntry(
			command.kind,
			edits,
			command.cursorBefore,
			cursorAfter
		)
	}

	suspend(): void {
		this.suspended = true
	}

	resume(): void {
		this.suspended = false
	}

	reset(): void {
		this.command = null
		this.edits = []
		this.suspended = false
	}

	onChange(event: ChangeEvent): void {
		if (!this.command || this.suspended) return
		if (event.type === 'cursor-move') return
		this.edits.push({
			type: event.type,
			position: event.position,
			text: event.text,
		})
	}
}
