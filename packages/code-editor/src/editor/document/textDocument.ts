import { loggers } from '@gapline/logger'
import { GapBuffer, countCodePoints } from '@gapline/utils'
import { resolveEditorOptions, type EditorOptionsInput } from '../../config'
import type { CursorMovement, CursorPosition, LineIndex } from '../cursor/types'
import { cloneCursorPosition, isSamePosition } from '../cursor/types'
import {
	applyEditToLineIndex,
	buildLineIndex,
	getLineCount,
	getLineLength,
	getLineStart,
	moveCursor as applyMovement,
	offsetToPosition,
} from '../cursor/utils'
import { ChangeNotifier } from './changeNotifier'
import { EditError } from './errors'
import type {
	ChangeListener,
	EditFailure,
	EditResult,
	ListenerRegistration,
} from './types'

const documentLogger = loggers.editor.withTag('document')

// Control characters other than newline and tab.
const DISALLOWED_CHAR = /^(?![\n\t])\p{Cc}$/u

const isOffset = (value: number, length: number) =>
	Number.isInteger(value) && value >= 0 && value <= length

const failure = (error: EditError): EditFailure => ({
	success: false,
	cursorMoved: false,
	textChanged: false,
	error,
})

export type TextDocumentOptions = Pick<EditorOptionsInput, 'initialCapacity'>

/**
 * The only way to change text. Owns the buffer, the cursor and the line index
 * and keeps them consistent; every successful text change is reported to the
 * registered listeners before the call returns.
 */
export class TextDocument {
	private readonly buffer: GapBuffer
	private readonly notifier = new ChangeNotifier()
	private lineIndex: LineIndex
	private cursor: CursorPosition
	private preferredColumn: number | null = null
	private modified = false

	constructor(text = '', options: TextDocumentOptions = {}) {
		const { initialCapacity } = resolveEditorOptions(options)
		this.buffer = GapBuffer.fromString(text, { initialCapacity })
		this.lineIndex = buildLineIndex(text)
		this.cursor = offsetToPosition(0, this.lineIndex)
	}

	get length(): number {
		return this.buffer.length
	}

	get lineCount(): number {
		return getLineCount(this.lineIndex)
	}

	getText(): string {
		return this.buffer.toString()
	}

	getLineText(line: number): string | undefined {
		if (!Number.isInteger(line) || line < 0 || line >= this.lineCount) {
			return undefined
		}
		const start = getLineStart(line, this.lineIndex)
		const text = this.buffer.slice(
			start,
			start + getLineLength(line, this.lineIndex)
		)
		return text.ok ? text.value : undefined
	}

	getCursor(): CursorPosition {
		return cloneCursorPosition(this.cursor)
	}

	isModified(): boolean {
		return this.modified
	}

	markSaved(): void {
		this.modified = false
	}

	addChangeListener(listener: ChangeListener): ListenerRegistration {
		return this.notifier.add(listener)
	}

	insertChar(position: number, char: string): EditResult<number> {
		const blocked = this.guardReentry('insertChar')
		if (blocked) return blocked

		if (isOffset(position, this.length) && DISALLOWED_CHAR.test(char)) {
			return failure(
				new EditError(
					'invalid-character',
					`control character U+${(char.codePointAt(0) ?? 0)
						.toString(16)
						.toUpperCase()
						.padStart(4, '0')} cannot be inserted`
				)
			)
		}

		const inserted = this.buffer.insertChar(position, char)
		if (!inserted.ok) return failure(EditError.fromBufferError(inserted.error))
		return this.afterInsert(position, char, inserted.value)
	}

	insertText(position: number, text: string): EditResult<number> {
		const blocked = this.guardReentry('insertText')
		if (blocked) return blocked

		const inserted = this.buffer.insert(position, text)
		if (!inserted.ok) return failure(EditError.fromBufferError(inserted.error))
		if (inserted.value === 0) {
			return { success: true, cursorMoved: false, textChanged: false, value: 0 }
		}
		return this.afterInsert(position, text, inserted.value)
	}

	deleteChar(position: number): EditResult<string> {
		const blocked = this.guardReentry('deleteChar')
		if (blocked) return blocked

		const removed = this.buffer.delete(position)
		if (!removed.ok) return failure(EditError.fromBufferError(removed.error))
		return this.afterDelete(position, removed.value)
	}

	/** Removes `[start, end)` and reports it as one deletion. */
	deleteRange(start: number, end: number): EditResult<string> {
		const blocked = this.guardReentry('deleteRange')
		if (blocked) return blocked

		if (
			!Number.isInteger(start) ||
			!Number.isInteger(end) ||
			start < 0 ||
			start >= end ||
			end > this.length
		) {
			return failure(
				new EditError(
					'invalid-range',
					`range [${start}, ${end}) is invalid for length ${this.length}`
				)
			)
		}

		const removed: string[] = []
		for (let position = end - 1; position >= start; position--) {
			const char = this.buffer.delete(position)
			if (!char.ok) return failure(EditError.fromBufferError(char.error))
			removed.push(char.value)
		}
		return this.afterDelete(start, removed.reverse().join(''))
	}

	moveCursor(movement: CursorMovement): EditResult<CursorPosition> {
		const blocked = this.guardReentry('moveCursor')
		if (blocked) return blocked

		const next = applyMovement(
			this.cursor,
			movement,
			this.lineIndex,
			this.preferredColumn
		)
		this.preferredColumn = next.preferredColumn
		if (!next.moved) {
			return {
				success: true,
				cursorMoved: false,
				textChanged: false,
				value: this.getCursor(),
			}
		}
		return this.relocate(next.position)
	}

	setCursor(offset: number): EditResult<CursorPosition> {
		const blocked = this.guardReentry('setCursor')
		if (blocked) return blocked

		if (!isOffset(offset, this.length)) {
			return failure(
				new EditError(
					'out-of-range',
					`position ${offset} is out of range for length ${this.length}`
				)
			)
		}

		this.preferredColumn = null
		const target = offsetToPosition(offset, this.lineIndex)
		if (isSamePosition(target, this.cursor)) {
			return {
				success: true,
				cursorMoved: false,
				textChanged: false,
				value: this.getCursor(),
			}
		}
		return this.relocate(target)
	}

	insertAtCursor(text: string): EditResult<number> {
		return this.insertText(this.cursor.offset, text)
	}

	insertNewline(): EditResult<number> {
		return this.insertChar(this.cursor.offset, '\n')
	}

	deleteBackward(): EditResult<string> {
		const blocked = this.guardReentry('deleteBackward')
		if (blocked) return blocked
		if (this.cursor.offset === 0) {
			return failure(
				new EditError('out-of-range', 'nothing to delete before the cursor')
			)
		}
		return this.deleteChar(this.cursor.offset - 1)
	}

	deleteForward(): EditResult<string> {
		return this.deleteChar(this.cursor.offset)
	}

	private afterInsert(
		position: number,
		text: string,
		count: number
	): EditResult<number> {
		this.lineIndex = applyEditToLineIndex(this.lineIndex, position, '', text)
		const cursorMoved = this.placeCursor(position + count)
		this.notifier.notify({ type: 'insert', position, text })
		return { success: true, cursorMoved, textChanged: true, value: count }
	}

	private afterDelete(position: number, text: string): EditResult<string> {
		this.lineIndex = applyEditToLineIndex(this.lineIndex, position, text, '')
		const cursorMoved = this.placeCursor(position)
		this.notifier.notify({ type: 'delete', position, text })
		documentLogger.debug('deleted text', {
			position,
			length: countCodePoints(text),
		})
		return { success: true, cursorMoved, textChanged: true, value: text }
	}

	private placeCursor(offset: number): boolean {
		const previous = this.cursor
		this.cursor = offsetToPosition(offset, this.lineIndex)
		this.preferredColumn = null
		this.modified = true
		return !isSamePosition(previous, this.cursor)
	}

	private relocate(target: CursorPosition): EditResult<CursorPosition> {
		const from = this.cursor
		this.cursor = target
		this.notifier.notify({
			type: 'cursor-move',
			from: cloneCursorPosition(from),
			to: cloneCursorPosition(target),
		})
		return {
			success: true,
			cursorMoved: true,
			textChanged: false,
			value: this.getCursor(),
		}
	}

	private guardReentry(operation: string): EditFailure | undefined {
		if (!this.notifier.isDispatching) return undefined
		documentLogger.warn('rejected edit from inside a change listener', {
			operation,
		})
		return failure(
			new EditError(
				'reentrant-edit',
				`${operation} cannot run while change listeners are being notified`
			)
		)
	}
}
