import { describe, expect, it } from 'vitest'
import { TextDocument } from './textDocument'
import type { ChangeEvent, EditResult } from './types'

const recordEvents = (document: TextDocument) => {
	const events: ChangeEvent[] = []
	const registration = document.addChangeListener({
		onChange: (event) => events.push(event),
	})
	return { events, registration }
}

const errorKind = <T>(result: EditResult<T>) =>
	result.success ? undefined : result.error.kind

describe('TextDocument', () => {
	describe('insert and delete', () => {
		it('deleting an inserted range restores the empty document', () => {
			const document = new TextDocument()

			const inserted = document.insertText(0, 'Hello')
			expect(inserted).toEqual({
				success: true,
				cursorMoved: true,
				textChanged: true,
				value: 5,
			})
			expect(document.getCursor()).toEqual({ offset: 5, line: 0, column: 5 })

			const removed = document.deleteRange(0, 5)
			expect(removed.success && removed.value).toBe('Hello')
			expect(document.getText()).toBe('')
			expect(document.getCursor()).toEqual({ offset: 0, line: 0, column: 0 })
		})

		it('deleteChar returns the removed character and parks the cursor', () => {
			const document = new TextDocument('Hello World')

			const removed = document.deleteChar(5)

			expect(removed.success && removed.value).toBe(' ')
			expect(document.getText()).toBe('HelloWorld')
			expect(document.getCursor()).toEqual({ offset: 5, line: 0, column: 5 })
		})

		it('counts surrogate pairs as single characters', () => {
			const document = new TextDocument('😀a')
			expect(document.length).toBe(2)

			const removed = document.deleteChar(0)
			expect(removed.success && removed.value).toBe('😀')
			expect(document.getText()).toBe('a')
		})

		it('treats an empty insertion as a no-op', () => {
			const document = new TextDocument('ab')
			const { events } = recordEvents(document)

			expect(document.insertText(1, '')).toEqual({
				success: true,
				cursorMoved: false,
				textChanged: false,
				value: 0,
			})
			expect(events).toEqual([])
			expect(document.isModified()).toBe(false)
		})

		it('inserts a newline at the cursor', () => {
			const document = new TextDocument('ab')
			document.setCursor(1)

			document.insertNewline()

			expect(document.getText()).toBe('a\nb')
			expect(document.lineCount).toBe(2)
			expect(document.getCursor()).toEqual({ offset: 2, line: 1, column: 0 })
		})

		it('edits relative to the cursor', () => {
			const document = new TextDocument()
			document.insertAtCursor('hi')

			const backward = document.deleteBackward()
			expect(backward.success && backward.value).toBe('i')
			expect(document.getText()).toBe('h')
			expect(document.getCursor().offset).toBe(1)

			expect(errorKind(document.deleteForward())).toBe('out-of-range')
			document.setCursor(0)
			expect(errorKind(document.deleteBackward())).toBe('out-of-range')

			const forward = document.deleteForward()
			expect(forward.success && forward.value).toBe('h')
			expect(document.getText()).toBe('')
		})
	})

	describe('validation', () => {
		it('rejects out-of-range positions without touching the text', () => {
			const document = new TextDocument('ab')
			const { events } = recordEvents(document)

			expect(document.insertText(3, 'x')).toMatchObject({
				success: false,
				cursorMoved: false,
				textChanged: false,
			})
			expect(errorKind(document.insertText(-1, 'x'))).toBe('out-of-range')
			expect(errorKind(document.deleteChar(2))).toBe('out-of-range')
			expect(errorKind(document.setCursor(3))).toBe('out-of-range')
			expect(document.getText()).toBe('ab')
			expect(events).toEqual([])
		})

		it('rejects empty, reversed and overlong ranges', () => {
			const document = new TextDocument('ab')

			expect(errorKind(document.deleteRange(1, 1))).toBe('invalid-range')
			expect(errorKind(document.deleteRange(1, 0))).toBe('invalid-range')
			expect(errorKind(document.deleteRange(0, 3))).toBe('invalid-range')
			expect(document.getText()).toBe('ab')
		})

		it('accepts exactly one printable character, newline or tab', () => {
			const document = new TextDocument()

			expect(errorKind(document.insertChar(0, 'ab'))).toBe('invalid-character')
			expect(errorKind(document.insertChar(0, ''))).toBe('invalid-character')
			expect(errorKind(document.insertChar(0, '\u0007'))).toBe(
				'invalid-character'
			)
			expect(errorKind(document.insertChar(1, '\u0007'))).toBe('out-of-range')

			document.insertChar(0, '\t')
			document.insertChar(1, '😀')
			document.insertChar(2, '\n')

			expect(document.getText()).toBe('\t😀\n')
			expect(document.length).toBe(3)
			expect(document.lineCount).toBe(2)
		})
	})

	describe('notifications', () => {
		it('reports one event per insertion and one per range deletion', () => {
			const document = new TextDocument('ab')
			const { events } = recordEvents(document)

			document.insertText(1, 'xy')
			document.deleteRange(0, 3)

			expect(events).toEqual([
				{ type: 'insert', position: 1, text: 'xy' },
				{ type: 'delete', position: 0, text: 'axy' },
			])
			expect(document.getText()).toBe('b')
		})

		it('reports cursor moves only when the cursor changes', () => {
			const document = new TextDocument('ab\ncd')
			const { events } = recordEvents(document)

			const moved = document.setCursor(4)
			const repeated = document.setCursor(4)
			const toEnd = document.moveCursor('buffer-end')
			document.moveCursor('line-start')

			expect(moved).toEqual({
				success: true,
				cursorMoved: true,
				textChanged: false,
				value: { offset: 4, line: 1, column: 1 },
			})
			expect(repeated.cursorMoved).toBe(false)
			expect(toEnd.success && toEnd.cursorMoved).toBe(true)
			expect(events).toEqual([
				{
					type: 'cursor-move',
					from: { offset: 0, line: 0, column: 0 },
					to: { offset: 4, line: 1, column: 1 },
				},
				{
					type: 'cursor-move',
					from: { offset: 4, line: 1, column: 1 },
					to: { offset: 5, line: 1, column: 2 },
				},
				{
					type: 'cursor-move',
					from: { offset: 5, line: 1, column: 2 },
					to: { offset: 3, line: 1, column: 0 },
				},
			])
		})

		it('does not notify when a movement hits a boundary', () => {
			const document = new TextDocument('ab')
			const { events } = recordEvents(document)

			const result = document.moveCursor('backward')

			expect(result).toEqual({
				success: true,
				cursorMoved: false,
				textChanged: false,
				value: { offset: 0, line: 0, column: 0 },
			})
			expect(events).toEqual([])
		})

		it('rejects edits made from inside a listener', () => {
			const document = new TextDocument()
			const nested: EditResult<number>[] = []
			document.addChangeListener({
				onChange: () => {
					nested.push(document.insertText(0, 'z'))
				},
			})

			document.insertText(0, 'a')

			expect(document.getText()).toBe('a')
			expect(nested).toHaveLength(1)
			expect(nested[0]).toMatchObject({ success: false, textChanged: false })
			expect(nested.map(errorKind)).toEqual(['reentrant-edit'])
		})

		it('keeps delivering after a listener throws', () => {
			const document = new TextDocument()
			document.addChangeListener({
				onChange: () => {
					throw new Error('listener failure')
				},
			})
			const { events } = recordEvents(document)

			const result = document.insertText(0, 'a')

			expect(result.success).toBe(true)
			expect(events).toEqual([{ type: 'insert', position: 0, text: 'a' }])
		})

		it('stops delivering to disposed listeners', () => {
			const document = new TextDocument()
			const { events, registration } = recordEvents(document)

			document.insertText(0, 'a')
			registration.dispose()
			registration.dispose()
			document.insertText(1, 'b')

			expect(events).toEqual([{ type: 'insert', position: 0, text: 'a' }])
		})
	})

	describe('queries', () => {
		it('keeps the column across shorter lines on vertical moves', () => {
			const document = new TextDocument('abcd\nx\nabcd')
			document.setCursor(3)

			document.moveCursor('down')
			expect(document.getCursor()).toEqual({ offset: 6, line: 1, column: 1 })

			document.moveCursor('down')
			expect(document.getCursor()).toEqual({ offset: 10, line: 2, column: 3 })
		})

		it('forgets the preferred column after an edit', () => {
			const document = new TextDocument('abcd\nx\nabcd')
			document.setCursor(3)
			document.moveCursor('down')

			document.insertText(6, 'y')
			document.moveCursor('down')

			expect(document.getCursor()).toEqual({ offset: 10, line: 2, column: 2 })
		})

		it('returns line text without the newline', () => {
			const document = new TextDocument('ab\ncd\n')

			expect(document.lineCount).toBe(3)
			expect(document.getLineText(0)).toBe('ab')
			expect(document.getLineText(1)).toBe('cd')
			expect(document.getLineText(2)).toBe('')
			expect(document.getLineText(3)).toBeUndefined()
			expect(document.getLineText(-1)).toBeUndefined()
		})

		it('hands out copies of the cursor', () => {
			const document = new TextDocument('ab')
			const cursor = document.getCursor()
			cursor.offset = 2

			expect(document.getCursor().offset).toBe(0)
		})

		it('tracks the modified flag', () => {
			const document = new TextDocument('ab')
			expect(document.isModified()).toBe(false)

			document.moveCursor('forward')
			expect(document.isModified()).toBe(false)

			document.insertChar(0, 'x')
			expect(document.isModified()).toBe(true)

			document.markSaved()
			expect(document.isModified()).toBe(false)
		})
	})
})
