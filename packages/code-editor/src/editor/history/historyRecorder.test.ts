import { describe, expect, it } from 'vitest'
import { createCursorPosition } from '../cursor/types'
import { HistoryRecorder } from './historyRecorder'

const at = (offset: number) => createCursorPosition(offset, 0, offset)

describe('HistoryRecorder', () => {
	it('yields an entry for a successful command with edits', () => {
		const recorder = new HistoryRecorder()
		recorder.begin('other', at(0))
		recorder.onChange({ type: 'insert', position: 0, text: 'ab' })
		recorder.onChange({ type: 'delete', position: 1, text: 'b' })

		expect(recorder.end(at(1), true)).toEqual({
			kind: 'other',
			edits: [
				{ type: 'insert', position: 0, text: 'ab' },
				{ type: 'delete', position: 1, text: 'b' },
			],
			cursorBefore: at(0),
			cursorAfter: at(1),
		})
		expect(recorder.isRecording).toBe(false)
	})

	it('yields nothing for failed or empty commands', () => {
		const recorder = new HistoryRecorder()

		recorder.begin('insert-char', at(0))
		recorder.onChange({ type: 'insert', position: 0, text: 'a' })
		expect(recorder.end(at(1), false)).toBeNull()

		recorder.begin('insert-char', at(0))
		expect(recorder.end(at(0), true)).toBeNull()
	})

	it('discards edits left over from an unfinished command', () => {
		const recorder = new HistoryRecorder()
		recorder.begin('other', at(0))
		recorder.onChange({ type: 'insert', position: 0, text: 'stale' })

		recorder.begin('insert-char', at(5))
		recorder.onChange({ type: 'insert', position: 5, text: 'x' })

		expect(recorder.end(at(6), true)?.edits).toEqual([
			{ type: 'insert', position: 5, text: 'x' },
		])
	})

	it('ignores changes outside a command', () => {
		const recorder = new HistoryRecorder()
		recorder.onChange({ type: 'insert', position: 0, text: 'early' })

		recorder.begin('insert-char', at(5))
		recorder.onChange({ type: 'insert', position: 5, text: 'x' })

		expect(recorder.end(at(6), true)?.edits).toEqual([
			{ type: 'insert', position: 5, text: 'x' },
		])
	})

	it('ignores changes while suspended', () => {
		const recorder = new HistoryRecorder()
		recorder.begin('other', at(0))
		recorder.suspend()
		recorder.onChange({ type: 'insert', position: 0, text: 'a' })
		recorder.onChange({
			type: 'cursor-move',
			from: at(1),
			to: at(0),
		})
		recorder.resume()

		expect(recorder.end(at(0), true)).toBeNull()
	})
})
