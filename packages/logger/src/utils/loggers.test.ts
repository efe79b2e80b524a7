import { afterEach, describe, expect, it } from 'vitest'
import { setLogForwarder, type LogForwarderEntry } from './forwarding'
import { getLogger, loggers } from './loggers'
import {
	isLoggerEnabled,
	resetLoggerToggles,
	setLoggerEnabled,
} from './toggles'

afterEach(() => {
	setLogForwarder(undefined)
	resetLoggerToggles()
})

describe('logger toggles', () => {
	it('seeds tags from the toggle tree', () => {
		expect(isLoggerEnabled('editor:history')).toBe(true)
		expect(isLoggerEnabled('buffer:gap')).toBe(false)
		expect(isLoggerEnabled('editor:kill-ring')).toBe(false)
	})

	it('lets unknown children inherit their parent state', () => {
		setLoggerEnabled('editor:document', false)

		expect(isLoggerEnabled('editor:document:render')).toBe(false)
		expect(isLoggerEnabled('app:startup')).toBe(true)
	})

	it('throws for tags without a registered parent', () => {
		expect(() => isLoggerEnabled('network')).toThrow(/Unknown logger tag/)
		expect(() => isLoggerEnabled('  ')).toThrow(/cannot be empty/)
	})

	it('toggles a scope together with its children', () => {
		setLoggerEnabled('editor', false, { includeChildren: true })

		expect(isLoggerEnabled('editor')).toBe(false)
		expect(isLoggerEnabled('editor:history')).toBe(false)
		expect(isLoggerEnabled('app')).toBe(true)
	})
})

describe('loggers', () => {
	it('exposes the defined loggers by name', () => {
		expect(getLogger('editor')).toBe(loggers.editor)
	})

	it('forwards enabled calls with their tag', () => {
		const entries: LogForwarderEntry[] = []
		setLogForwarder((entry) => entries.push(entry))

		loggers.editor.withTag('history').debug('pushed', { depth: 1 })
		loggers.buffer.withTag('gap').debug('grew')

		expect(entries).toEqual([
			{ tag: 'editor:history', level: 'debug', args: ['pushed', { depth: 1 }] },
		])
	})

	it('detaches a forwarder that throws', () => {
		let calls = 0
		setLogForwarder(() => {
			calls++
			throw new Error('forwarder failure')
		})

		loggers.app.debug('first')
		loggers.app.debug('second')

		expect(calls).toBe(1)
	})

	it('rejects empty child tags', () => {
		expect(() => loggers.app.withTag(' ')).toThrow(/non-empty tag/)
	})
})
