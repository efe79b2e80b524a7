import type { ConsolaInstance } from './consola'
import { isLoggerEnabled } from './toggles'

type LoggerFactory = (tag: string) => ConsolaInstance

const FORWARDED_METHODS = new Set([
	'trace',
	'debug',
	'info',
	'log',
	'success',
	'warn',
	'error',
	'fatal',
])

type LogForwarderEntry = {
	tag: string
	level: string
	args: unknown[]
}

type LogForwarder = (entry: LogForwarderEntry) => void

let logForwarder: LogForwarder | undefined

const forward = (
	target: ConsolaInstance,
	entry: LogForwarderEntry
): void => {
	if (!logForwarder) return
	try {
		logForwarder(entry)
	} catch (error) {
		// A broken forwarder is detached so it cannot fail every later call.
		logForwarder = undefined
		target.warn('log forwarder threw and was removed', error)
	}
}

const createForwardingProxy = (
	instance: ConsolaInstance,
	tag: string,
	createOrGetLogger: LoggerFactory
): ConsolaInstance => {
	return new Proxy(instance, {
		get(target, prop, receiver) {
			if (prop === 'withTag') {
				return (childTag: unknown) => {
					if (typeof childTag !== 'string') {
						throw new Error(
							`logger.withTag expects a string, received "${typeof childTag}".`
						)
					}
					const normalizedChild = childTag.trim()
					if (!normalizedChild) {
						throw new Error('logger.withTag requires a non-empty tag.')
					}
					return createOrGetLogger(`${tag}:${normalizedChild}`)
				}
			}

			const value: unknown = Reflect.get(target, prop, receiver)
			if (
				typeof prop === 'string' &&
				typeof value === 'function' &&
				FORWARDED_METHODS.has(prop)
			) {
				return (...args: unknown[]) => {
					if (!isLoggerEnabled(tag)) {
						return undefined
					}

					forward(target, { tag, level: prop, args })
					return Reflect.apply(value, target, args)
				}
			}

			return typeof value === 'function' ? value.bind(target) : value
		},
	})
}

const setLogForwarder = (forwarder?: LogForwarder) => {
	logForwarder = forwarder
}

export { createForwardingProxy, setLogForwarder }
export type { LogForwarder, LogForwarderEntry }
