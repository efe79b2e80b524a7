import { consola, type ConsolaInstance } from './consola'
import { definitionEntries, type LoggerName } from './definitions'
import { createForwardingProxy } from './forwarding'
import { buildTag, type LoggerScope } from './tags'
import { ensureLoggerToggleState } from './toggles'

const instances = new Map<string, ConsolaInstance>()

const getLoggerInstance = (tag: string): ConsolaInstance => {
	ensureLoggerToggleState(tag)

	const existing = instances.get(tag)
	if (existing) return existing

	const raw = consola.withTag(tag)
	const proxied = createForwardingProxy(raw, tag, getLoggerInstance)
	instances.set(tag, proxied)
	return proxied
}

const createLogger = (...scopes: LoggerScope[]): ConsolaInstance =>
	getLoggerInstance(buildTag(scopes))

type Logger = ConsolaInstance

const scopedLoggers = new Map<LoggerName, Logger>(
	definitionEntries.map(([name, definition]) => [
		name,
		createLogger(...definition.scopes),
	])
)

const getLogger = (key: LoggerName): Logger => {
	const scoped = scopedLoggers.get(key)
	if (!scoped) {
		throw new Error(`Logger "${key}" is not defined.`)
	}
	return scoped
}

const loggers: Readonly<Record<LoggerName, Logger>> = Object.freeze({
	app: getLogger('app'),
	buffer: getLogger('buffer'),
	editor: getLogger('editor'),
})

type LoggerMap = typeof loggers
type LoggerKey = LoggerName

const logger = loggers.app

export { createLogger, getLogger, loggers, logger }
export type { Logger, LoggerKey, LoggerMap }
