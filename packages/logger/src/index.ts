export { loggers, getLogger, logger } from './utils/loggers'
export type { Logger, LoggerKey, LoggerMap } from './utils/loggers'

export {
	isLoggerEnabled,
	resetLoggerToggles,
	setLoggerEnabled,
} from './utils/toggles'

export { setLogForwarder } from './utils/forwarding'
export type { LogForwarder, LogForwarderEntry } from './utils/forwarding'

export { parseLoggerEnv } from './env'
export type { LoggerEnv } from './env'

export type { LoggerScope } from './utils/tags'
