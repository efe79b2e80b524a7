import { defaultLoggerVisibility } from './definitions'

type LoggerToggleState = {
	enabled: boolean
}

const loggerToggleStates = new Map<string, LoggerToggleState>()

const seedDefaultLoggerStates = () => {
	loggerToggleStates.clear()
	for (const [tag, enabled] of defaultLoggerVisibility.entries()) {
		loggerToggleStates.set(tag, { enabled })
	}
}

seedDefaultLoggerStates()

const normalizeTag = (tag: string): string => {
	const normalized = tag.trim()
	if (!normalized) {
		throw new Error('Logger tag cannot be empty.')
	}
	return normalized
}

const getDefaultEnabledForTag = (tag: string): boolean => {
	const explicitDefault = defaultLoggerVisibility.get(tag)
	if (typeof explicitDefault === 'boolean') return explicitDefault

	const segments = tag.split(':')
	while (segments.length > 1) {
		segments.pop()
		const parentState = loggerToggleStates.get(segments.join(':'))
		if (parentState) return parentState.enabled
	}

	throw new Error(
		`Unknown logger tag "${tag}". Add its scope to LOGGER_TOGGLE_TREE in packages/logger/src/utils/toggleDefaults.ts.`
	)
}

const ensureLoggerToggleState = (tag: string): LoggerToggleState => {
	const normalized = normalizeTag(tag)

	const existing = loggerToggleStates.get(normalized)
	if (existing) return existing

	const state: LoggerToggleState = {
		enabled: getDefaultEnabledForTag(normalized),
	}
	loggerToggleStates.set(normalized, state)
	return state
}

const isLoggerEnabled = (tag: string): boolean =>
	ensureLoggerToggleState(tag).enabled

const setLoggerEnabled = (
	tag: string,
	enabled: boolean,
	options?: { includeChildren?: boolean }
): void => {
	const state = ensureLoggerToggleState(tag)
	state.enabled = enabled

	if (!options?.includeChildren) return

	const prefix = `${normalizeTag(tag)}:`
	for (const [registeredTag, registeredState] of loggerToggleStates.entries()) {
		if (registeredTag.startsWith(prefix)) {
			registeredState.enabled = enabled
		}
	}
}

const resetLoggerToggles = (): void => {
	seedDefaultLoggerStates()
}

export {
	ensureLoggerToggleState,
	isLoggerEnabled,
	resetLoggerToggles,
	setLoggerEnabled,
}
