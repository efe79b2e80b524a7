export { HistoryReplayError } from './errors'
export { HistoryRecorder } from './historyRecorder'
export { createHistory } from './historyStore'
export type { History, HistoryOptions } from './historyStore'
export type {
	AtomicEdit,
	HistoryCommandKind,
	HistoryDirection,
	HistoryEntry,
	HistoryPushOutcome,
	HistoryResult,
	HistoryState,
} from './types'
export {
	cloneHistoryEntry,
	createHistoryEntry,
	mergeHistoryEntries,
} from './utils/historyEntries'
export {
	createEmptyHistoryState,
	pushHistoryEntry,
} from './utils/historyState'
export type { HistoryPushResult } from './utils/historyState'
