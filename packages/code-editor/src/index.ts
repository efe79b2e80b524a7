export {
	DEFAULT_INITIAL_CAPACITY,
	DEFAULT_KILL_RING_CAPACITY,
	DEFAULT_MAX_HISTORY_ENTRIES,
	resolveEditorOptions,
} from './config'
export type { EditorOptions, EditorOptionsInput } from './config'
export * from './editor/cursor'
export * from './editor/document'
export * from './editor/history'
export * from './editor/killRing'
