export { ChangeNotifier } from './changeNotifier'
export { EditError } from './errors'
export type { EditErrorKind } from './errors'
export { TextDocument } from './textDocument'
export type { TextDocumentOptions } from './textDocument'
export type {
	ChangeEvent,
	ChangeListener,
	EditFailure,
	EditResult,
	EditSuccess,
	ListenerRegistration,
} from './types'
