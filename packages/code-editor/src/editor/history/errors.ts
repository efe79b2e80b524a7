import type { EditError } from '../document/errors'
import type { HistoryDirection } from './types'

/** A step of an undo or redo replay was rejected by the document. */
export class HistoryReplayError extends Error {
	constructor(
		readonly direction: HistoryDirection,
		readonly step: number,
		readonly editError: EditError
	) {
		super(`${direction} failed at step ${step}: ${editError.message}`)
		this.name = 'HistoryReplayError'
	}
}
