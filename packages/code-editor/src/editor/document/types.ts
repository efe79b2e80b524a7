import type { CursorPosition } from '../cursor/types'
import type { EditError } from './errors'

export type ChangeEvent =
	| { type: 'insert'; position: number; text: string }
	| { type: 'delete'; position: number; text: string }
	| { type: 'cursor-move'; from: CursorPosition; to: CursorPosition }

export interface ChangeListener {
	onChange(event: ChangeEvent): void
}

export type ListenerRegistration = {
	dispose(): void
}

export type EditSuccess<T> = {
	success: true
	cursorMoved: boolean
	textChanged: boolean
	value: T
}

export type EditFailure = {
	success: false
	cursorMoved: false
	textChanged: false
	error: EditError
}

export type EditResult<T = undefined> = EditSuccess<T> | EditFailure
