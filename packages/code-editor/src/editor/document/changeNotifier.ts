import { loggers } from '@gapline/logger'
import type {
	ChangeEvent,
	ChangeListener,
	ListenerRegistration,
} from './types'

const notifierLogger = loggers.editor.withTag('document')

/**
 * Listener collection owned by a document. Delivery is synchronous and in
 * registration order; `isDispatching` is true for the duration of a delivery.
 */
export class ChangeNotifier {
	private readonly listeners: ChangeListener[] = []
	private dispatching = false

	get isDispatching(): boolean {
		return this.dispatching
	}

	get size(): number {
		return this.listeners.length
	}

	add(listener: ChangeListener): ListenerRegistration {
		this.listeners.push(listener)
		let disposed = false
		return {
			dispose: () => {
				if (disposed) return
				disposed = true
				const index = this.listeners.indexOf(listener)
				if (index !== -1) this.listeners.splice(index, 1)
			},
		}
	}

	notify(event: ChangeEvent): void {
		if (this.listeners.length === 0) return

		this.dispatching = true
		try {
			for (const listener of this.listeners.slice()) {
				try {
					listener.onChange(event)
				} catch (error) {
					notifierLogger.error('change listener threw', {
						event: event.type,
						error,
					})
				}
			}
		} finally {
			this.dispatching = false
		}
	}
}
