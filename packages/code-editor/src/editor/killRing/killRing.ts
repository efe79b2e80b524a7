import { loggers } from '@gapline/logger'
import { resolveEditorOptions, type EditorOptionsInput } from '../../config'

const killRingLogger = loggers.editor.withTag('kill-ring')

export type KillRingOptions = Pick<EditorOptionsInput, 'killRingCapacity'>

/** Killed text, newest first. Yanking never removes an entry. */
export class KillRing {
	private entries: string[] = []
	readonly capacity: number

	constructor(options: KillRingOptions = {}) {
		this.capacity = resolveEditorOptions(options).killRingCapacity
	}

	get size(): number {
		return this.entries.length
	}

	push(text: string): void {
		if (text.length === 0) return
		if (this.entries.length === this.capacity) {
			this.entries.pop()
		}
		this.entries.unshift(text)
		killRingLogger.debug('pushed kill', { size: this.entries.length })
	}

	/** Extends the newest kill at its end, or starts one. */
	appendToFront(text: string): void {
		if (text.length === 0) return
		const [front, ...rest] = this.entries
		if (front === undefined) {
			this.entries = [text]
			return
		}
		this.entries = [front + text, ...rest]
	}

	/** Extends the newest kill at its start, or starts one. */
	prependToFront(text: string): void {
		if (text.length === 0) return
		const [front, ...rest] = this.entries
		if (front === undefined) {
			this.entries = [text]
			return
		}
		this.entries = [text + front, ...rest]
	}

	yank(): string | undefined {
		return this.entries[0]
	}

	/** Moves the newest kill to the back and returns the new front. */
	rotate(): string | undefined {
		const [front, ...rest] = this.entries
		if (front === undefined || rest.length === 0) return front
		this.entries = [...rest, front]
		return this.entries[0]
	}

	clear(): void {
		this.entries = []
	}
}
