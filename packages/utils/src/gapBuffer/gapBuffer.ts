import { loggers } from '@gapline/logger'
import {
	BufferError,
	fail,
	ok,
	outOfRange,
	type BufferResult,
} from '../bufferError'
import { isSingleCodePoint } from '../codePoints'
import type { GapBufferOptions, GapBufferSnapshot } from './gapBufferTypes'

const gapLogger = loggers.buffer.withTag('gap')

export const DEFAULT_GAP_BUFFER_CAPACITY = 4096
const MIN_INITIAL_GAP = 1024
// String.fromCodePoint is variadic; keep argument lists well below engine limits.
const DECODE_CHUNK = 8192

const initialGapFor = (length: number) =>
	Math.max(
		Math.floor(Math.max(length, DEFAULT_GAP_BUFFER_CAPACITY) / 4),
		MIN_INITIAL_GAP
	)

const encode = (text: string): number[] =>
	Array.from(text, (char) => char.codePointAt(0) ?? 0)

const decode = (codePoints: Uint32Array): string => {
	if (codePoints.length <= DECODE_CHUNK) {
		return String.fromCodePoint(...codePoints)
	}

	const chunks: string[] = []
	for (let start = 0; start < codePoints.length; start += DECODE_CHUNK) {
		chunks.push(
			String.fromCodePoint(...codePoints.subarray(start, start + DECODE_CHUNK))
		)
	}
	return chunks.join('')
}

const isIndex = (value: number) => Number.isInteger(value) && value >= 0

/**
 * Code-point indexed gap buffer.
 *
 * Storage is `[ before gap | gap | after gap ]`. Edits move the gap to the
 * edit position first, so repeated edits at the same spot never shift text.
 */
export class GapBuffer {
	private storage: Uint32Array
	private gapStart = 0
	private gapEnd: number

	constructor(options: GapBufferOptions = {}) {
		const capacity = Math.max(
			1,
			Math.floor(options.initialCapacity ?? DEFAULT_GAP_BUFFER_CAPACITY)
		)
		this.storage = new Uint32Array(capacity)
		this.gapEnd = capacity
	}

	/**
	 * Builds a buffer holding `text` with the gap after it. `initialCapacity`
	 * acts as a lower bound on the resulting capacity.
	 */
	static fromString(text: string, options: GapBufferOptions = {}): GapBuffer {
		const codePoints = encode(text)
		const buffer = new GapBuffer({
			initialCapacity: Math.max(
				options.initialCapacity ?? 0,
				codePoints.length + initialGapFor(codePoints.length)
			),
		})
		buffer.storage.set(codePoints, 0)
		buffer.gapStart = codePoints.length
		return buffer
	}

	get length(): number {
		return this.storage.length - this.gapSize
	}

	private get gapSize(): number {
		return this.gapEnd - this.gapStart
	}

	insert(position: number, text: string): BufferResult<number> {
		if (!isIndex(position) || position > this.length) {
			return fail(outOfRange(position, this.length))
		}

		const codePoints = encode(text)
		if (codePoints.length === 0) return ok(0)

		this.moveGapTo(position)
		if (this.gapSize < codePoints.length) {
			this.grow(codePoints.length)
		}

		this.storage.set(codePoints, this.gapStart)
		this.gapStart += codePoints.length
		return ok(codePoints.length)
	}

	insertChar(position: number, char: string): BufferResult<number> {
		if (!isIndex(position) || position > this.length) {
			return fail(outOfRange(position, this.length))
		}
		if (!isSingleCodePoint(char)) {
			return fail(
				new BufferError(
					'invalid-character',
					`expected exactly one character, received ${JSON.stringify(char)}`,
					position
				)
			)
		}
		return this.insert(position, char)
	}

	delete(position: number): BufferResult<string> {
		if (!isIndex(position) || position >= this.length) {
			return fail(outOfRange(position, this.length))
		}

		this.moveGapTo(position)
		const removed = this.storage[this.gapEnd]
		this.gapEnd += 1
		return ok(String.fromCodePoint(removed))
	}

	charAt(position: number): string | undefined {
		if (!isIndex(position) || position >= this.length) return undefined
		const physical =
			position < this.gapStart ? position : position + this.gapSize
		return String.fromCodePoint(this.storage[physical])
	}

	slice(start: number, end: number): BufferResult<string> {
		if (!isIndex(start) || !isIndex(end) || start > end || end > this.length) {
			return fail(
				new BufferError(
					'out-of-range',
					`range [${start}, ${end}) is out of range for length ${this.length}`,
					start
				)
			)
		}

		const before = this.storage.subarray(
			Math.min(start, this.gapStart),
			Math.min(end, this.gapStart)
		)
		const after = this.storage.subarray(
			Math.max(start, this.gapStart) + this.gapSize,
			Math.max(end, this.gapStart) + this.gapSize
		)
		return ok(decode(before) + decode(after))
	}

	toString(): string {
		return (
			decode(this.storage.subarray(0, this.gapStart)) +
			decode(this.storage.subarray(this.gapEnd))
		)
	}

	snapshot(): GapBufferSnapshot {
		return {
			gapStart: this.gapStart,
			gapEnd: this.gapEnd,
			capacity: this.storage.length,
			length: this.length,
		}
	}

	private moveGapTo(position: number): void {
		if (position === this.gapStart) return

		if (position < this.gapStart) {
			const distance = this.gapStart - position
			this.storage.copyWithin(this.gapEnd - distance, position, this.gapStart)
			this.gapStart = position
			this.gapEnd -= distance
			return
		}

		const distance = position - this.gapStart
		this.storage.copyWithin(this.gapStart, this.gapEnd, this.gapEnd + distance)
		this.gapStart += distance
		this.gapEnd += distance
	}

	private grow(required: number): void {
		const previousCapacity = this.storage.length
		const length = this.length
		let capacity = Math.max(1, previousCapacity * 2)
		while (capacity - length < required) {
			capacity *= 2
		}

		const tailLength = previousCapacity - this.gapEnd
		const next = new Uint32Array(capacity)
		next.set(this.storage.subarray(0, this.gapStart), 0)
		next.set(this.storage.subarray(this.gapEnd), capacity - tailLength)

		this.storage = next
		this.gapEnd = capacity - tailLength
		gapLogger.debug('grew gap buffer', {
			from: previousCapacity,
			to: capacity,
			gapStart: this.gapStart,
		})
	}
}
