export type GapBufferOptions = {
	/** Capacity in code points for an empty buffer. */
	initialCapacity?: number
}

export type GapBufferSnapshot = {
	gapStart: number
	gapEnd: number
	capacity: number
	length: number
}
