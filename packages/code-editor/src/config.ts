import { z } from 'zod'

export const DEFAULT_INITIAL_CAPACITY = 4096
export const DEFAULT_MAX_HISTORY_ENTRIES = 1000
export const DEFAULT_KILL_RING_CAPACITY = 32

const editorOptionsSchema = z.object({
	initialCapacity: z
		.number()
		.int()
		.positive()
		.default(DEFAULT_INITIAL_CAPACITY),
	maxHistoryEntries: z
		.number()
		.int()
		.positive()
		.default(DEFAULT_MAX_HISTORY_ENTRIES),
	killRingCapacity: z
		.number()
		.int()
		.positive()
		.default(DEFAULT_KILL_RING_CAPACITY),
})

export type EditorOptionsInput = z.input<typeof editorOptionsSchema>
export type EditorOptions = z.output<typeof editorOptionsSchema>

export const resolveEditorOptions = (
	input: EditorOptionsInput = {}
): EditorOptions => {
	const result = editorOptionsSchema.safeParse(input)
	if (!result.success) {
		throw new Error(
			`Invalid editor options:\n${z.prettifyError(result.error)}`
		)
	}
	return result.data
}
