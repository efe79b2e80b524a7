import { flattenTree, type LoggerToggleTree } from './flattenToggleTree'

// Nested scopes flatten to `parent:child` tags. `$self` toggles the parent.
const LOGGER_TOGGLE_TREE = {
	app: true,
	buffer: {
		$self: true,
		gap: false,
	},
	editor: {
		$self: true,
		document: true,
		history: true,
		'kill-ring': false,
	},
} satisfies LoggerToggleTree

const LOGGER_TOGGLE_DEFAULTS: Record<string, boolean> =
	flattenTree(LOGGER_TOGGLE_TREE)

export { LOGGER_TOGGLE_DEFAULTS, LOGGER_TOGGLE_TREE }
