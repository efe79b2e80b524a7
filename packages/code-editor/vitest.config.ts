import { defineConfig } from 'vitest/config'

export default defineConfig({
	test: {
		name: 'code-editor',
		include: ['src/**/*.test.ts'],
		exclude: ['**/node_modules/**'],
		environment: 'node',
	},
})
