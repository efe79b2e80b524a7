import { defineConfig } from 'vitest/config'

export default defineConfig({
	test: {
		name: 'utils',
		include: ['src/**/*.test.ts'],
		exclude: ['**/node_modules/**'],
		environment: 'node',
	},
})
