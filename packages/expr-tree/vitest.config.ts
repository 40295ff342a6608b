import { defineConfig } from 'vitest/config'

export default defineConfig({
	test: {
		name: 'expr-tree',
		include: ['test/**/*.spec.ts'],
		environment: 'node',
	},
})
