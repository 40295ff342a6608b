import { defineConfig } from 'vitest/config'

export default defineConfig({
	test: {
		name: 'texcalc',
		include: ['test/**/*.spec.ts'],
		environment: 'node',
	},
})
