import { defineConfig } from 'vitest/config'

export default defineConfig({
	test: {
		name: 'formula-engine',
		include: ['test/**/*.spec.ts'],
		environment: 'node',
	},
})
