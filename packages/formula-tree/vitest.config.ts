import { defineConfig } from 'vitest/config'

export default defineConfig({
	test: {
		name: 'formula-tree',
		include: ['test/**/*.spec.ts'],
		environment: 'node',
	},
})
