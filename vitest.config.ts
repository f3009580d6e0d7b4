// ABOUTME: Vitest configuration for the locate-desk query and filter core
// ABOUTME: Runs colocated unit, property and performance tests in a plain Node environment

import { defineConfig } from 'vitest/config'

export default defineConfig({
	test: {
		environment: 'node',
		globals: true,
		testTimeout: 10000,
		include: ['src/**/*.test.ts'],
		coverage: {
			provider: 'v8',
			reporter: ['text', 'json', 'html'],
			exclude: [
				'node_modules/',
				'src/test/',
				'**/*.test.ts'
			]
		}
	}
})
