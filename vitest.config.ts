import { defineConfig } from 'vitest/config'

export default defineConfig({
	test: {
		environment: 'node',
		include: ['src/**/*.test.ts'],
		// Tests share process.env (PROTOC, VITE_PROTOC_DEBUG); keep files sequential.
		fileParallelism: false,
		testTimeout: 30_000,
	},
})
