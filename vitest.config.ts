import { defineConfig } from 'vitest/config';

// Argon2id runs with its real 64 MiB / 3-pass parameters in tests.
export default defineConfig({
	test: {
		environment: 'node',
		include: ['packages/*/src/**/*.test.ts'],
		testTimeout: 120_000,
		hookTimeout: 60_000,
	},
});
