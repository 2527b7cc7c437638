import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		include: ['packages/*/src/**/*.test.ts'],
		environment: 'node',
		// RSA key generation in fixtures is slow on small CI machines.
		testTimeout: 20_000,
	},
});
