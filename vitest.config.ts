import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		include: ['{packages,sinks,backends,middleware}/*/src/__tests__/**/*.test.ts'],
		testTimeout: 10_000,
	},
});
