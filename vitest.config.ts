import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		include: ['status-canary/**/*.test.ts'],
		environment: 'node',
	},
});
