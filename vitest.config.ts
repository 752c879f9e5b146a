import { defineConfig } from 'vitest/config';

export default defineConfig({
	esbuild: {
		target: 'node20',
	},
	test: {
		globals: true,
		environment: 'node',
		include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
		exclude: ['**/node_modules/**', '**/dist/**'],
		coverage: {
			provider: 'v8',
			reporter: ['text', 'json', 'html'],
			exclude: ['**/node_modules/**', '**/dist/**', '**/*.test.ts'],
		},
		testTimeout: 10000,
		hookTimeout: 10000,
	},
});
