import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
	test: {
		dir: 'src/__tests__',
		environment: 'node',
		globals: true,
		coverage: {
			enabled: process.argv.includes('--coverage'),
			reporter: ['text', 'json-summary', 'json'],
			reportOnFailure: true,
			include: ['src/**/*'],
			exclude: ['src/__tests__/**/*', 'src/cli/purge-tower.ts'],
		},
	},
	resolve: {
		alias: {
			'@': fileURLToPath(new URL('./src', import.meta.url)),
		},
	},
});
