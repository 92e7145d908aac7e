import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		// Enable Vitest's built-in globals API (describe, it, expect), no need for manual import
		globals: true,
		// Backend library, no DOM needed
		environment: 'node',
		include: ['src/**/*.test.ts'],
		// Driver adapters are loaded lazily; keep each file isolated so module state does not leak
		isolate: true,
	},
});
