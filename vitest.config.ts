// CHANGE: Vitest configuration for CORE/SHELL test suites
// WHY: Native ESM and TypeScript without a build step
// PURITY: SHELL (configuration only)
// INVARIANT: Deterministic test execution without shared state between tests
// COMPLEXITY: O(n) test execution where n = |test_files|

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false, // IMPORTANT: Use explicit imports for type safety
		environment: "node",
		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		// CHANGE: v8 coverage for `npm run test:coverage`
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/bin/**"],
		},

		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
