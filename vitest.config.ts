// CHANGE: Vitest configuration for CORE/SHELL/APP test suites
// PURITY: SHELL (configuration only)
// INVARIANT: Deterministic test execution without side effects

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false, // Tests import { describe, it, expect } from "vitest"
		environment: "node",
		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		// CHANGE: 100% coverage for CORE, minimum for SHELL/APP
		// INVARIANT: ∀ f ∈ src/core/**/*.ts: all_metrics(f) = 100%
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/bin/**", "src/index.ts"],
			thresholds: {
				"src/core/**/*.ts": {
					branches: 100,
					functions: 100,
					lines: 100,
					statements: 100,
				},
			},
		},

		// Prevent test contamination between spies
		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
