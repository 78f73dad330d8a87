// CHANGE: Vitest configuration for the lineage inspector
// WHY: Native ESM, explicit imports, coverage gate on the pure CORE
// PURITY: SHELL (configuration only)
// INVARIANT: Deterministic test execution without side effects
// COMPLEXITY: O(n) test execution where n = |test_files|

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false, // IMPORTANT: Use explicit imports for type safety
		environment: "node",

		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		// CHANGE: High coverage for CORE, minimum for SHELL
		// WHY: CORE holds the graph invariants (acyclicity, ordering)
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/bin/**/*.ts"],
			thresholds: {
				"src/core/**/*.ts": {
					branches: 90,
					functions: 95,
					lines: 95,
					statements: 95,
				},
				global: {
					branches: 10,
					functions: 10,
					lines: 10,
					statements: 10,
				},
			},
		},

		// INVARIANT: ∀ test_i, test_j: independent(test_i, test_j) ⇒ no_shared_state
		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
