// CHANGE: Vitest configuration for CORE/SHELL/APP tests
// PURITY: SHELL (configuration only)
// INVARIANT: Deterministic test execution without side effects

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false, // tests import { describe, it, expect } from "vitest"
		environment: "node",
		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/bin/**"],
			// CORE carries the algebraic guarantees
			thresholds: {
				"src/core/**/*.ts": {
					branches: 90,
					functions: 90,
					lines: 90,
					statements: 90,
				},
			},
		},
		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
