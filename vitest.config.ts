import { defineConfig } from "vitest/config"

export default defineConfig({
	test: {
		include: ["test/**/*.test.ts"],
		globals: false, // Explicit imports preferred
		environment: "node",
		testTimeout: 10000,
		setupFiles: ["test/helpers/setup.ts"],
		coverage: {
			provider: "v8",
			reporter: ["text", "json-summary", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/cli/**", "src/logger.ts", "src/session/steam-user-session.ts"],
			thresholds: {
				// Parsing and session lifecycle
				"src/keyvalues.ts": { statements: 85, branches: 70 },
				"src/session/orchestrator.ts": { statements: 80 },
			},
		},
	},
})
