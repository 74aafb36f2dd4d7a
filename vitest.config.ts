import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: true,
		environment: "node",
		include: ["packages/**/*.test.ts"],
		exclude: ["**/node_modules/**", "**/dist/**"],
		pool: "forks",
		// TLS tests bind ephemeral ports and the log level is process-wide
		sequence: {
			concurrent: false,
		},
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["packages/*/src/**/*.ts"],
			exclude: ["**/*.test.ts", "**/__tests__/**", "**/index.ts"],
		},
		testTimeout: 30000,
		hookTimeout: 30000,
	},
});
