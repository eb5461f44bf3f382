import { defineConfig } from "vitest/config";

process.env.NODE_NO_WARNINGS ??= "1";

export default defineConfig({
	test: {
		include: ["tests/**/*.test.ts"],
		exclude: ["node_modules", "dist"],
		testTimeout: 30_000,
		pool: "forks",
		env: {
			LOG_LEVEL: "debug",
		},
	},
});
