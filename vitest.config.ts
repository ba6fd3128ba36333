import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["src/**/*.test.ts", "test/**/*.test.ts"],
		environment: "node",
		// Command tests change the working directory
		pool: "forks",
		restoreMocks: true,
	},
});
