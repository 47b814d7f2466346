import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["packages/*/test/**/*.test.ts"],
		environment: "node",
		testTimeout: 20_000,
		hookTimeout: 20_000,
	},
});
