import path from "node:path";
import { defineConfig } from "vitest/config";

export default defineConfig({
	resolve: {
		alias: {
			"@domain": path.resolve(__dirname, "src/domain"),
			"@application": path.resolve(__dirname, "src/application"),
			"@infrastructure": path.resolve(__dirname, "src/infrastructure"),
			"@": path.resolve(__dirname, "src"),
		},
	},
	test: {
		environment: "node",
		restoreMocks: true,
		setupFiles: ["tests/setup.ts"],
		include: ["tests/**/*.test.ts"],
	},
});
