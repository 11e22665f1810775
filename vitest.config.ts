import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
	test: {
		include: ["packages/**/*.test.ts"],
		coverage: {
			include: ["packages/**/*.ts"],
		},
	},
	resolve: {
		alias: {
			"@mqroute/core": path.resolve(__dirname, "./packages/core/src"),
			"@mqroute/mqtt": path.resolve(__dirname, "./packages/mqtt/src"),
		},
	},
});
