import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const src = (path: string) => fileURLToPath(new URL(`./packages/${path}`, import.meta.url));

export default defineConfig({
	test: {
		globals: true,
		environment: "node",
		include: ["packages/*/src/**/*.test.ts"],
		coverage: {
			provider: "v8",
			reporter: ["text", "lcov", "json-summary"],
			include: ["packages/*/src/**/*.ts"],
			exclude: ["**/__tests__/**", "**/*.test.ts", "**/test-utils/**", "packages/cli/src/index.ts"],
			thresholds: {
				lines: 80,
				branches: 75,
				functions: 80,
				statements: 80,
			},
		},
	},
	resolve: {
		alias: [
			{ find: "@cloudapi-double/core/logger", replacement: src("core/src/logger/index.ts") },
			{ find: "@cloudapi-double/core", replacement: src("core/src/index.ts") },
			{ find: "@cloudapi-double/memory-store", replacement: src("memory-store/src/index.ts") },
			{ find: "@cloudapi-double/test-utils", replacement: src("test-utils/src/index.ts") },
			{ find: /^cloudapi-double$/, replacement: src("cloudapi-double/src/index.ts") },
		],
	},
});
