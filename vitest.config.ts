import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const source = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
	resolve: {
		alias: [
			{ find: "@huntglitch/core/logger", replacement: source("./packages/core/src/logger/index.ts") },
			{ find: /^@huntglitch\/core$/, replacement: source("./packages/core/src/index.ts") },
			{ find: "huntglitch/express", replacement: source("./packages/huntglitch/src/integrations/express.ts") },
			{ find: "huntglitch/hono", replacement: source("./packages/huntglitch/src/integrations/hono.ts") },
			{ find: /^huntglitch$/, replacement: source("./packages/huntglitch/src/index.ts") },
		],
	},
	test: {
		environment: "node",
		include: ["packages/*/src/**/__tests__/**/*.test.ts"],
		coverage: {
			provider: "v8",
			reporter: ["text", "lcov", "json-summary"],
			include: ["packages/*/src/**/*.ts"],
			exclude: ["**/__tests__/**", "**/*.test.ts"],
		},
	},
});
