import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const fromRoot = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
	test: {
		watch: false,
		fileParallelism: true,
		include: ["tests/**/*.test.ts"],
		exclude: ["node_modules"],
		testTimeout: 15000,
	},
	resolve: {
		alias: {
			restprobe: fromRoot("./packages/core/src/index.ts"),
			"@restprobe/reporter-allure": fromRoot("./packages/reporter-allure/src/index.ts"),
		},
	},
});
