import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const packages = fileURLToPath(new URL("./packages/", import.meta.url));
const workspace = ["core", "engine", "benchmark", "search", "loader", "harness"];

export default defineConfig({
	resolve: {
		alias: Object.fromEntries(workspace.map((name) => [`@seedline/${name}`, `${packages}${name}/src/index.ts`])),
	},
	test: {
		include: ["packages/*/src/**/*.test.ts"],
		testTimeout: 30_000,
	},
});
