import path from "node:path";
import { defineConfig } from "vitest/config";

const pkg = (name: string): string =>
	path.resolve(__dirname, "packages", name, "src", "index.ts");

export default defineConfig({
	resolve: {
		alias: {
			"@symphony/core": pkg("core"),
			"@symphony/indicators": pkg("indicators"),
			"@symphony/data": pkg("data"),
			"@symphony/dsl": pkg("dsl"),
			"@symphony/strategy-engine": pkg("strategy-engine"),
		},
	},
	test: {
		include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
		environment: "node",
	},
});
