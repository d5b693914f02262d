import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
	resolve: {
		alias: {
			"@folio/tui": fileURLToPath(new URL("./packages/tui/src/index.ts", import.meta.url)),
		},
	},
	test: {
		include: ["packages/*/test/**/*.test.ts"],
		environment: "node",
	},
});
