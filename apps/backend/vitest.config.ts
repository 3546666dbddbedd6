import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: true,
		environment: "node",
		include: ["src/**/*.test.ts", "scripts/**/*.test.ts"],
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/modules/**/*.ts"],
			exclude: ["src/modules/**/*.test.ts"],
		},
	},
	resolve: {
		alias: {
			"@goalcast/shared-types": fileURLToPath(
				new URL("../../packages/shared-types/src/index.ts", import.meta.url),
			),
		},
	},
});
