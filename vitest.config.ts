import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const r = (p: string) => fileURLToPath(new URL(p, import.meta.url));

export default defineConfig({
	resolve: {
		alias: {
			"@src": r("./src"),
			"@lib": r("./src/lib"),
			"@features": r("./src/features"),
		},
	},
	test: {
		include: ["src/**/*.test.ts"],
		setupFiles: ["./test-setup.ts"],
		environment: "node",
	},
});
