import { fileURLToPath } from "node:url"
import { defineConfig } from "vitest/config"

export default defineConfig({
	resolve: {
		alias: {
			"@": fileURLToPath(new URL(".", import.meta.url)),
		},
	},
	test: {
		coverage: {
			exclude: ["**/*.test.ts", "tests/**/*.ts"],
			include: ["**/*.ts"],
		},
		environment: "node",
		exclude: ["**/node_modules/**", "templates/**"],
		include: ["**/*.test.ts"],
		name: "cli",
	},
})
