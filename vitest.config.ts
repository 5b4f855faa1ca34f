import { defineConfig } from "vitest/config"

export default defineConfig({
	test: {
		coverage: {
			exclude: ["**/node_modules/**", "**/*.test.ts", "**/tests/**", "**/templates/**"],
			provider: "v8",
			reporter: ["text", "json", "html"],
		},
		projects: ["packages/core", "packages/cli"],
	},
})
