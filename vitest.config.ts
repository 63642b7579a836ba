import { defineConfig } from "vitest/config";

export default defineConfig({
	esbuild: {
		jsx: "automatic",
		jsxImportSource: "hono/jsx",
	},
	test: {
		include: ["packages/*/test/**/*.test.{ts,tsx}"],
		environment: "node",
	},
});
