import { defineConfig } from "vitest/config";
import tsconfigPaths from "vite-tsconfig-paths";

export default defineConfig({
	plugins: [tsconfigPaths()],
	test: {
		clearMocks: true,
		include: ["src/**/*.test.ts"],
		exclude: ["node_modules"],
		setupFiles: ["console-fail-test/setup", "src/__tests__/setup.ts"],
		disableConsoleIntercept: true,
	},
});
