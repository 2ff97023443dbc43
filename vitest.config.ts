import tsconfigPaths from "vite-tsconfig-paths";
import { defineConfig } from "vitest/config";

export default defineConfig({
	plugins: [tsconfigPaths()],
	test: {
		environment: "node",
		include: ["src/**/*.test.ts"],
		testTimeout: 15000,
		// Daemon tests bind Unix sockets and install process hooks
		pool: "forks",
	},
});
