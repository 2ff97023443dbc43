/**
 * Environment variables for the daemon and CLI processes.
 *
 * Validated once on import. Empty strings are treated as unset so that
 * `SNAPMARK_SOCKET_PATH= snapmark --show ...` falls back to the default path.
 */
import { createEnv } from "@t3-oss/env-core";
import { z } from "zod/v4";

export const env = createEnv({
	server: {
		SNAPMARK_SOCKET_PATH: z.string().optional(),
		SNAPMARK_CONFIG_PATH: z.string().optional(),
		SNAPMARK_TOOLKIT: z.enum(["viewer", "headless"]).default("viewer"),
		SNAPMARK_DRAIN_INTERVAL_MS: z.coerce.number().int().positive().default(10),
		SNAPMARK_DRAIN_BATCH_SIZE: z.coerce.number().int().positive().default(1),
		SNAPMARK_DEBUG: z.enum(["0", "1"]).default("0"),
	},

	runtimeEnv: process.env,
	emptyStringAsUndefined: true,

	// CLI and daemon both run in a trusted Node.js context
	isServer: true,
});
