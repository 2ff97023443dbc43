import { env } from "main/env.main";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
	debug(message: string, data?: unknown): void;
	info(message: string, data?: unknown): void;
	warn(message: string, data?: unknown): void;
	error(message: string, data?: unknown): void;
}

const DEBUG_ENABLED = env.SNAPMARK_DEBUG === "1";

function write(
	scope: string,
	level: LogLevel,
	message: string,
	data?: unknown,
): void {
	if (level === "debug" && !DEBUG_ENABLED) return;

	const timestamp = new Date().toISOString();
	const prefix = `[${timestamp}] [${scope}] [${level.toUpperCase()}]`;
	const sink =
		level === "warn" || level === "error" ? console.error : console.log;
	if (data !== undefined) {
		sink(`${prefix} ${message}`, data);
	} else {
		sink(`${prefix} ${message}`);
	}
}

/**
 * Scoped logger. One scope per component, e.g. `createLogger("listener")`.
 */
export function createLogger(scope: string): Logger {
	return {
		debug: (message, data) => write(scope, "debug", message, data),
		info: (message, data) => write(scope, "info", message, data),
		warn: (message, data) => write(scope, "warn", message, data),
		error: (message, data) => write(scope, "error", message, data),
	};
}

/** Message of an unknown thrown value. */
export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
