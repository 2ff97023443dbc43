import type { Readable } from "node:stream";
import { DaemonAlreadyRunningError, runDaemon } from "main/daemon";
import { ImageLoadError } from "main/daemon/image-resource";
import { env } from "main/env.main";
import { getConfigPath, getSocketPath } from "main/lib/app-environment";
import {
	ConfigurationError,
	type GlobalConfiguration,
	loadConfiguration,
} from "main/lib/config";
import { DaemonClientError } from "main/lib/daemon-client";
import { createLogger, errorMessage } from "main/lib/logger";
import { SecurityError } from "main/lib/security";
import { createToolkit, type WindowToolkit } from "main/toolkit";
import { STDIN_SENTINEL } from "shared/constants";
import {
	type CliArguments,
	parseCliArguments,
	USAGE,
	UsageError,
} from "./args";
import { buildRequest, showViaDaemon } from "./run-client";
import { runDirect } from "./run-direct";
import { readAll } from "./stdin";

const log = createLogger("cli");

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;
export const EXIT_CONFIG = 3;

export interface CliDependencies {
	stdin: Readable;
	socketPath?: string;
	createToolkit?: (globals: GlobalConfiguration) => WindowToolkit;
}

async function readStdinIfNeeded(
	filename: string,
	stdin: Readable,
): Promise<Buffer | undefined> {
	return filename === STDIN_SENTINEL ? readAll(stdin) : undefined;
}

/** Run the CLI and resolve with the process exit code. */
export async function runCli(
	argv: string[],
	deps: CliDependencies,
): Promise<number> {
	let args: CliArguments;
	try {
		args = parseCliArguments(argv);
	} catch (error) {
		if (!(error instanceof UsageError)) throw error;
		console.error(`error: ${error.message}\n\n${USAGE}`);
		return EXIT_USAGE;
	}

	if (args.help) {
		console.log(USAGE);
		return EXIT_OK;
	}

	let globals: GlobalConfiguration;
	try {
		globals = loadConfiguration(args.configPath ?? getConfigPath(), args.overrides);
	} catch (error) {
		if (!(error instanceof ConfigurationError)) throw error;
		log.error(error.message);
		return EXIT_CONFIG;
	}

	const socketPath = deps.socketPath ?? getSocketPath();
	const makeToolkit = deps.createToolkit ?? createToolkit;

	try {
		if (args.mode === "daemon") {
			const daemon = await runDaemon({
				socketPath,
				toolkit: makeToolkit(globals),
				globals,
				drainIntervalMs: env.SNAPMARK_DRAIN_INTERVAL_MS,
				batchSize: env.SNAPMARK_DRAIN_BATCH_SIZE,
				installProcessHandlers: true,
			});
			await daemon.done;
			return EXIT_OK;
		}

		const filename = args.filename ?? STDIN_SENTINEL;
		const stdinData = await readStdinIfNeeded(filename, deps.stdin);

		if (args.mode === "show") {
			const outcome = await showViaDaemon({
				socketPath,
				request: buildRequest(filename, globals, stdinData),
			});
			if (outcome.mode === "daemon") return EXIT_OK;
		}

		await runDirect({
			toolkit: makeToolkit(globals),
			globals,
			filename,
			stdinData,
		});
		return EXIT_OK;
	} catch (error) {
		if (error instanceof DaemonAlreadyRunningError) {
			log.error(error.message);
		} else if (error instanceof DaemonClientError) {
			log.error(`Daemon rejected the request: ${error.message}`);
		} else if (error instanceof SecurityError || error instanceof ImageLoadError) {
			log.error(error.message);
		} else {
			log.error(`Failed: ${errorMessage(error)}`);
		}
		return EXIT_FAILURE;
	}
}
