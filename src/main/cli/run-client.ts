import { isAbsolute, resolve } from "node:path";
import type { GlobalConfiguration } from "main/lib/config";
import {
	DaemonClient,
	DaemonClientError,
	isDaemonRunning,
} from "main/lib/daemon-client";
import type { DaemonRequest } from "main/lib/daemon-protocol/types";
import { createLogger } from "main/lib/logger";
import { STDIN_SENTINEL } from "shared/constants";

const log = createLogger("cli");

export type ClientOutcome =
	| { mode: "daemon"; windowId: number }
	| { mode: "cold-start"; reason: string };

/**
 * Build the wire request from the client's merged configuration. Relative
 * paths are resolved here; the daemon would resolve them against its own
 * working directory.
 */
export function buildRequest(
	filename: string,
	globals: GlobalConfiguration,
	stdinData?: Buffer,
	cwd: string = process.cwd(),
): DaemonRequest {
	const isStdin = filename === STDIN_SENTINEL;
	return {
		filename: isStdin || isAbsolute(filename) ? filename : resolve(cwd, filename),
		output_filename: globals.outputFilename,
		copy_command: globals.copyCommand,
		initial_tool: globals.initialTool,
		fullscreen: globals.fullscreen,
		early_exit: globals.earlyExit,
		corner_roundness: globals.cornerRoundness,
		annotation_size_factor: globals.annotationSizeFactor,
		default_hide_toolbars: globals.defaultHideToolbars,
		no_window_decoration: globals.noWindowDecoration,
		inline_payload: isStdin ? stdinData?.toString("base64") : undefined,
	};
}

export interface ShowViaDaemonOptions {
	socketPath: string;
	request: DaemonRequest;
	client?: DaemonClient;
}

/**
 * Hand the request to a running daemon.
 *
 * Resolves "cold-start" when no daemon is reachable or the exchange fails in
 * transit; the caller then opens the window itself.
 *
 * @throws DaemonClientError with code DAEMON_ERROR when the daemon rejects the request
 */
export async function showViaDaemon(
	options: ShowViaDaemonOptions,
): Promise<ClientOutcome> {
	const { socketPath, request } = options;

	if (!(await isDaemonRunning(socketPath))) {
		log.info("Daemon not running, falling back to normal startup");
		return { mode: "cold-start", reason: "daemon not running" };
	}

	const client = options.client ?? new DaemonClient({ socketPath });
	try {
		const windowId = await client.sendRequestAsync(request);
		log.info(`Daemon opened window ${windowId}`);
		return { mode: "daemon", windowId };
	} catch (error) {
		if (error instanceof DaemonClientError && !error.isTransportFailure) {
			throw error;
		}
		const reason = error instanceof Error ? error.message : String(error);
		log.warn(`Daemon request failed (${reason}), falling back to normal startup`);
		return { mode: "cold-start", reason };
	}
}
