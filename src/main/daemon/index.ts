/**
 * Annotation daemon
 *
 * Keeps the GUI toolkit initialized and opens annotation windows on request.
 *
 * IPC protocol:
 * - One length-prefixed JSON request per connection, one response back
 * - Socket: $TMPDIR/snapmark-<uid>.sock, mode 0600
 *
 * Connection handlers and the window session manager share nothing but the
 * request channel and the per-connection reply channels in ./bridge.
 */
import type { GlobalConfiguration } from "main/lib/config";
import { isDaemonRunning } from "main/lib/daemon-client";
import { createLogger, errorMessage } from "main/lib/logger";
import type { WindowToolkit } from "main/toolkit";
import {
	ChannelClosedError,
	createReplyChannel,
	type ReplyReceiver,
	RequestChannel,
} from "./bridge";
import { type DaemonConnection, SocketListener } from "./socket-listener";
import { WindowSessionManager } from "./window-session-manager";

const log = createLogger("daemon");

export class DaemonAlreadyRunningError extends Error {
	constructor(readonly socketPath: string) {
		super(`Another daemon is already running at ${socketPath}`);
		this.name = "DaemonAlreadyRunningError";
	}
}

export interface DaemonOptions {
	socketPath: string;
	toolkit: WindowToolkit;
	globals: GlobalConfiguration;
	drainIntervalMs?: number;
	batchSize?: number;
	/** Signal and uncaught-error handlers. Off for in-process use such as tests. */
	installProcessHandlers?: boolean;
}

export interface DaemonHandle {
	readonly socketPath: string;
	readonly manager: WindowSessionManager;
	/** Stop accepting, remove the socket file, stop the drain. Idempotent. */
	stop(): Promise<void>;
	/** Settles when the accept loop ends; rejects on a listener failure. */
	readonly done: Promise<void>;
}

// =============================================================================
// Per-connection reply delivery
// =============================================================================

async function deliverReply(
	connection: DaemonConnection,
	receiver: ReplyReceiver,
): Promise<void> {
	try {
		const response = await receiver.receive();
		await connection.sendResponse(response);
	} catch (error) {
		if (error instanceof ChannelClosedError) {
			log.debug(`Connection ${connection.id} dropped: ${error.message}`);
		} else {
			log.debug(
				`Failed to deliver reply on connection ${connection.id}: ${errorMessage(error)}`,
			);
		}
	} finally {
		connection.close();
	}
}

async function acceptLoop(
	listener: SocketListener,
	requests: RequestChannel,
): Promise<void> {
	for (;;) {
		const accepted = await listener.accept();
		if (!accepted) return;

		const { sender, receiver } = createReplyChannel();
		if (!requests.send({ request: accepted.request, reply: sender })) {
			accepted.connection.close();
			continue;
		}
		deliverReply(accepted.connection, receiver).catch((error) => {
			log.error(`Reply task failed: ${errorMessage(error)}`);
		});
	}
}

// =============================================================================
// Process handlers
// =============================================================================

function installProcessHandlers(
	listener: SocketListener,
	stop: () => Promise<void>,
): () => void {
	const onSignal = (signal: NodeJS.Signals) => {
		log.info(`Received ${signal}, shutting down...`);
		stop().catch((error) => {
			log.error(`Shutdown failed: ${errorMessage(error)}`);
			process.exit(1);
		});
	};
	const onFatal = (label: string) => (reason: unknown) => {
		log.error(label, {
			error: errorMessage(reason),
			stack: reason instanceof Error ? reason.stack : undefined,
		});
		listener.removeSocketFile();
		process.exit(1);
	};
	const onUncaught = onFatal("Uncaught exception");
	const onRejection = onFatal("Unhandled rejection");

	process.on("SIGINT", onSignal);
	process.on("SIGTERM", onSignal);
	process.on("SIGHUP", onSignal);
	process.on("uncaughtException", onUncaught);
	process.on("unhandledRejection", onRejection);

	return () => {
		process.off("SIGINT", onSignal);
		process.off("SIGTERM", onSignal);
		process.off("SIGHUP", onSignal);
		process.off("uncaughtException", onUncaught);
		process.off("unhandledRejection", onRejection);
	};
}

// =============================================================================
// Main
// =============================================================================

/**
 * Start a daemon: pre-warm the toolkit, bind the socket, start draining.
 *
 * @throws DaemonAlreadyRunningError if a live daemon answers on the socket
 * @throws if the socket cannot be bound
 */
export async function runDaemon(options: DaemonOptions): Promise<DaemonHandle> {
	const { socketPath, toolkit } = options;
	log.info("Daemon starting...", { socketPath, toolkit: toolkit.name });

	if (await isDaemonRunning(socketPath)) {
		throw new DaemonAlreadyRunningError(socketPath);
	}

	const requests = new RequestChannel();
	const manager = new WindowSessionManager({
		toolkit,
		globals: options.globals,
		requests,
		drainIntervalMs: options.drainIntervalMs,
		batchSize: options.batchSize,
	});

	manager.prewarm();
	const listener = await SocketListener.bind(socketPath);
	manager.start();

	let removeHandlers: () => void = () => {};
	const halt = () => {
		listener.close();
		manager.shutdown();
		removeHandlers();
	};

	const done = acceptLoop(listener, requests).catch((error: unknown) => {
		log.error(`Accept loop failed: ${errorMessage(error)}`);
		halt();
		throw error;
	});

	const stop = async () => {
		halt();
		await done;
		log.info("Daemon stopped");
	};

	if (options.installProcessHandlers) {
		removeHandlers = installProcessHandlers(listener, stop);
	}

	log.info("Daemon ready");
	return { socketPath, manager, stop, done };
}
