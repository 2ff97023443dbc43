import { existsSync } from "node:fs";
import { connect, type Socket } from "node:net";
import { decodeResponse, encodeMessage } from "main/lib/daemon-protocol/codec";
import { ProtocolError } from "main/lib/daemon-protocol/errors";
import { readMessage, writeMessage } from "main/lib/daemon-protocol/framing";
import type {
	DaemonRequest,
	DaemonResponse,
} from "main/lib/daemon-protocol/types";
import { createLogger, errorMessage } from "main/lib/logger";
import { DaemonClientError, type DaemonClientErrorCode } from "./errors";

const log = createLogger("client");

// =============================================================================
// Timeouts
// =============================================================================

/** Liveness probe budget. */
const PROBE_TIMEOUT_MS = 1000;

export const DEFAULT_CONNECT_TIMEOUT_MS = 5000;
export const DEFAULT_READ_TIMEOUT_MS = 30_000;
export const DEFAULT_WRITE_TIMEOUT_MS = 5000;

export interface DaemonClientOptions {
	socketPath: string;
	connectTimeoutMs?: number;
	writeTimeoutMs?: number;
	readTimeoutMs?: number;
}

function promiseWithTimeout<T>(
	promise: Promise<T>,
	timeoutMs: number,
	onTimeout: () => Error,
): Promise<T> {
	return new Promise<T>((resolve, reject) => {
		const timeoutId = setTimeout(() => {
			reject(onTimeout());
		}, timeoutMs);

		promise
			.then((value) => {
				clearTimeout(timeoutId);
				resolve(value);
			})
			.catch((error) => {
				clearTimeout(timeoutId);
				reject(error);
			});
	});
}

// =============================================================================
// Liveness
// =============================================================================

/**
 * Check whether a daemon is accepting connections on the socket.
 *
 * Connects and immediately closes without sending a request. A leftover socket
 * file with nobody listening reports false.
 */
export function isDaemonRunning(socketPath: string): Promise<boolean> {
	return new Promise((resolve) => {
		if (!existsSync(socketPath)) {
			resolve(false);
			return;
		}

		const probe = connect(socketPath);
		const timeout = setTimeout(() => {
			probe.destroy();
			resolve(false);
		}, PROBE_TIMEOUT_MS);

		probe.on("connect", () => {
			clearTimeout(timeout);
			probe.destroy();
			resolve(true);
		});

		probe.on("error", () => {
			clearTimeout(timeout);
			resolve(false);
		});
	});
}

// =============================================================================
// Client
// =============================================================================

/**
 * One request per connection: connect, write one frame, read one frame,
 * close.
 */
export class DaemonClient {
	private readonly socketPath: string;
	private readonly connectTimeoutMs: number;
	private readonly writeTimeoutMs: number;
	private readonly readTimeoutMs: number;

	constructor(options: DaemonClientOptions) {
		this.socketPath = options.socketPath;
		this.connectTimeoutMs =
			options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
		this.writeTimeoutMs = options.writeTimeoutMs ?? DEFAULT_WRITE_TIMEOUT_MS;
		this.readTimeoutMs = options.readTimeoutMs ?? DEFAULT_READ_TIMEOUT_MS;
	}

	/**
	 * Send a request with a connect timeout and an idle timeout covering the
	 * write and response phases together.
	 *
	 * @throws DaemonClientError
	 */
	async sendRequest(request: DaemonRequest): Promise<number> {
		const socket = await this.connect();
		socket.setTimeout(this.readTimeoutMs);
		const idle = new Promise<never>((_, reject) => {
			socket.once("timeout", () => {
				reject(
					new DaemonClientError(
						`No response from daemon within ${this.readTimeoutMs}ms`,
						"READ_TIMEOUT",
					),
				);
			});
		});
		// the idle race may never settle once the exchange finishes
		idle.catch(() => undefined);

		try {
			return await Promise.race([this.exchange(socket, request), idle]);
		} finally {
			socket.destroy();
		}
	}

	/**
	 * Send a request with an independent timeout for each phase, so a stall
	 * is attributed to connect, write or read.
	 *
	 * @throws DaemonClientError
	 */
	async sendRequestAsync(request: DaemonRequest): Promise<number> {
		const socket = await this.connect();
		try {
			const frame = this.encode(request);
			await promiseWithTimeout(
				this.guard(writeMessage(socket, frame)),
				this.writeTimeoutMs,
				() => this.timeoutError("WRITE_TIMEOUT", "write", this.writeTimeoutMs),
			);
			const body = await promiseWithTimeout(
				this.guard(readMessage(socket)),
				this.readTimeoutMs,
				() => this.timeoutError("READ_TIMEOUT", "read", this.readTimeoutMs),
			);
			return this.interpret(this.decode(body));
		} finally {
			socket.destroy();
		}
	}

	private async exchange(
		socket: Socket,
		request: DaemonRequest,
	): Promise<number> {
		await this.guard(writeMessage(socket, this.encode(request)));
		const body = await this.guard(readMessage(socket));
		return this.interpret(this.decode(body));
	}

	private connect(): Promise<Socket> {
		return new Promise((resolve, reject) => {
			const socket = connect(this.socketPath);
			const timeout = setTimeout(() => {
				socket.destroy();
				reject(
					this.timeoutError(
						"CONNECT_TIMEOUT",
						"connect",
						this.connectTimeoutMs,
					),
				);
			}, this.connectTimeoutMs);

			socket.once("connect", () => {
				clearTimeout(timeout);
				socket.removeAllListeners("error");
				// later socket errors surface through the framing calls
				socket.on("error", (error) => {
					log.debug(`Socket error: ${error.message}`);
				});
				resolve(socket);
			});

			socket.once("error", (error) => {
				clearTimeout(timeout);
				reject(
					new DaemonClientError(
						`Failed to connect to daemon at ${this.socketPath}: ${error.message}`,
						"CONNECT_FAILED",
						{ cause: error },
					),
				);
			});
		});
	}

	private encode(request: DaemonRequest): Buffer {
		try {
			return encodeMessage(request);
		} catch (error) {
			throw this.transportError(error);
		}
	}

	private decode(body: Buffer): DaemonResponse {
		try {
			return decodeResponse(body);
		} catch (error) {
			throw this.transportError(error);
		}
	}

	private interpret(response: DaemonResponse): number {
		if (response.status === "error") {
			throw new DaemonClientError(response.message, "DAEMON_ERROR");
		}
		return response.window_id;
	}

	private async guard<T>(operation: Promise<T>): Promise<T> {
		try {
			return await operation;
		} catch (error) {
			throw this.transportError(error);
		}
	}

	private transportError(error: unknown): DaemonClientError {
		if (error instanceof DaemonClientError) return error;
		const message =
			error instanceof ProtocolError
				? error.message
				: `Daemon communication failed: ${errorMessage(error)}`;
		return new DaemonClientError(message, "PROTOCOL_ERROR", { cause: error });
	}

	private timeoutError(
		code: DaemonClientErrorCode,
		phase: string,
		timeoutMs: number,
	): DaemonClientError {
		return new DaemonClientError(
			`Daemon ${phase} timed out after ${timeoutMs}ms`,
			code,
		);
	}
}
