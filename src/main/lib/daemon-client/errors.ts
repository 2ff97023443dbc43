export type DaemonClientErrorCode =
	| "CONNECT_FAILED"
	| "CONNECT_TIMEOUT"
	| "WRITE_TIMEOUT"
	| "READ_TIMEOUT"
	| "PROTOCOL_ERROR"
	| "DAEMON_ERROR";

/**
 * Client-side failure talking to the daemon.
 *
 * DAEMON_ERROR means the daemon answered with an error response; every other
 * code is a transport problem and the caller may fall back to a cold start.
 */
export class DaemonClientError extends Error {
	constructor(
		message: string,
		public readonly code: DaemonClientErrorCode,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "DaemonClientError";
	}

	get isTransportFailure(): boolean {
		return this.code !== "DAEMON_ERROR";
	}
}
