/**
 * Unix socket listener for the daemon.
 *
 * Each connection carries exactly one framed request. Connections are read
 * concurrently; fully decoded requests queue up for `accept()` in arrival
 * order. A connection that fails to produce a request is answered (when it
 * can be) and dropped without disturbing the others.
 */
import { existsSync, unlinkSync } from "node:fs";
import { createServer, type Server, type Socket } from "node:net";
import { decodeRequest, encodeMessage } from "main/lib/daemon-protocol/codec";
import { isProtocolError } from "main/lib/daemon-protocol/errors";
import { readMessage, writeMessage } from "main/lib/daemon-protocol/framing";
import {
	type DaemonRequest,
	type DaemonResponse,
	errorResponse,
} from "main/lib/daemon-protocol/types";
import { createLogger, errorMessage } from "main/lib/logger";
import { setSocketPermissions } from "main/lib/security";

const log = createLogger("listener");

/** A peer that connects and never sends a full frame is dropped after this. */
const REQUEST_READ_TIMEOUT_MS = 30_000;

// =============================================================================
// Connection
// =============================================================================

export class DaemonConnection {
	private isClosed = false;

	constructor(
		readonly id: number,
		private readonly socket: Socket,
	) {}

	get closed(): boolean {
		return this.isClosed || this.socket.destroyed;
	}

	/** Write one framed response. Rejects with a ProtocolError if the peer is gone. */
	async sendResponse(response: DaemonResponse): Promise<void> {
		await writeMessage(this.socket, encodeMessage(response));
	}

	close(): void {
		if (this.isClosed) return;
		this.isClosed = true;
		this.socket.end();
	}
}

export interface AcceptedRequest {
	readonly request: DaemonRequest;
	readonly connection: DaemonConnection;
}

interface AcceptWaiter {
	resolve: (accepted: AcceptedRequest | undefined) => void;
	reject: (error: Error) => void;
}

// =============================================================================
// Listener
// =============================================================================

export class SocketListener {
	private readonly ready: AcceptedRequest[] = [];
	private readonly waiters: AcceptWaiter[] = [];
	private readonly sockets = new Set<Socket>();
	private readonly delivered = new WeakSet<Socket>();
	private nextConnectionId = 0;
	private fatalError: Error | null = null;
	private isClosed = false;
	private readonly removeOnExit = () => this.removeSocketFile();

	private constructor(
		readonly socketPath: string,
		private readonly server: Server,
	) {
		server.on("connection", (socket) => {
			this.handleConnection(socket).catch((error) => {
				log.error(`Connection handler failed: ${errorMessage(error)}`);
				socket.destroy();
			});
		});
		server.on("error", (error) => this.fail(error));
		process.on("exit", this.removeOnExit);
	}

	/**
	 * Bind the socket, replacing any stale file at the path, and restrict it
	 * to the owner before returning.
	 *
	 * @throws if the path cannot be cleared, bound, or restricted
	 */
	static async bind(socketPath: string): Promise<SocketListener> {
		if (existsSync(socketPath)) {
			unlinkSync(socketPath);
			log.info("Removed stale socket file", { socketPath });
		}

		const server = createServer();
		await new Promise<void>((resolve, reject) => {
			const onError = (error: Error) => reject(error);
			server.once("error", onError);
			server.listen(socketPath, () => {
				server.off("error", onError);
				resolve();
			});
		});

		try {
			setSocketPermissions(socketPath);
		} catch (error) {
			server.close();
			if (existsSync(socketPath)) unlinkSync(socketPath);
			throw error;
		}

		log.info("Listening", { socketPath });
		return new SocketListener(socketPath, server);
	}

	get closed(): boolean {
		return this.isClosed;
	}

	/**
	 * Next decoded request, in arrival order. Resolves undefined once the
	 * listener is closed; rejects if the server itself failed.
	 */
	accept(): Promise<AcceptedRequest | undefined> {
		const next = this.ready.shift();
		if (next) return Promise.resolve(next);
		if (this.fatalError) return Promise.reject(this.fatalError);
		if (this.isClosed) return Promise.resolve(undefined);

		return new Promise((resolve, reject) => {
			this.waiters.push({ resolve, reject });
		});
	}

	/**
	 * Stop accepting, drop queued connections, remove the socket file.
	 * Connections already handed out keep their socket until they reply.
	 * Safe to call more than once.
	 */
	close(): void {
		if (this.isClosed) return;
		this.isClosed = true;
		process.off("exit", this.removeOnExit);

		for (const waiter of this.waiters.splice(0)) {
			waiter.resolve(undefined);
		}
		for (const pending of this.ready.splice(0)) {
			pending.connection.close();
		}

		this.server.close();
		for (const socket of this.sockets) {
			// still reading a request
			if (!this.delivered.has(socket)) socket.destroy();
		}
		this.removeSocketFile();
		log.info("Listener closed");
	}

	/** Idempotent. */
	removeSocketFile(): void {
		try {
			if (existsSync(this.socketPath)) unlinkSync(this.socketPath);
		} catch (error) {
			log.warn(`Failed to remove socket file: ${errorMessage(error)}`);
		}
	}

	// ===========================================================================
	// Connection handling
	// ===========================================================================

	private async handleConnection(socket: Socket): Promise<void> {
		if (this.isClosed) {
			socket.destroy();
			return;
		}

		const connectionId = ++this.nextConnectionId;
		this.sockets.add(socket);
		socket.on("close", () => this.sockets.delete(socket));
		socket.on("error", (error) => {
			log.debug(`Connection ${connectionId} socket error: ${error.message}`);
		});
		socket.setTimeout(REQUEST_READ_TIMEOUT_MS, () => {
			log.warn(`Connection ${connectionId} timed out waiting for a request`);
			socket.destroy();
		});

		const connection = new DaemonConnection(connectionId, socket);
		let request: DaemonRequest;
		try {
			const body = await readMessage(socket);
			request = decodeRequest(body);
		} catch (error) {
			if (isProtocolError(error, "CONNECTION_CLOSED")) {
				log.debug(`Connection ${connectionId} closed without a request`);
				socket.destroy();
				return;
			}
			log.warn(
				`Connection ${connectionId} sent an unreadable request: ${errorMessage(error)}`,
			);
			await this.rejectConnection(connection, errorMessage(error));
			return;
		}

		socket.setTimeout(0);
		this.delivered.add(socket);
		log.debug(`Connection ${connectionId} request received`, {
			filename: request.filename,
			inlineBytes: request.inline_payload?.length ?? 0,
		});
		this.deliver({ request, connection });
	}

	private async rejectConnection(
		connection: DaemonConnection,
		message: string,
	): Promise<void> {
		if (!connection.closed) {
			try {
				await connection.sendResponse(errorResponse(message));
			} catch (error) {
				log.debug(
					`Could not answer connection ${connection.id}: ${errorMessage(error)}`,
				);
			}
		}
		connection.close();
	}

	private deliver(accepted: AcceptedRequest): void {
		if (this.isClosed) {
			accepted.connection.close();
			return;
		}
		const waiter = this.waiters.shift();
		if (waiter) {
			waiter.resolve(accepted);
		} else {
			this.ready.push(accepted);
		}
	}

	private fail(error: Error): void {
		log.error(`Listener failed: ${error.message}`);
		this.fatalError = error;
		for (const waiter of this.waiters.splice(0)) {
			waiter.reject(error);
		}
	}
}
