import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { createServer, type Server, type Socket } from "node:net";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { decodeRequest, encodeMessage } from "main/lib/daemon-protocol/codec";
import { readMessage, writeMessage } from "main/lib/daemon-protocol/framing";
import {
	type DaemonRequest,
	errorResponse,
	okResponse,
} from "main/lib/daemon-protocol/types";
import { DaemonClient, isDaemonRunning } from "./client";
import { DaemonClientError } from "./errors";

type Responder = (socket: Socket) => Promise<void> | void;
type Send = (request: DaemonRequest) => Promise<number>;

const SENDERS: Array<[string, (client: DaemonClient) => Send]> = [
	["sendRequest", (client) => (request) => client.sendRequest(request)],
	["sendRequestAsync", (client) => (request) => client.sendRequestAsync(request)],
];

async function captureError(promise: Promise<unknown>): Promise<DaemonClientError> {
	try {
		await promise;
	} catch (error) {
		if (error instanceof DaemonClientError) return error;
		throw error;
	}
	throw new Error("expected a DaemonClientError");
}

describe("daemon client", () => {
	let dir: string;
	let socketPath: string;
	let server: Server | null = null;
	const sockets = new Set<Socket>();

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), "snapmark-client-"));
		socketPath = join(dir, "daemon.sock");
	});

	afterEach(async () => {
		for (const socket of sockets) socket.destroy();
		sockets.clear();
		const current = server;
		server = null;
		if (current) {
			await new Promise<void>((resolve) => current.close(() => resolve()));
		}
		rmSync(dir, { recursive: true, force: true });
	});

	async function serve(responder: Responder): Promise<void> {
		const created = createServer((socket) => {
			sockets.add(socket);
			socket.on("error", () => undefined);
			Promise.resolve(responder(socket)).catch(() => socket.destroy());
		});
		server = created;
		await new Promise<void>((resolve) => created.listen(socketPath, resolve));
	}

	/** Reads the request and answers with a window id derived from its filename. */
	const echoWindowId: Responder = async (socket) => {
		const request = decodeRequest(await readMessage(socket));
		const windowId = Number.parseInt(request.filename.replace(/\D/g, ""), 10);
		await writeMessage(socket, encodeMessage(okResponse(windowId)));
		socket.end();
	};

	describe("isDaemonRunning", () => {
		it("is false when no socket file exists", async () => {
			expect(await isDaemonRunning(socketPath)).toBe(false);
		});

		it("is false for a leftover file nobody listens on", async () => {
			writeFileSync(socketPath, "");
			expect(await isDaemonRunning(socketPath)).toBe(false);
		});

		it("is true while a server accepts connections", async () => {
			await serve((socket) => {
				socket.end();
			});
			expect(await isDaemonRunning(socketPath)).toBe(true);
		});
	});

	describe.each(SENDERS)("%s", (_name, pick) => {
		it("returns the window id from an ok response", async () => {
			await serve(echoWindowId);
			const send = pick(new DaemonClient({ socketPath }));
			expect(await send({ filename: "/tmp/42.png" })).toBe(42);
		});

		it("surfaces an error response as DAEMON_ERROR", async () => {
			await serve(async (socket) => {
				await readMessage(socket);
				await writeMessage(socket, encodeMessage(errorResponse("File not found: /x")));
				socket.end();
			});
			const send = pick(new DaemonClient({ socketPath }));
			const error = await captureError(send({ filename: "/x" }));
			expect(error.code).toBe("DAEMON_ERROR");
			expect(error.message).toBe("File not found: /x");
			expect(error.isTransportFailure).toBe(false);
		});

		it("fails with CONNECT_FAILED when nothing listens", async () => {
			const send = pick(new DaemonClient({ socketPath }));
			const error = await captureError(send({ filename: "/tmp/a.png" }));
			expect(error.code).toBe("CONNECT_FAILED");
			expect(error.isTransportFailure).toBe(true);
		});

		it("fails with READ_TIMEOUT when the daemon never answers", async () => {
			await serve(() => undefined);
			const send = pick(new DaemonClient({ socketPath, readTimeoutMs: 50 }));
			const error = await captureError(send({ filename: "/tmp/a.png" }));
			expect(error.code).toBe("READ_TIMEOUT");
		});

		it("fails with PROTOCOL_ERROR when the daemon hangs up without answering", async () => {
			await serve(async (socket) => {
				await readMessage(socket);
				socket.end();
			});
			const send = pick(new DaemonClient({ socketPath }));
			const error = await captureError(send({ filename: "/tmp/a.png" }));
			expect(error.code).toBe("PROTOCOL_ERROR");
			expect(error.message).toBe("Connection closed");
		});
	});

	it("keeps concurrent responses with their own requests", async () => {
		await serve(echoWindowId);
		const client = new DaemonClient({ socketPath });
		const ids = await Promise.all(
			Array.from({ length: 20 }, (_, index) =>
				client.sendRequestAsync({ filename: `/tmp/${index + 1}.png` }),
			),
		);
		expect(ids).toEqual(Array.from({ length: 20 }, (_, index) => index + 1));
	});
});
