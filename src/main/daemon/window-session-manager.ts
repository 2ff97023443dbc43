/**
 * GUI-side consumer of the request channel.
 *
 * Runs entirely on timer ticks: each tick takes at most `batchSize` pending
 * requests without waiting, answers each one through its private reply
 * channel, and schedules window construction after the reply is sent.
 * The window id counter and the session table live here and nowhere else.
 */
import {
	defaultWindowConfiguration,
	deriveWindowConfiguration,
	type GlobalConfiguration,
	type WindowConfiguration,
} from "main/lib/config";
import { validateRequest } from "main/lib/daemon-protocol/codec";
import { errorResponse, okResponse } from "main/lib/daemon-protocol/types";
import { createLogger, errorMessage } from "main/lib/logger";
import type { WindowToolkit } from "main/toolkit";
import type { PendingRequest, RequestChannel } from "./bridge";
import {
	type ImageResource,
	loadImageFromRequest,
	placeholderImage,
} from "./image-resource";
import { WindowSession } from "./window-session";

const log = createLogger("window-manager");

export const DEFAULT_DRAIN_INTERVAL_MS = 10;
export const DEFAULT_DRAIN_BATCH_SIZE = 1;

/** Upper bound on event-loop pumps while pre-warming. */
const MAX_PREWARM_PUMPS = 1000;

export interface WindowSessionManagerOptions {
	toolkit: WindowToolkit;
	globals: GlobalConfiguration;
	requests: RequestChannel;
	drainIntervalMs?: number;
	batchSize?: number;
}

export class WindowSessionManager {
	private readonly toolkit: WindowToolkit;
	private readonly globals: GlobalConfiguration;
	private readonly requests: RequestChannel;
	private readonly drainIntervalMs: number;
	private readonly batchSize: number;
	private readonly sessions = new Map<number, WindowSession>();
	private lastWindowId = 0;
	private timer: ReturnType<typeof setInterval> | null = null;
	private stopped = false;

	constructor(options: WindowSessionManagerOptions) {
		this.toolkit = options.toolkit;
		this.globals = options.globals;
		this.requests = options.requests;
		this.drainIntervalMs = options.drainIntervalMs ?? DEFAULT_DRAIN_INTERVAL_MS;
		this.batchSize = options.batchSize ?? DEFAULT_DRAIN_BATCH_SIZE;
	}

	get openSessionCount(): number {
		return this.sessions.size;
	}

	get lastIssuedWindowId(): number {
		return this.lastWindowId;
	}

	getSession(windowId: number): WindowSession | undefined {
		return this.sessions.get(windowId);
	}

	// ===========================================================================
	// Lifecycle
	// ===========================================================================

	/**
	 * Build one hidden window from a placeholder image, let the toolkit settle,
	 * and throw it away.
	 */
	prewarm(): void {
		const started = Date.now();
		const handle = this.toolkit.createWindow(
			placeholderImage(),
			defaultWindowConfiguration(),
			{ visible: false },
		);
		this.toolkit.present(handle);

		let pumps = 0;
		while (pumps < MAX_PREWARM_PUMPS && this.toolkit.pump()) {
			pumps++;
		}
		this.toolkit.close(handle);
		log.debug("Pre-warm complete", { pumps, elapsedMs: Date.now() - started });
	}

	start(): void {
		if (this.timer || this.stopped) return;
		this.timer = setInterval(() => this.tick(), this.drainIntervalMs);
	}

	/**
	 * Stop draining and close the request channel. Requests still queued get
	 * their reply senders dropped. Open windows stay open.
	 */
	shutdown(): void {
		if (this.stopped) return;
		this.stopped = true;
		if (this.timer) {
			clearInterval(this.timer);
			this.timer = null;
		}
		this.requests.close();
		this.toolkit.quit();
		log.info("Window session manager stopped", {
			openWindows: this.sessions.size,
		});
	}

	// ===========================================================================
	// Drain
	// ===========================================================================

	/** Process up to `batchSize` pending requests. Returns how many were taken. */
	tick(): number {
		let processed = 0;
		while (processed < this.batchSize) {
			const pending = this.requests.tryReceive();
			if (!pending) break;
			this.process(pending);
			processed++;
		}
		this.toolkit.pump();
		return processed;
	}

	private process({ request, reply }: PendingRequest): void {
		let resource: ImageResource;
		let configuration: WindowConfiguration;
		try {
			validateRequest(request);
			resource = loadImageFromRequest(request);
			configuration = deriveWindowConfiguration(this.globals, request);
		} catch (error) {
			const message = errorMessage(error);
			log.warn(`Rejected request: ${message}`, { filename: request.filename });
			if (!reply.send(errorResponse(message))) {
				log.debug("Client left before the error reply");
			}
			return;
		}

		const windowId = ++this.lastWindowId;
		if (!reply.send(okResponse(windowId))) {
			log.debug("Client left before the reply", { windowId });
		}
		log.info("Opening window", {
			windowId,
			filename: request.filename,
			bytes: resource.data.length,
		});

		setImmediate(() => this.openSession(windowId, resource, configuration));
	}

	private openSession(
		windowId: number,
		resource: ImageResource,
		configuration: WindowConfiguration,
	): void {
		const session = new WindowSession(windowId, resource, configuration);
		this.sessions.set(windowId, session);
		try {
			session.open(this.toolkit, (closed) => {
				this.sessions.delete(closed.windowId);
				log.debug("Window closed", { windowId: closed.windowId });
			});
		} catch (error) {
			this.sessions.delete(windowId);
			log.error(`Failed to open window ${windowId}: ${errorMessage(error)}`);
		}
	}
}
