/**
 * Channels between the connection handlers (async I/O side) and the window
 * session manager (GUI side).
 *
 * Connection handlers push `(request, reply)` pairs onto one shared request
 * channel. The GUI side drains it without ever waiting, and answers through
 * the private reply channel that travelled with the request.
 */
import type {
	DaemonRequest,
	DaemonResponse,
} from "main/lib/daemon-protocol/types";

export class ChannelClosedError extends Error {
	constructor(message = "Channel closed") {
		super(message);
		this.name = "ChannelClosedError";
	}
}

// =============================================================================
// Reply channel (one-shot, one per connection)
// =============================================================================

export interface ReplySender {
	/** Deliver the response. Returns false if the receiver is gone or a reply was already sent. */
	send(response: DaemonResponse): boolean;
	/** Drop the sender without replying; the receiver rejects. */
	close(): void;
	readonly closed: boolean;
}

export interface ReplyReceiver {
	/** Resolves with the single reply, or rejects with ChannelClosedError. */
	receive(): Promise<DaemonResponse>;
	/** Stop listening. Later sends return false. */
	close(): void;
}

export function createReplyChannel(): {
	sender: ReplySender;
	receiver: ReplyReceiver;
} {
	let settled = false;
	let receiverGone = false;
	let resolveReply: (response: DaemonResponse) => void = () => {};
	let rejectReply: (error: Error) => void = () => {};
	const reply = new Promise<DaemonResponse>((resolve, reject) => {
		resolveReply = resolve;
		rejectReply = reject;
	});
	// a receiver that never awaits must not surface an unhandled rejection
	reply.catch(() => undefined);

	const sender: ReplySender = {
		send(response) {
			if (settled || receiverGone) return false;
			settled = true;
			resolveReply(response);
			return true;
		},
		close() {
			if (settled) return;
			settled = true;
			rejectReply(new ChannelClosedError("Reply sender dropped"));
		},
		get closed() {
			return settled || receiverGone;
		},
	};

	const receiver: ReplyReceiver = {
		receive: () => reply,
		close() {
			receiverGone = true;
			if (!settled) {
				settled = true;
				rejectReply(new ChannelClosedError("Reply receiver closed"));
			}
		},
	};

	return { sender, receiver };
}

// =============================================================================
// Request channel (many producers, one consumer)
// =============================================================================

export interface PendingRequest {
	readonly request: DaemonRequest;
	readonly reply: ReplySender;
}

export class RequestChannel {
	private readonly queue: PendingRequest[] = [];
	private isClosed = false;

	get closed(): boolean {
		return this.isClosed;
	}

	get size(): number {
		return this.queue.length;
	}

	/** Enqueue in FIFO order. Returns false once the consumer has closed the channel. */
	send(item: PendingRequest): boolean {
		if (this.isClosed) return false;
		this.queue.push(item);
		return true;
	}

	/** Never waits. */
	tryReceive(): PendingRequest | undefined {
		return this.queue.shift();
	}

	/**
	 * Close the consumer side. Requests still queued lose their GUI-side
	 * producer; their reply senders are dropped.
	 */
	close(): void {
		if (this.isClosed) return;
		this.isClosed = true;
		for (const pending of this.queue.splice(0)) {
			pending.reply.close();
		}
	}
}
