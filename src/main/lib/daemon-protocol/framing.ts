/**
 * Length-prefixed framing over a byte stream.
 *
 * Frame layout: u32 little-endian body length, then exactly that many bytes.
 * A frame is handed to the stream in a single write, so a rejected frame
 * never leaves a dangling prefix on the wire.
 */

import type { Readable, Writable } from "node:stream";
import { ProtocolError } from "./errors";
import { LENGTH_PREFIX_SIZE, MAX_MESSAGE_SIZE } from "./types";

// =============================================================================
// Writing
// =============================================================================

export function encodeFrame(body: Uint8Array): Buffer {
	if (body.length > MAX_MESSAGE_SIZE) {
		throw ProtocolError.tooLarge(body.length, MAX_MESSAGE_SIZE);
	}
	const prefix = Buffer.alloc(LENGTH_PREFIX_SIZE);
	prefix.writeUInt32LE(body.length, 0);
	return Buffer.concat([prefix, body]);
}

/**
 * Write one frame and resolve once the stream has flushed it.
 * Oversized bodies are rejected before anything is written.
 */
export async function writeMessage(
	writer: Writable,
	body: Uint8Array,
): Promise<void> {
	const frame = encodeFrame(body);

	await new Promise<void>((resolve, reject) => {
		writer.write(frame, (error) => {
			if (error) {
				reject(ProtocolError.io(error));
			} else {
				resolve();
			}
		});
	});
}

// =============================================================================
// Reading
// =============================================================================

/**
 * Pull-style reader over a Readable. Buffers incoming chunks and hands out
 * exact-size slices; short reads simply wait for more data.
 */
class StreamReader {
	private chunks: Buffer[] = [];
	private buffered = 0;
	private ended = false;
	private failure: Error | null = null;
	private wake: (() => void) | null = null;

	constructor(private readonly stream: Readable) {
		stream.on("data", this.onData);
		stream.on("end", this.onEnd);
		stream.on("close", this.onEnd);
		stream.on("error", this.onError);
		// a previous reader may have paused the stream on release
		stream.resume();
	}

	private onData = (chunk: Buffer | string) => {
		const buffer = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
		this.chunks.push(buffer);
		this.buffered += buffer.length;
		this.notify();
	};

	private onEnd = () => {
		this.ended = true;
		this.notify();
	};

	private onError = (error: Error) => {
		this.failure = error;
		this.notify();
	};

	private notify(): void {
		const wake = this.wake;
		this.wake = null;
		wake?.();
	}

	/**
	 * Read exactly `size` bytes. At end of stream the result may be shorter;
	 * callers compare lengths to detect a truncated frame.
	 */
	async readExact(size: number): Promise<Buffer> {
		while (this.buffered < size && !this.ended && !this.failure) {
			await new Promise<void>((resolve) => {
				this.wake = resolve;
			});
		}

		if (this.failure && this.buffered < size) {
			throw ProtocolError.io(this.failure);
		}

		const available = Math.min(size, this.buffered);
		const all = Buffer.concat(this.chunks, this.buffered);
		const result = all.subarray(0, available);
		const rest = all.subarray(available);
		this.chunks = rest.length > 0 ? [rest] : [];
		this.buffered = rest.length;
		return result;
	}

	/** Detach from the stream, returning unread bytes to it. */
	release(): void {
		this.stream.off("data", this.onData);
		this.stream.off("end", this.onEnd);
		this.stream.off("close", this.onEnd);
		this.stream.off("error", this.onError);

		if (this.stream.destroyed || this.ended) return;
		this.stream.pause();
		if (this.buffered > 0) {
			this.stream.unshift(Buffer.concat(this.chunks, this.buffered));
			this.chunks = [];
			this.buffered = 0;
		}
	}
}

/**
 * Read one frame body.
 *
 * @throws ProtocolError CONNECTION_CLOSED if the stream ends before a full
 * length prefix arrives, MESSAGE_TOO_LARGE if the declared length exceeds the
 * cap (the body is not read), IO_ERROR on stream errors or a truncated body
 */
export async function readMessage(reader: Readable): Promise<Buffer> {
	const streamReader = new StreamReader(reader);

	try {
		const prefix = await streamReader.readExact(LENGTH_PREFIX_SIZE);
		if (prefix.length < LENGTH_PREFIX_SIZE) {
			throw ProtocolError.connectionClosed();
		}

		const length = prefix.readUInt32LE(0);
		if (length > MAX_MESSAGE_SIZE) {
			throw ProtocolError.tooLarge(length, MAX_MESSAGE_SIZE);
		}

		const body = await streamReader.readExact(length);
		if (body.length < length) {
			throw ProtocolError.io(
				new Error(
					`unexpected end of stream: got ${body.length} of ${length} bytes`,
				),
			);
		}
		return body;
	} finally {
		streamReader.release();
	}
}
