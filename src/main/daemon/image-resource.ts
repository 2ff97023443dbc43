import { readFileSync } from "node:fs";
import type { DaemonRequest } from "main/lib/daemon-protocol/types";
import { validateImagePath } from "main/lib/security";
import { STDIN_SENTINEL } from "shared/constants";

export type ImageFormat = "png" | "jpeg" | "gif" | "webp" | "bmp";

export interface ImageResource {
	readonly source: "file" | "inline";
	/** Canonical path for file images; "-" for inline ones. */
	readonly path: string;
	readonly data: Buffer;
	readonly format: ImageFormat;
}

export class ImageLoadError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "ImageLoadError";
	}
}

const NON_BASE64_CHAR = /[^A-Za-z0-9+/=]/;

/** Standard alphabet, padded to a multiple of four, `=` only as the last one or two characters. */
function isStrictBase64(payload: string): boolean {
	if (payload.length === 0 || payload.length % 4 !== 0) return false;
	if (NON_BASE64_CHAR.test(payload)) return false;
	const padding = payload.indexOf("=");
	if (padding === -1) return true;
	const tail = payload.length - padding;
	return tail <= 2 && payload.endsWith("=".repeat(tail));
}

const SIGNATURES: ReadonlyArray<{
	format: ImageFormat;
	matches: (data: Buffer) => boolean;
}> = [
	{
		format: "png",
		matches: (data) =>
			data.subarray(0, 8).equals(
				Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]),
			),
	},
	{
		format: "jpeg",
		matches: (data) =>
			data.length >= 3 && data[0] === 0xff && data[1] === 0xd8 && data[2] === 0xff,
	},
	{
		format: "gif",
		matches: (data) => {
			const header = data.subarray(0, 6).toString("latin1");
			return header === "GIF87a" || header === "GIF89a";
		},
	},
	{
		format: "webp",
		matches: (data) =>
			data.subarray(0, 4).toString("latin1") === "RIFF" &&
			data.subarray(8, 12).toString("latin1") === "WEBP",
	},
	{
		format: "bmp",
		matches: (data) => data.subarray(0, 2).toString("latin1") === "BM",
	},
];

export function detectImageFormat(data: Buffer): ImageFormat | undefined {
	return SIGNATURES.find((signature) => signature.matches(data))?.format;
}

function toResource(
	source: ImageResource["source"],
	path: string,
	data: Buffer,
): ImageResource {
	const format = detectImageFormat(data);
	if (!format) {
		throw new ImageLoadError("Couldn't load image: unrecognized image format");
	}
	return { source, path, data, format };
}

/**
 * Decode a base64 inline payload (the stdin transport).
 *
 * @throws ImageLoadError on malformed base64 or non-image bytes
 */
export function decodeInlinePayload(payload: string): ImageResource {
	if (!isStrictBase64(payload)) {
		throw new ImageLoadError("Failed to decode base64 image data");
	}
	return toResource("inline", STDIN_SENTINEL, Buffer.from(payload, "base64"));
}

/** Raw image bytes read from stdin by the cold-start path. */
export function imageFromBytes(data: Buffer): ImageResource {
	return toResource("inline", STDIN_SENTINEL, data);
}

/**
 * Validate a client-supplied path and read the image behind it.
 *
 * @throws SecurityError if the path is rejected
 * @throws ImageLoadError if the file cannot be read or is not an image
 */
export function loadImageFile(path: string): ImageResource {
	const canonical = validateImagePath(path);

	let data: Buffer;
	try {
		data = readFileSync(canonical);
	} catch (error) {
		const detail = error instanceof Error ? error.message : String(error);
		throw new ImageLoadError(`Couldn't load image: ${detail}`, { cause: error });
	}
	return toResource("file", canonical, data);
}

/** Resolve the image a request points at. */
export function loadImageFromRequest(request: DaemonRequest): ImageResource {
	if (request.filename === STDIN_SENTINEL) {
		if (request.inline_payload === undefined) {
			throw new ImageLoadError("No stdin data provided");
		}
		return decodeInlinePayload(request.inline_payload);
	}
	return loadImageFile(request.filename);
}

// 1x1 transparent PNG
const PLACEHOLDER_PNG_BASE64 =
	"iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mNkYPhfDwAChwGA60e6kgAAAABJRU5ErkJggg==";

/** Minimal image backing the pre-warm window. */
export function placeholderImage(): ImageResource {
	return decodeInlinePayload(PLACEHOLDER_PNG_BASE64);
}
