import type { z } from "zod/v4";
import { STDIN_SENTINEL } from "shared/constants";
import { ProtocolError } from "./errors";
import {
	type DaemonRequest,
	type DaemonResponse,
	daemonRequestSchema,
	daemonResponseSchema,
	MAX_MESSAGE_SIZE,
} from "./types";

const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Serialize a message body. Throws MESSAGE_TOO_LARGE if the JSON exceeds the cap.
 */
export function encodeMessage(value: DaemonRequest | DaemonResponse): Buffer {
	const body = Buffer.from(JSON.stringify(value), "utf-8");
	if (body.length > MAX_MESSAGE_SIZE) {
		throw ProtocolError.tooLarge(body.length, MAX_MESSAGE_SIZE);
	}
	return body;
}

function decodeJson(bytes: Uint8Array): unknown {
	// Same cap as encode, so an oversized body fails identically on both sides
	if (bytes.length > MAX_MESSAGE_SIZE) {
		throw ProtocolError.tooLarge(bytes.length, MAX_MESSAGE_SIZE);
	}

	let text: string;
	try {
		text = utf8Decoder.decode(bytes);
	} catch (error) {
		throw ProtocolError.invalidEncoding("body is not valid UTF-8", error);
	}

	try {
		return JSON.parse(text);
	} catch (error) {
		const detail = error instanceof Error ? error.message : "malformed JSON";
		throw ProtocolError.invalidEncoding(detail, error);
	}
}

function describeIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => {
			const path = issue.path.join(".");
			return path ? `${path}: ${issue.message}` : issue.message;
		})
		.join("; ");
}

/**
 * Structural decode only. Semantic checks live in validateRequest() so the
 * daemon can report them as a proper error response.
 */
export function decodeRequest(bytes: Uint8Array): DaemonRequest {
	const result = daemonRequestSchema.safeParse(decodeJson(bytes));
	if (!result.success) {
		throw ProtocolError.invalidEncoding(describeIssues(result.error));
	}
	return result.data;
}

export function decodeResponse(bytes: Uint8Array): DaemonResponse {
	const result = daemonResponseSchema.safeParse(decodeJson(bytes));
	if (!result.success) {
		throw ProtocolError.invalidEncoding(describeIssues(result.error));
	}
	return result.data;
}

/**
 * Semantic validation of a decoded request.
 *
 * @throws ProtocolError MISSING_FIELD for an empty filename, or for the stdin
 * sentinel without an inline payload
 */
export function validateRequest(request: DaemonRequest): void {
	if (request.filename.length === 0) {
		throw ProtocolError.missingField("filename");
	}

	if (
		request.filename === STDIN_SENTINEL &&
		request.inline_payload === undefined
	) {
		throw ProtocolError.missingField(
			"inline_payload",
			`inline_payload (required when filename is '${STDIN_SENTINEL}')`,
		);
	}
}
