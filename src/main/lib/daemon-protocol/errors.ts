/**
 * Protocol error codes for framing and message validation failures.
 */
export type ProtocolErrorCode =
	| "MESSAGE_TOO_LARGE"
	| "INVALID_ENCODING"
	| "MISSING_FIELD"
	| "CONNECTION_CLOSED"
	| "IO_ERROR";

/**
 * Error thrown by the wire codec and the length-prefixed framing.
 * Includes a code for programmatic handling.
 */
export class ProtocolError extends Error {
	readonly code: ProtocolErrorCode;
	/** Offending field for MISSING_FIELD. */
	readonly field?: string;
	/** Offending byte length for MESSAGE_TOO_LARGE. */
	readonly size?: number;

	constructor(
		code: ProtocolErrorCode,
		message: string,
		details: { field?: string; size?: number; cause?: unknown } = {},
	) {
		super(message, { cause: details.cause });
		this.name = "ProtocolError";
		this.code = code;
		this.field = details.field;
		this.size = details.size;
	}

	static tooLarge(size: number, max: number): ProtocolError {
		return new ProtocolError(
			"MESSAGE_TOO_LARGE",
			`Message too large: ${size} bytes (max ${max})`,
			{ size },
		);
	}

	static missingField(field: string, detail?: string): ProtocolError {
		return new ProtocolError(
			"MISSING_FIELD",
			`Missing required field: ${detail ?? field}`,
			{ field },
		);
	}

	static invalidEncoding(detail: string, cause?: unknown): ProtocolError {
		return new ProtocolError("INVALID_ENCODING", `Invalid encoding: ${detail}`, {
			cause,
		});
	}

	static connectionClosed(): ProtocolError {
		return new ProtocolError("CONNECTION_CLOSED", "Connection closed");
	}

	static io(cause: unknown): ProtocolError {
		const detail = cause instanceof Error ? cause.message : String(cause);
		return new ProtocolError("IO_ERROR", `IO error: ${detail}`, { cause });
	}
}

export function isProtocolError(
	error: unknown,
	code?: ProtocolErrorCode,
): error is ProtocolError {
	return (
		error instanceof ProtocolError && (code === undefined || error.code === code)
	);
}
