/**
 * Security error codes for image path validation and socket hardening.
 */
export type SecurityErrorCode =
	| "FILE_NOT_FOUND"
	| "PATH_TRAVERSAL"
	| "INVALID_PATH"
	| "NOT_A_FILE"
	| "IO_ERROR";

/**
 * Error thrown when a client-supplied path is rejected.
 * Includes a code for programmatic handling.
 */
export class SecurityError extends Error {
	constructor(
		message: string,
		public readonly code: SecurityErrorCode,
		public readonly path?: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "SecurityError";
	}
}

export function isErrnoException(
	error: unknown,
): error is NodeJS.ErrnoException {
	return error instanceof Error && "code" in error;
}
