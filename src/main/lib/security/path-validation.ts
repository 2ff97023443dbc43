import { realpathSync, statSync } from "node:fs";
import { sep } from "node:path";
import { STDIN_SENTINEL } from "shared/constants";
import { isErrnoException, SecurityError } from "./errors";

/**
 * Security model for daemon image paths:
 *
 * Any local process that can reach the socket can ask the daemon to open a
 * path, so the daemon never trusts the spelling it receives. The decision is
 * made on the canonical target: symlinks (including chains) and relative
 * segments are resolved first, and only a regular file is accepted. Symlinks
 * are allowed on purpose; screenshot tools commonly write through them.
 *
 * Socket access itself is guarded by owner-only permissions (see
 * socket-permissions.ts).
 */

/** Upper bound on the raw path, checked before touching the filesystem. */
export const MAX_PATH_LENGTH = 4096;

/**
 * Validate and canonicalize an image path. Sync, simple.
 *
 * @returns The canonical absolute path, or "-" unchanged for stdin
 * @throws SecurityError if the path is rejected
 */
export function validateImagePath(path: string): string {
	if (path.length === 0) {
		throw new SecurityError("Invalid path: empty path", "INVALID_PATH");
	}

	if (path === STDIN_SENTINEL) {
		return path;
	}

	const byteLength = Buffer.byteLength(path, "utf-8");
	if (byteLength > MAX_PATH_LENGTH) {
		throw new SecurityError(
			`Invalid path: path too long: ${byteLength} bytes (max ${MAX_PATH_LENGTH})`,
			"INVALID_PATH",
		);
	}

	let canonical: string;
	try {
		canonical = realpathSync(path);
	} catch (error) {
		if (isErrnoException(error) && error.code === "ENOENT") {
			throw new SecurityError(`File not found: ${path}`, "FILE_NOT_FOUND", path);
		}
		throw toIoError(error, path);
	}

	// realpath never returns ".." segments; checked anyway in case that changes
	if (canonical.split(sep).includes("..")) {
		throw new SecurityError(
			`Path traversal detected: ${path}`,
			"PATH_TRAVERSAL",
			path,
		);
	}

	let isFile: boolean;
	try {
		isFile = statSync(canonical).isFile();
	} catch (error) {
		throw toIoError(error, canonical);
	}
	if (!isFile) {
		throw new SecurityError(
			`Path is not a file: ${canonical}`,
			"NOT_A_FILE",
			canonical,
		);
	}

	return canonical;
}

function toIoError(error: unknown, path: string): SecurityError {
	const detail = error instanceof Error ? error.message : String(error);
	return new SecurityError(`IO error: ${detail}`, "IO_ERROR", path, {
		cause: error,
	});
}
