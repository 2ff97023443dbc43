import { chmodSync } from "node:fs";
import { SOCKET_FILE_MODE } from "main/lib/app-environment";
import { SecurityError } from "./errors";

/**
 * Restrict a freshly bound socket to its owner (0600). Overwrites whatever
 * mode the umask produced. Must run before the listener accepts anything.
 */
export function setSocketPermissions(socketPath: string): void {
	try {
		chmodSync(socketPath, SOCKET_FILE_MODE);
	} catch (error) {
		const detail = error instanceof Error ? error.message : String(error);
		throw new SecurityError(
			`IO error: failed to restrict socket permissions: ${detail}`,
			"IO_ERROR",
			socketPath,
			{ cause: error },
		);
	}
}
