import { homedir, tmpdir, userInfo } from "node:os";
import { join } from "node:path";
import { env } from "main/env.main";
import {
	APP_CONFIG_DIR_NAME,
	APP_NAME,
	CONFIG_FILE_NAME,
} from "shared/constants";

export const SOCKET_FILE_MODE = 0o600;
export const SENSITIVE_FILE_MODE = 0o600;

function effectiveUserId(): number {
	// process.getuid is absent on Windows; userInfo() still reports -1 there
	return process.getuid?.() ?? userInfo().uid;
}

/**
 * Socket path for the current user. One fixed path per effective uid, so two
 * users on the same machine never talk to each other's daemon.
 */
export function getSocketPath(): string {
	if (env.SNAPMARK_SOCKET_PATH) return env.SNAPMARK_SOCKET_PATH;
	return join(tmpdir(), `${APP_NAME}-${effectiveUserId()}.sock`);
}

export function getConfigPath(): string {
	if (env.SNAPMARK_CONFIG_PATH) return env.SNAPMARK_CONFIG_PATH;
	const configHome =
		process.env.XDG_CONFIG_HOME || join(homedir(), ".config");
	return join(configHome, APP_CONFIG_DIR_NAME, CONFIG_FILE_NAME);
}
