export {
	DaemonClient,
	type DaemonClientOptions,
	DEFAULT_CONNECT_TIMEOUT_MS,
	DEFAULT_READ_TIMEOUT_MS,
	DEFAULT_WRITE_TIMEOUT_MS,
	isDaemonRunning,
} from "./client";
export { DaemonClientError, type DaemonClientErrorCode } from "./errors";
