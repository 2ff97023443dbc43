/**
 * Daemon wire types.
 *
 * Requests and responses are JSON objects with snake_case keys. Unknown keys
 * are dropped on decode so older daemons keep working with newer clients.
 */
import { z } from "zod/v4";

/** 16 MiB. Large enough for a base64-encoded screenshot read from stdin. */
export const MAX_MESSAGE_SIZE = 16 * 1024 * 1024;

/** Little-endian u32 length prefix. */
export const LENGTH_PREFIX_SIZE = 4;

export const daemonRequestSchema = z.object({
	/** Image path, or "-" when the image travels in `inline_payload`. */
	filename: z.string(),
	output_filename: z.string().optional(),
	copy_command: z.string().optional(),
	initial_tool: z.string().optional(),
	fullscreen: z.boolean().optional(),
	early_exit: z.boolean().optional(),
	corner_roundness: z.number().nonnegative().optional(),
	annotation_size_factor: z.number().positive().optional(),
	default_hide_toolbars: z.boolean().optional(),
	no_window_decoration: z.boolean().optional(),
	/** Base64 image bytes. Only meaningful when filename is "-". */
	inline_payload: z.string().optional(),
});

export type DaemonRequest = z.infer<typeof daemonRequestSchema>;

export const daemonResponseSchema = z.discriminatedUnion("status", [
	z.object({
		status: z.literal("ok"),
		window_id: z.number().int().nonnegative(),
	}),
	z.object({
		status: z.literal("error"),
		message: z.string(),
	}),
]);

export type DaemonResponse = z.infer<typeof daemonResponseSchema>;
export type DaemonOkResponse = Extract<DaemonResponse, { status: "ok" }>;
export type DaemonErrorResponse = Extract<DaemonResponse, { status: "error" }>;

export function okResponse(windowId: number): DaemonOkResponse {
	return { status: "ok", window_id: windowId };
}

export function errorResponse(message: string): DaemonErrorResponse {
	return { status: "error", message };
}
