import type { WindowConfiguration } from "main/lib/config";
import type { ImageResource } from "main/daemon/image-resource";

export interface WindowHandle {
	readonly id: string;
	readonly closed: boolean;
	/** Fires once, when the user or the toolkit closes the window. */
	onClosed(listener: () => void): void;
}

export interface CreateWindowOptions {
	/** Hidden windows are realized but never shown (pre-warm). */
	visible: boolean;
}

/**
 * The GUI toolkit boundary. All calls happen on the GUI side of the bridge.
 */
export interface WindowToolkit {
	readonly name: string;
	createWindow(
		resource: ImageResource,
		configuration: WindowConfiguration,
		options: CreateWindowOptions,
	): WindowHandle;
	present(handle: WindowHandle): void;
	close(handle: WindowHandle): void;
	/** Process one pending toolkit event. Returns true while more are queued. */
	pump(): boolean;
	quit(): void;
}
