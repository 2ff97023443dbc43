import type { WindowConfiguration } from "main/lib/config";
import type { ImageResource } from "main/daemon/image-resource";
import type { CreateWindowOptions, WindowHandle, WindowToolkit } from "./types";
import { ToolkitWindowHandle } from "./window-handle";

export interface HeadlessWindow {
	readonly handle: ToolkitWindowHandle;
	readonly resource: ImageResource;
	readonly configuration: WindowConfiguration;
	readonly visible: boolean;
	realized: boolean;
	presented: boolean;
}

/**
 * Toolkit without a display. Windows are records; realization happens as
 * queued events drained by `pump()`. Used by tests and by servers without a
 * graphical session.
 */
export class HeadlessToolkit implements WindowToolkit {
	readonly name = "headless";
	private readonly windows = new Map<string, HeadlessWindow>();
	private readonly pendingEvents: Array<() => void> = [];
	private nextWindowId = 0;
	private quitRequested = false;

	get hasQuit(): boolean {
		return this.quitRequested;
	}

	createWindow(
		resource: ImageResource,
		configuration: WindowConfiguration,
		options: CreateWindowOptions,
	): WindowHandle {
		this.nextWindowId += 1;
		const record: HeadlessWindow = {
			handle: new ToolkitWindowHandle(`headless-${this.nextWindowId}`),
			resource,
			configuration,
			visible: options.visible,
			realized: false,
			presented: false,
		};
		this.windows.set(record.handle.id, record);
		this.pendingEvents.push(() => {
			record.realized = true;
		});
		return record.handle;
	}

	present(handle: WindowHandle): void {
		const record = this.windows.get(handle.id);
		if (!record || record.handle.closed) return;
		record.realized = true;
		record.presented = record.visible;
	}

	close(handle: WindowHandle): void {
		const record = this.windows.get(handle.id);
		if (!record) return;
		this.windows.delete(handle.id);
		record.handle.markClosed();
	}

	pump(): boolean {
		const event = this.pendingEvents.shift();
		event?.();
		return this.pendingEvents.length > 0;
	}

	quit(): void {
		this.quitRequested = true;
	}

	/** Windows not yet closed, in creation order. */
	openWindows(): HeadlessWindow[] {
		return [...this.windows.values()];
	}

	/** Close a window as if the user dismissed it. */
	dismiss(handleId: string): void {
		const record = this.windows.get(handleId);
		if (record) this.close(record.handle);
	}
}
