import type { WindowConfiguration } from "main/lib/config";
import type { WindowToolkit } from "main/toolkit";
import type { ImageResource } from "./image-resource";

/**
 * One annotation window. Owns its resource and its configuration; closing it
 * touches nothing else.
 */
export class WindowSession {
	constructor(
		readonly windowId: number,
		readonly resource: ImageResource,
		readonly configuration: WindowConfiguration,
	) {}

	open(toolkit: WindowToolkit, onClosed: (session: WindowSession) => void): void {
		const handle = toolkit.createWindow(this.resource, this.configuration, {
			visible: true,
		});
		handle.onClosed(() => onClosed(this));
		toolkit.present(handle);
	}
}
