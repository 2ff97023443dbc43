import type { WindowHandle } from "./types";

/** Close-notification bookkeeping shared by the toolkit adapters. */
export class ToolkitWindowHandle implements WindowHandle {
	private listeners: Array<() => void> = [];
	private isClosed = false;

	constructor(readonly id: string) {}

	get closed(): boolean {
		return this.isClosed;
	}

	onClosed(listener: () => void): void {
		if (this.isClosed) {
			listener();
			return;
		}
		this.listeners.push(listener);
	}

	/** Idempotent. */
	markClosed(): void {
		if (this.isClosed) return;
		this.isClosed = true;
		const listeners = this.listeners;
		this.listeners = [];
		for (const listener of listeners) {
			listener();
		}
	}
}
