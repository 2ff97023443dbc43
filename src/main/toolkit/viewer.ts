import { type ChildProcess, spawn } from "node:child_process";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { ImageResource } from "main/daemon/image-resource";
import { SENSITIVE_FILE_MODE } from "main/lib/app-environment";
import type { WindowConfiguration } from "main/lib/config";
import { createLogger, errorMessage } from "main/lib/logger";
import { APP_NAME } from "shared/constants";
import type { CreateWindowOptions, WindowHandle, WindowToolkit } from "./types";
import { ToolkitWindowHandle } from "./window-handle";

const log = createLogger("viewer");

/** Environment variable carrying the window configuration as JSON. */
export const WINDOW_CONFIG_ENV = "SNAPMARK_WINDOW_CONFIG";

interface ViewerWindow {
	readonly handle: ToolkitWindowHandle;
	readonly resource: ImageResource;
	readonly configuration: WindowConfiguration;
	readonly visible: boolean;
	child?: ChildProcess;
	tempDir?: string;
}

export function splitCommand(command: string): string[] {
	return command.trim().split(/\s+/).filter(Boolean);
}

/** Environment handed to a viewer process: ours plus the window configuration. */
export function viewerEnvironment(
	configuration: WindowConfiguration,
): NodeJS.ProcessEnv {
	return {
		...process.env,
		[WINDOW_CONFIG_ENV]: JSON.stringify(configuration),
	};
}

/**
 * Opens each window as an external viewer process. The window closes when
 * that process exits. Hidden windows never spawn anything.
 */
export class ViewerToolkit implements WindowToolkit {
	readonly name = "viewer";
	private readonly windows = new Map<string, ViewerWindow>();
	private nextWindowId = 0;

	constructor(private readonly viewerCommand: string) {}

	createWindow(
		resource: ImageResource,
		configuration: WindowConfiguration,
		options: CreateWindowOptions,
	): WindowHandle {
		this.nextWindowId += 1;
		const window: ViewerWindow = {
			handle: new ToolkitWindowHandle(`viewer-${this.nextWindowId}`),
			resource,
			configuration,
			visible: options.visible,
		};
		this.windows.set(window.handle.id, window);
		return window.handle;
	}

	present(handle: WindowHandle): void {
		const window = this.windows.get(handle.id);
		if (!window || !window.visible || window.child) return;

		const [command, ...args] = splitCommand(this.viewerCommand);
		if (!command) {
			log.error("viewer-command is empty; closing window", { id: handle.id });
			this.finish(window);
			return;
		}

		let imagePath: string;
		try {
			imagePath = this.imagePathFor(window);
		} catch (error) {
			log.error(`Failed to stage inline image: ${errorMessage(error)}`);
			this.finish(window);
			return;
		}

		const child = spawn(command, [...args, imagePath], {
			stdio: "ignore",
			env: viewerEnvironment(window.configuration),
		});
		window.child = child;

		child.on("error", (error) => {
			log.error(`Failed to start viewer "${command}": ${error.message}`);
			this.finish(window);
		});
		child.on("exit", (code, signal) => {
			log.debug("Viewer exited", { id: handle.id, code, signal });
			this.finish(window);
		});
	}

	close(handle: WindowHandle): void {
		const window = this.windows.get(handle.id);
		if (!window) return;
		if (window.child && window.child.exitCode === null) {
			// exit handler finishes the window
			window.child.kill("SIGTERM");
			return;
		}
		this.finish(window);
	}

	pump(): boolean {
		return false;
	}

	quit(): void {
		// Viewer processes are independent; open windows outlive the daemon.
	}

	private imagePathFor(window: ViewerWindow): string {
		if (window.resource.source === "file") return window.resource.path;

		const dir = mkdtempSync(join(tmpdir(), `${APP_NAME}-`));
		window.tempDir = dir;
		const path = join(dir, `inline.${window.resource.format}`);
		writeFileSync(path, window.resource.data, { mode: SENSITIVE_FILE_MODE });
		return path;
	}

	private finish(window: ViewerWindow): void {
		if (!this.windows.delete(window.handle.id)) return;
		if (window.tempDir) {
			try {
				rmSync(window.tempDir, { recursive: true, force: true });
			} catch (error) {
				log.warn(`Failed to remove ${window.tempDir}: ${errorMessage(error)}`);
			}
		}
		window.handle.markClosed();
	}
}
