import {
	type ImageResource,
	imageFromBytes,
	loadImageFile,
} from "main/daemon/image-resource";
import {
	type GlobalConfiguration,
	windowConfigurationFromGlobals,
} from "main/lib/config";
import { createLogger } from "main/lib/logger";
import type { WindowToolkit } from "main/toolkit";
import { STDIN_SENTINEL } from "shared/constants";

const log = createLogger("cli");

const PUMP_INTERVAL_MS = 10;

export interface RunDirectOptions {
	toolkit: WindowToolkit;
	globals: GlobalConfiguration;
	filename: string;
	/** Image bytes when filename is "-". */
	stdinData?: Buffer;
}

function loadResource(filename: string, stdinData?: Buffer): ImageResource {
	if (filename === STDIN_SENTINEL) {
		return imageFromBytes(stdinData ?? Buffer.alloc(0));
	}
	return loadImageFile(filename);
}

/**
 * Cold start: open one window in this process and resolve once it closes.
 *
 * @throws SecurityError or ImageLoadError if the image cannot be opened
 */
export async function runDirect(options: RunDirectOptions): Promise<void> {
	const { toolkit, globals, filename } = options;
	const resource = loadResource(filename, options.stdinData);
	const configuration = windowConfigurationFromGlobals(globals, filename);

	const handle = toolkit.createWindow(resource, configuration, {
		visible: true,
	});
	toolkit.present(handle);
	log.debug("Window opened without daemon", { filename });

	await new Promise<void>((resolve) => {
		const pump = setInterval(() => toolkit.pump(), PUMP_INTERVAL_MS);
		handle.onClosed(() => {
			clearInterval(pump);
			resolve();
		});
	});
	toolkit.quit();
}
