import { env } from "main/env.main";
import type { GlobalConfiguration } from "main/lib/config";
import { HeadlessToolkit } from "./headless";
import type { WindowToolkit } from "./types";
import { ViewerToolkit } from "./viewer";

export { HeadlessToolkit, type HeadlessWindow } from "./headless";
export type { CreateWindowOptions, WindowHandle, WindowToolkit } from "./types";
export { ViewerToolkit } from "./viewer";

/** Toolkit selected by SNAPMARK_TOOLKIT. */
export function createToolkit(globals: GlobalConfiguration): WindowToolkit {
	switch (env.SNAPMARK_TOOLKIT) {
		case "headless":
			return new HeadlessToolkit();
		case "viewer":
			return new ViewerToolkit(globals.viewerCommand);
	}
}
