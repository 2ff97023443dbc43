import type { DaemonRequest } from "main/lib/daemon-protocol/types";
import {
	ANNOTATION_TOOLS,
	type AnnotationTool,
	type Highlighter,
	type WindowAction,
} from "shared/constants";
import {
	type ColorPalette,
	DEFAULT_CONFIGURATION,
	deepFreeze,
	type FontConfiguration,
	type GlobalConfiguration,
} from "./configuration";

/**
 * Fully resolved configuration for one annotation window.
 * Each window owns its own frozen copy; nothing is shared between windows.
 */
export interface WindowConfiguration {
	readonly inputFilename: string;
	readonly outputFilename?: string;
	readonly copyCommand?: string;
	readonly initialTool: AnnotationTool;
	readonly fullscreen: boolean;
	readonly earlyExit: boolean;
	readonly cornerRoundness: number;
	readonly annotationSizeFactor: number;
	readonly defaultHideToolbars: boolean;
	readonly noWindowDecoration: boolean;
	readonly focusTogglesToolbars: boolean;
	readonly actionsOnEnter: readonly WindowAction[];
	readonly actionsOnEscape: readonly WindowAction[];
	readonly actionsOnRightClick: readonly WindowAction[];
	readonly saveAfterCopy: boolean;
	readonly primaryHighlighter: Highlighter;
	readonly disableNotifications: boolean;
	readonly font: FontConfiguration;
	readonly palette: ColorPalette;
}

/** Case-insensitive tool lookup. Unknown names return undefined. */
export function parseTool(name: string): AnnotationTool | undefined {
	const normalized = name.toLowerCase();
	return ANNOTATION_TOOLS.find((tool) => tool === normalized);
}

function inherited(globals: GlobalConfiguration) {
	return {
		focusTogglesToolbars: globals.focusTogglesToolbars,
		actionsOnEnter: [...globals.actionsOnEnter],
		actionsOnEscape: [...globals.actionsOnEscape],
		actionsOnRightClick: [...globals.actionsOnRightClick],
		saveAfterCopy: globals.saveAfterCopy,
		primaryHighlighter: globals.primaryHighlighter,
		disableNotifications: globals.disableNotifications,
		font: { ...globals.font },
		palette: {
			palette: [...globals.colorPalette.palette],
			custom: [...globals.colorPalette.custom],
		},
	};
}

/**
 * Merge request overrides onto the global defaults. A field present on the
 * request wins; an absent one inherits.
 */
export function deriveWindowConfiguration(
	globals: GlobalConfiguration,
	request: DaemonRequest,
): WindowConfiguration {
	const requestedTool =
		request.initial_tool !== undefined
			? parseTool(request.initial_tool)
			: undefined;

	return deepFreeze({
		inputFilename: request.filename,
		outputFilename: request.output_filename ?? globals.outputFilename,
		copyCommand: request.copy_command ?? globals.copyCommand,
		initialTool: requestedTool ?? globals.initialTool,
		fullscreen: request.fullscreen ?? globals.fullscreen,
		earlyExit: request.early_exit ?? globals.earlyExit,
		cornerRoundness: request.corner_roundness ?? globals.cornerRoundness,
		annotationSizeFactor:
			request.annotation_size_factor ?? globals.annotationSizeFactor,
		defaultHideToolbars:
			request.default_hide_toolbars ?? globals.defaultHideToolbars,
		noWindowDecoration:
			request.no_window_decoration ?? globals.noWindowDecoration,
		...inherited(globals),
	});
}

/** Configuration for a window opened without the daemon. */
export function windowConfigurationFromGlobals(
	globals: GlobalConfiguration,
	inputFilename: string,
): WindowConfiguration {
	return deriveWindowConfiguration(globals, { filename: inputFilename });
}

/** Built-in defaults with no input file, used for the pre-warm window. */
export function defaultWindowConfiguration(): WindowConfiguration {
	return windowConfigurationFromGlobals(DEFAULT_CONFIGURATION, "");
}
