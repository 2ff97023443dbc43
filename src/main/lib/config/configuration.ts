/**
 * Global configuration store.
 *
 * Built once at startup from built-in defaults, the configuration file and
 * command-line flags (in that order of precedence) and frozen. Per-window
 * configuration is derived from this snapshot; nothing writes to it later.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { createLogger } from "main/lib/logger";
import { PLATFORM } from "shared/constants";
import type {
	AnnotationTool,
	Highlighter,
	WindowAction,
} from "shared/constants";
import type { z } from "zod/v4";
import { type ConfigFile, configFileSchema, DEFAULT_CONFIG_FILE } from "./schema";

const log = createLogger("config");

export interface FontConfiguration {
	readonly family?: string;
	readonly style?: string;
}

export interface ColorPalette {
	readonly palette: readonly string[];
	readonly custom: readonly string[];
}

export interface GlobalConfiguration {
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
	readonly viewerCommand: string;
	readonly font: FontConfiguration;
	readonly colorPalette: ColorPalette;
}

/** Command-line flags that override file values when present. */
export type ConfigurationOverrides = Partial<
	Pick<
		GlobalConfiguration,
		| "outputFilename"
		| "copyCommand"
		| "initialTool"
		| "fullscreen"
		| "earlyExit"
		| "cornerRoundness"
		| "annotationSizeFactor"
		| "defaultHideToolbars"
		| "noWindowDecoration"
	>
>;

export const DEFAULT_CONFIGURATION: GlobalConfiguration = deepFreeze({
	initialTool: "pointer",
	fullscreen: false,
	earlyExit: false,
	cornerRoundness: 12,
	annotationSizeFactor: 1,
	defaultHideToolbars: false,
	noWindowDecoration: false,
	focusTogglesToolbars: false,
	actionsOnEnter: ["save-to-clipboard"],
	actionsOnEscape: ["exit"],
	actionsOnRightClick: [],
	saveAfterCopy: false,
	primaryHighlighter: "block",
	disableNotifications: false,
	viewerCommand: PLATFORM.IS_MAC ? "open" : "xdg-open",
	font: {},
	colorPalette: {
		palette: ["#F07A28", "#FF0000", "#00FF00", "#0000FF", "#00B4D8"],
		custom: [],
	},
});

export class ConfigurationError extends Error {
	constructor(
		message: string,
		public readonly configPath: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "ConfigurationError";
	}
}

function describeIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => {
			const key = issue.path.join(".");
			return key ? `'${key}' ${issue.message}` : issue.message;
		})
		.join("; ");
}

/**
 * Read and validate the configuration file.
 * A missing file is created with defaults and yields `{}` overrides.
 *
 * @throws ConfigurationError on unreadable, malformed or invalid files
 */
export function readConfigFile(configPath: string): ConfigFile {
	if (!existsSync(configPath)) {
		writeDefaultConfigFile(configPath);
		return {};
	}

	let content: string;
	try {
		content = readFileSync(configPath, "utf-8");
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new ConfigurationError(
			`Failed to read ${configPath}: ${message}`,
			configPath,
			{ cause: error },
		);
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(content);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new ConfigurationError(
			`Invalid JSON in ${configPath}: ${message}`,
			configPath,
			{ cause: error },
		);
	}

	const result = configFileSchema.safeParse(parsed);
	if (!result.success) {
		throw new ConfigurationError(
			`Invalid configuration in ${configPath}: ${describeIssues(result.error)}`,
			configPath,
		);
	}
	return result.data;
}

function writeDefaultConfigFile(configPath: string): void {
	try {
		mkdirSync(dirname(configPath), { recursive: true });
		writeFileSync(
			configPath,
			`${JSON.stringify(DEFAULT_CONFIG_FILE, null, 2)}\n`,
			"utf-8",
		);
	} catch (error) {
		// Read-only config dirs are fine; built-in defaults still apply
		log.warn("Failed to create default config file", {
			configPath,
			error: error instanceof Error ? error.message : String(error),
		});
	}
}

/**
 * Merge defaults, file values and overrides into a frozen snapshot.
 */
export function mergeConfiguration(
	file: ConfigFile,
	overrides: ConfigurationOverrides = {},
): GlobalConfiguration {
	const general = file.general ?? {};
	const defaults = DEFAULT_CONFIGURATION;

	return deepFreeze({
		outputFilename:
			overrides.outputFilename ??
			general["output-filename"] ??
			defaults.outputFilename,
		copyCommand:
			overrides.copyCommand ?? general["copy-command"] ?? defaults.copyCommand,
		initialTool:
			overrides.initialTool ?? general["initial-tool"] ?? defaults.initialTool,
		fullscreen:
			overrides.fullscreen ?? general.fullscreen ?? defaults.fullscreen,
		earlyExit: overrides.earlyExit ?? general["early-exit"] ?? defaults.earlyExit,
		cornerRoundness:
			overrides.cornerRoundness ??
			general["corner-roundness"] ??
			defaults.cornerRoundness,
		annotationSizeFactor:
			overrides.annotationSizeFactor ??
			general["annotation-size-factor"] ??
			defaults.annotationSizeFactor,
		defaultHideToolbars:
			overrides.defaultHideToolbars ??
			general["default-hide-toolbars"] ??
			defaults.defaultHideToolbars,
		noWindowDecoration:
			overrides.noWindowDecoration ??
			general["no-window-decoration"] ??
			defaults.noWindowDecoration,
		focusTogglesToolbars:
			general["focus-toggles-toolbars"] ?? defaults.focusTogglesToolbars,
		actionsOnEnter: [
			...(general["actions-on-enter"] ?? defaults.actionsOnEnter),
		],
		actionsOnEscape: [
			...(general["actions-on-escape"] ?? defaults.actionsOnEscape),
		],
		actionsOnRightClick: [
			...(general["actions-on-right-click"] ?? defaults.actionsOnRightClick),
		],
		saveAfterCopy: general["save-after-copy"] ?? defaults.saveAfterCopy,
		primaryHighlighter:
			general["primary-highlighter"] ?? defaults.primaryHighlighter,
		disableNotifications:
			general["disable-notifications"] ?? defaults.disableNotifications,
		viewerCommand: general["viewer-command"] ?? defaults.viewerCommand,
		font: { ...defaults.font, ...file.font },
		colorPalette: {
			palette: [
				...(file["color-palette"]?.palette ?? defaults.colorPalette.palette),
			],
			custom: [
				...(file["color-palette"]?.custom ?? defaults.colorPalette.custom),
			],
		},
	});
}

export function loadConfiguration(
	configPath: string,
	overrides: ConfigurationOverrides = {},
): GlobalConfiguration {
	return mergeConfiguration(readConfigFile(configPath), overrides);
}

export function deepFreeze<T>(value: T): T {
	if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
		Object.freeze(value);
		for (const nested of Object.values(value)) {
			deepFreeze(nested);
		}
	}
	return value;
}
