export const PLATFORM = {
	IS_MAC: process.platform === "darwin",
};

export const APP_NAME = "snapmark";

// Config lives under $XDG_CONFIG_HOME/<APP_CONFIG_DIR_NAME>/
export const APP_CONFIG_DIR_NAME = APP_NAME;
export const CONFIG_FILE_NAME = "config.json";

/** Filename that means "the image comes from stdin" (inline payload over the wire). */
export const STDIN_SENTINEL = "-";

export const ANNOTATION_TOOLS = [
	"pointer",
	"crop",
	"line",
	"arrow",
	"rectangle",
	"ellipse",
	"text",
	"marker",
	"blur",
	"highlight",
	"brush",
] as const;

export type AnnotationTool = (typeof ANNOTATION_TOOLS)[number];

export const WINDOW_ACTIONS = [
	"save-to-clipboard",
	"save-to-file",
	"exit",
	"save-to-clipboard-and-exit",
	"save-to-file-and-exit",
] as const;

export type WindowAction = (typeof WINDOW_ACTIONS)[number];

export const HIGHLIGHTERS = ["block", "freehand"] as const;

export type Highlighter = (typeof HIGHLIGHTERS)[number];
