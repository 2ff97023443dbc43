import { ANNOTATION_TOOLS, HIGHLIGHTERS, WINDOW_ACTIONS } from "shared/constants";
import { z } from "zod/v4";

const hexColorSchema = z
	.string()
	.regex(/^#(?:[0-9a-fA-F]{6}|[0-9a-fA-F]{8})$/, "must be a hex color like #FF0000");

const actionsSchema = z.array(z.enum(WINDOW_ACTIONS));

/**
 * On-disk configuration file. Every key is optional; unknown keys are errors
 * so typos surface instead of being silently ignored.
 */
export const configFileSchema = z
	.object({
		general: z
			.object({
				fullscreen: z.boolean(),
				"early-exit": z.boolean(),
				"corner-roundness": z.number().nonnegative(),
				"initial-tool": z.enum(ANNOTATION_TOOLS),
				"copy-command": z.string(),
				"annotation-size-factor": z.number().positive(),
				"output-filename": z.string(),
				"actions-on-enter": actionsSchema,
				"actions-on-escape": actionsSchema,
				"actions-on-right-click": actionsSchema,
				"save-after-copy": z.boolean(),
				"default-hide-toolbars": z.boolean(),
				"focus-toggles-toolbars": z.boolean(),
				"primary-highlighter": z.enum(HIGHLIGHTERS),
				"disable-notifications": z.boolean(),
				"no-window-decoration": z.boolean(),
				"viewer-command": z.string().min(1),
			})
			.partial()
			.strict(),
		font: z
			.object({
				family: z.string(),
				style: z.string(),
			})
			.partial()
			.strict(),
		"color-palette": z
			.object({
				palette: z.array(hexColorSchema),
				custom: z.array(hexColorSchema),
			})
			.partial()
			.strict(),
	})
	.partial()
	.strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

/** Written when no configuration file exists yet. */
export const DEFAULT_CONFIG_FILE: ConfigFile = {
	general: {
		fullscreen: false,
		"early-exit": false,
		"corner-roundness": 12,
		"initial-tool": "pointer",
		"annotation-size-factor": 1,
		"default-hide-toolbars": false,
		"disable-notifications": false,
	},
};
