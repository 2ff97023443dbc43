import { parseArgs } from "node:util";
import type { ConfigurationOverrides } from "main/lib/config";
import { parseTool } from "main/lib/config";
import { ANNOTATION_TOOLS } from "shared/constants";
import { z } from "zod/v4";

export type CliMode = "daemon" | "show" | "direct";

export interface CliArguments {
	mode: CliMode;
	/** Required unless mode is "daemon". "-" reads stdin. */
	filename?: string;
	configPath?: string;
	overrides: ConfigurationOverrides;
	help: boolean;
}

export class UsageError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "UsageError";
	}
}

export const USAGE = `Usage: snapmark [OPTIONS] --filename <FILE>
       snapmark --daemon

Options:
  -f, --filename <FILE>             Image to annotate, "-" reads stdin
  -o, --output-filename <FILE>      Where "save to file" writes
      --copy-command <CMD>          Command receiving the image on "copy"
      --initial-tool <TOOL>         ${ANNOTATION_TOOLS.join(", ")}
      --fullscreen                  Start in fullscreen
      --early-exit                  Exit after copy or save
      --corner-roundness <N>        Corner radius of rectangles
      --annotation-size-factor <N>  Scale of annotation strokes and text
  -d, --default-hide-toolbars       Hide toolbars on start
      --no-window-decoration        Borderless window
  -c, --config <FILE>               Configuration file
      --daemon                      Run the background daemon
      --show                        Ask the daemon to open the image
  -h, --help                        Print help`;

const OPTIONS = {
	filename: { type: "string", short: "f" },
	"output-filename": { type: "string", short: "o" },
	"copy-command": { type: "string" },
	"initial-tool": { type: "string" },
	"init-tool": { type: "string" },
	fullscreen: { type: "boolean" },
	"early-exit": { type: "boolean" },
	"corner-roundness": { type: "string" },
	"annotation-size-factor": { type: "string" },
	"default-hide-toolbars": { type: "boolean", short: "d" },
	"no-window-decoration": { type: "boolean" },
	config: { type: "string", short: "c" },
	daemon: { type: "boolean" },
	show: { type: "boolean" },
	help: { type: "boolean", short: "h" },
} as const;

const numberArgument = z.coerce.number().refine(Number.isFinite, {
	message: "expected a number",
});

function parseNumber(flag: string, raw: string | undefined): number | undefined {
	if (raw === undefined) return undefined;
	const result = numberArgument.safeParse(raw.trim() === "" ? Number.NaN : raw);
	if (!result.success) {
		throw new UsageError(`Invalid value for --${flag}: '${raw}'`);
	}
	return result.data;
}

/**
 * @throws UsageError on unknown flags, bad values or conflicting modes
 */
export function parseCliArguments(argv: string[]): CliArguments {
	let values: ReturnType<typeof parse>["values"];
	try {
		values = parse(argv).values;
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new UsageError(message, { cause: error });
	}

	if (values.help) {
		return { mode: "direct", overrides: {}, help: true };
	}

	if (values.daemon && values.show) {
		throw new UsageError("--daemon and --show cannot be combined");
	}
	const mode: CliMode = values.daemon ? "daemon" : values.show ? "show" : "direct";

	if (mode !== "daemon" && !values.filename) {
		throw new UsageError("--filename is required");
	}

	const toolName = values["initial-tool"] ?? values["init-tool"];
	const initialTool = toolName === undefined ? undefined : parseTool(toolName);
	if (toolName !== undefined && !initialTool) {
		throw new UsageError(
			`Invalid value for --initial-tool: '${toolName}' (expected one of ${ANNOTATION_TOOLS.join(", ")})`,
		);
	}

	return {
		mode,
		filename: values.filename,
		configPath: values.config,
		help: false,
		overrides: {
			outputFilename: values["output-filename"],
			copyCommand: values["copy-command"],
			initialTool,
			fullscreen: values.fullscreen,
			earlyExit: values["early-exit"],
			cornerRoundness: parseNumber("corner-roundness", values["corner-roundness"]),
			annotationSizeFactor: parseNumber(
				"annotation-size-factor",
				values["annotation-size-factor"],
			),
			defaultHideToolbars: values["default-hide-toolbars"],
			noWindowDecoration: values["no-window-decoration"],
		},
	};
}

function parse(argv: string[]) {
	return parseArgs({
		args: argv,
		options: OPTIONS,
		strict: true,
		allowPositionals: false,
	});
}
