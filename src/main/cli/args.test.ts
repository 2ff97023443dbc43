import { describe, expect, it } from "vitest";
import { parseCliArguments, UsageError } from "./args";

describe("parseCliArguments", () => {
	it("defaults to the direct mode with a filename", () => {
		const args = parseCliArguments(["-f", "shot.png"]);
		expect(args.mode).toBe("direct");
		expect(args.filename).toBe("shot.png");
		expect(args.help).toBe(false);
	});

	it("selects show and daemon modes", () => {
		expect(parseCliArguments(["--show", "-f", "a.png"]).mode).toBe("show");
		expect(parseCliArguments(["--daemon"]).mode).toBe("daemon");
	});

	it("maps flags onto configuration overrides", () => {
		const args = parseCliArguments([
			"--filename",
			"-",
			"-o",
			"/tmp/out.png",
			"--copy-command",
			"wl-copy",
			"--init-tool",
			"Arrow",
			"--fullscreen",
			"--early-exit",
			"--corner-roundness",
			"2.5",
			"--annotation-size-factor",
			"0.5",
			"-d",
			"--no-window-decoration",
		]);
		expect(args.filename).toBe("-");
		expect(args.overrides).toEqual({
			outputFilename: "/tmp/out.png",
			copyCommand: "wl-copy",
			initialTool: "arrow",
			fullscreen: true,
			earlyExit: true,
			cornerRoundness: 2.5,
			annotationSizeFactor: 0.5,
			defaultHideToolbars: true,
			noWindowDecoration: true,
		});
	});

	it("leaves absent flags undefined so the file value applies", () => {
		const { overrides } = parseCliArguments(["-f", "a.png"]);
		expect(overrides.fullscreen).toBeUndefined();
		expect(overrides.cornerRoundness).toBeUndefined();
	});

	it("returns help without requiring a filename", () => {
		expect(parseCliArguments(["-h"]).help).toBe(true);
	});

	it.each([
		[["--bogus"]],
		[["-f"]],
		[["positional.png"]],
		[["--show"]],
		[["--daemon", "--show", "-f", "a.png"]],
		[["-f", "a.png", "--initial-tool", "lasso"]],
		[["-f", "a.png", "--corner-roundness", "round"]],
		[["-f", "a.png", "--annotation-size-factor", ""]],
	])("rejects %j", (argv) => {
		expect(() => parseCliArguments([...argv])).toThrow(UsageError);
	});
});
