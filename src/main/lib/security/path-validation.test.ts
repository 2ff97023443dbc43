import { execFileSync } from "node:child_process";
import {
	mkdirSync,
	mkdtempSync,
	realpathSync,
	rmSync,
	symlinkSync,
	writeFileSync,
} from "node:fs";
import { createServer, type Server } from "node:net";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SecurityError } from "./errors";
import { MAX_PATH_LENGTH, validateImagePath } from "./path-validation";

function captureError(fn: () => unknown): SecurityError {
	try {
		fn();
	} catch (error) {
		if (error instanceof SecurityError) return error;
		throw error;
	}
	throw new Error("expected a SecurityError");
}

describe("validateImagePath", () => {
	let dir: string;
	let image: string;

	beforeEach(() => {
		dir = realpathSync(mkdtempSync(join(tmpdir(), "snapmark-paths-")));
		image = join(dir, "shot.png");
		writeFileSync(image, "not really a png");
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	it("returns the canonical path of a regular file", () => {
		expect(validateImagePath(image)).toBe(image);
	});

	it("is idempotent", () => {
		const once = validateImagePath(image);
		expect(validateImagePath(once)).toBe(once);
	});

	it("passes the stdin sentinel through untouched", () => {
		expect(validateImagePath("-")).toBe("-");
	});

	it("rejects an empty path", () => {
		const error = captureError(() => validateImagePath(""));
		expect(error.code).toBe("INVALID_PATH");
		expect(error.message).toBe("Invalid path: empty path");
	});

	it("rejects overlong paths before touching the filesystem", () => {
		const path = `/${"a".repeat(MAX_PATH_LENGTH)}`;
		const error = captureError(() => validateImagePath(path));
		expect(error.code).toBe("INVALID_PATH");
		expect(error.message).toBe(
			`Invalid path: path too long: ${MAX_PATH_LENGTH + 1} bytes (max ${MAX_PATH_LENGTH})`,
		);
	});

	it("counts length in bytes, not characters", () => {
		// 2 bytes per character in UTF-8
		const path = `/${"é".repeat(2100)}`;
		const error = captureError(() => validateImagePath(path));
		expect(error.code).toBe("INVALID_PATH");
	});

	it("reports missing files as FILE_NOT_FOUND", () => {
		const missing = join(dir, "missing.png");
		const error = captureError(() => validateImagePath(missing));
		expect(error.code).toBe("FILE_NOT_FOUND");
		expect(error.message).toBe(`File not found: ${missing}`);
	});

	it("resolves relative segments", () => {
		mkdirSync(join(dir, "nested"));
		expect(validateImagePath(`${dir}/nested/../shot.png`)).toBe(image);
	});

	it("resolves a symlink chain to its final target", () => {
		let previous = image;
		for (let hop = 0; hop < 5; hop++) {
			const link = join(dir, `link-${hop}`);
			symlinkSync(previous, link);
			previous = link;
		}
		expect(validateImagePath(previous)).toBe(validateImagePath(image));
	});

	it("reports a dangling symlink as FILE_NOT_FOUND", () => {
		const link = join(dir, "dangling");
		symlinkSync(join(dir, "gone.png"), link);
		expect(captureError(() => validateImagePath(link)).code).toBe(
			"FILE_NOT_FOUND",
		);
	});

	it("rejects directories with NOT_A_FILE", () => {
		const error = captureError(() => validateImagePath(dir));
		expect(error.code).toBe("NOT_A_FILE");
		expect(error.message).toBe(`Path is not a file: ${dir}`);
	});

	it("rejects a symlink to a directory with NOT_A_FILE", () => {
		const link = join(dir, "dir-link");
		symlinkSync(dir, link);
		expect(captureError(() => validateImagePath(link)).code).toBe("NOT_A_FILE");
	});

	it("rejects devices with NOT_A_FILE", () => {
		expect(captureError(() => validateImagePath("/dev/null")).code).toBe(
			"NOT_A_FILE",
		);
	});

	it("rejects a FIFO with NOT_A_FILE without opening it", (context) => {
		const fifo = join(dir, "pipe");
		try {
			execFileSync("mkfifo", [fifo], { stdio: "ignore" });
		} catch {
			context.skip();
			return;
		}

		// open() on a FIFO without a writer would block
		const startedAt = performance.now();
		const error = captureError(() => validateImagePath(fifo));
		expect(performance.now() - startedAt).toBeLessThan(1000);
		expect(error.code).toBe("NOT_A_FILE");
		expect(error.message).toBe(`Path is not a file: ${fifo}`);
	});

	describe("socket files", () => {
		let server: Server;

		afterEach(async () => {
			await new Promise<void>((resolve) => server.close(() => resolve()));
		});

		it("rejects a unix socket with NOT_A_FILE", async () => {
			const socketPath = join(dir, "listener.sock");
			server = createServer();
			await new Promise<void>((resolve) => server.listen(socketPath, resolve));
			expect(captureError(() => validateImagePath(socketPath)).code).toBe(
				"NOT_A_FILE",
			);
		});
	});
});
