import { mkdtempSync, realpathSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SecurityError } from "main/lib/security";
import {
	decodeInlinePayload,
	detectImageFormat,
	ImageLoadError,
	loadImageFile,
	loadImageFromRequest,
	placeholderImage,
} from "./image-resource";

const PNG_HEADER = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

describe("detectImageFormat", () => {
	it("recognizes supported signatures", () => {
		expect(detectImageFormat(PNG_HEADER)).toBe("png");
		expect(detectImageFormat(Buffer.from([0xff, 0xd8, 0xff, 0xe0]))).toBe("jpeg");
		expect(detectImageFormat(Buffer.from("GIF89a..."))).toBe("gif");
		expect(detectImageFormat(Buffer.from("RIFF\0\0\0\0WEBPVP8 "))).toBe("webp");
		expect(detectImageFormat(Buffer.from("BM\0\0"))).toBe("bmp");
	});

	it("returns undefined for anything else", () => {
		expect(detectImageFormat(Buffer.from("hello"))).toBeUndefined();
		expect(detectImageFormat(Buffer.alloc(0))).toBeUndefined();
	});
});

describe("decodeInlinePayload", () => {
	it("decodes base64 image bytes", () => {
		const resource = decodeInlinePayload(PNG_HEADER.toString("base64"));
		expect(resource).toMatchObject({ source: "inline", path: "-", format: "png" });
		expect(resource.data).toEqual(PNG_HEADER);
	});

	it("rejects characters outside the base64 alphabet", () => {
		expect(() => decodeInlinePayload("not base64!")).toThrow(
			new ImageLoadError("Failed to decode base64 image data"),
		);
	});

	it("rejects bad padding", () => {
		expect(() => decodeInlinePayload("abc")).toThrow(ImageLoadError);
		expect(() => decodeInlinePayload("ab=c")).toThrow(ImageLoadError);
		expect(() => decodeInlinePayload("a===")).toThrow(ImageLoadError);
	});

	it("decodes a full-screen sized payload", () => {
		const data = Buffer.concat([PNG_HEADER, Buffer.alloc(8 * 1024 * 1024, 7)]);
		const resource = decodeInlinePayload(data.toString("base64"));
		expect(resource.format).toBe("png");
		expect(resource.data.length).toBe(data.length);
	});

	it("rejects an empty payload", () => {
		expect(() => decodeInlinePayload("")).toThrow(
			"Failed to decode base64 image data",
		);
	});

	it("rejects valid base64 that is not an image", () => {
		expect(() => decodeInlinePayload(Buffer.from("hello").toString("base64"))).toThrow(
			"Couldn't load image: unrecognized image format",
		);
	});
});

describe("placeholderImage", () => {
	it("is a PNG", () => {
		expect(placeholderImage().format).toBe("png");
	});
});

describe("loadImageFile", () => {
	let dir: string;

	beforeEach(() => {
		dir = realpathSync(mkdtempSync(join(tmpdir(), "snapmark-image-")));
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	it("reads an image from its canonical path", () => {
		const path = join(dir, "shot.png");
		writeFileSync(path, PNG_HEADER);
		const resource = loadImageFile(path);
		expect(resource).toMatchObject({ source: "file", path, format: "png" });
	});

	it("propagates path rejections", () => {
		expect(() => loadImageFile(join(dir, "missing.png"))).toThrow(SecurityError);
	});

	it("rejects files that are not images", () => {
		const path = join(dir, "notes.txt");
		writeFileSync(path, "plain text");
		expect(() => loadImageFile(path)).toThrow(
			"Couldn't load image: unrecognized image format",
		);
	});
});

describe("loadImageFromRequest", () => {
	it("uses the inline payload for the stdin sentinel", () => {
		const resource = loadImageFromRequest({
			filename: "-",
			inline_payload: PNG_HEADER.toString("base64"),
		});
		expect(resource.source).toBe("inline");
	});
});
