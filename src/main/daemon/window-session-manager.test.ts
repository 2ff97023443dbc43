import { mkdtempSync, realpathSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_CONFIGURATION } from "main/lib/config";
import type { DaemonRequest } from "main/lib/daemon-protocol/types";
import { HeadlessToolkit } from "main/toolkit";
import { ChannelClosedError, createReplyChannel, RequestChannel } from "./bridge";
import { WindowSessionManager } from "./window-session-manager";

const PNG_HEADER = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

function nextImmediate(): Promise<void> {
	return new Promise((resolve) => setImmediate(resolve));
}

describe("WindowSessionManager", () => {
	let dir: string;
	let image: string;
	let toolkit: HeadlessToolkit;
	let requests: RequestChannel;

	beforeEach(() => {
		dir = realpathSync(mkdtempSync(join(tmpdir(), "snapmark-manager-")));
		image = join(dir, "shot.png");
		writeFileSync(image, PNG_HEADER);
		toolkit = new HeadlessToolkit();
		requests = new RequestChannel();
	});

	afterEach(() => {
		vi.useRealTimers();
		rmSync(dir, { recursive: true, force: true });
	});

	function createManager(batchSize = 1) {
		return new WindowSessionManager({
			toolkit,
			globals: DEFAULT_CONFIGURATION,
			requests,
			batchSize,
		});
	}

	function enqueue(request: DaemonRequest) {
		const { sender, receiver } = createReplyChannel();
		requests.send({ request, reply: sender });
		return receiver;
	}

	it("issues window ids starting at 1", async () => {
		const manager = createManager();
		const first = enqueue({ filename: image });
		const second = enqueue({ filename: image });
		manager.tick();
		manager.tick();
		await expect(first.receive()).resolves.toEqual({ status: "ok", window_id: 1 });
		await expect(second.receive()).resolves.toEqual({ status: "ok", window_id: 2 });
	});

	it("drains at most batchSize requests per tick", () => {
		const manager = createManager(2);
		enqueue({ filename: image });
		enqueue({ filename: image });
		enqueue({ filename: image });
		expect(manager.tick()).toBe(2);
		expect(manager.tick()).toBe(1);
		expect(manager.tick()).toBe(0);
	});

	it("replies before the window is constructed", async () => {
		const manager = createManager();
		const reply = enqueue({ filename: image });
		manager.tick();
		await expect(reply.receive()).resolves.toEqual({ status: "ok", window_id: 1 });
		expect(toolkit.openWindows()).toHaveLength(0);

		await nextImmediate();
		const [window] = toolkit.openWindows();
		expect(window?.presented).toBe(true);
		expect(window?.resource.path).toBe(image);
		expect(manager.openSessionCount).toBe(1);
	});

	it("answers a validation failure with an error and no window", async () => {
		const manager = createManager();
		const reply = enqueue({ filename: "" });
		manager.tick();
		await expect(reply.receive()).resolves.toEqual({
			status: "error",
			message: "Missing required field: filename",
		});
		await nextImmediate();
		expect(toolkit.openWindows()).toHaveLength(0);
		expect(manager.lastIssuedWindowId).toBe(0);
	});

	it("rejects the stdin sentinel without a payload", async () => {
		const manager = createManager();
		const reply = enqueue({ filename: "-" });
		manager.tick();
		const response = await reply.receive();
		expect(response.status).toBe("error");
	});

	it("passes path rejections through as the error message", async () => {
		const manager = createManager();
		const missing = join(dir, "missing.png");
		const reply = enqueue({ filename: missing });
		manager.tick();
		await expect(reply.receive()).resolves.toEqual({
			status: "error",
			message: `File not found: ${missing}`,
		});
	});

	it("does not consume a window id for rejected requests", async () => {
		const manager = createManager();
		const rejected = enqueue({ filename: join(dir, "missing.png") });
		const accepted = enqueue({ filename: image });
		manager.tick();
		manager.tick();
		expect((await rejected.receive()).status).toBe("error");
		await expect(accepted.receive()).resolves.toEqual({ status: "ok", window_id: 1 });
	});

	it("opens inline payloads", async () => {
		const manager = createManager();
		const reply = enqueue({
			filename: "-",
			inline_payload: PNG_HEADER.toString("base64"),
		});
		manager.tick();
		await expect(reply.receive()).resolves.toEqual({ status: "ok", window_id: 1 });
		await nextImmediate();
		expect(toolkit.openWindows()[0]?.resource.source).toBe("inline");
	});

	it("applies request overrides to the window configuration", async () => {
		const manager = createManager();
		enqueue({ filename: image, corner_roundness: 3, fullscreen: true });
		manager.tick();
		await nextImmediate();
		const configuration = toolkit.openWindows()[0]?.configuration;
		expect(configuration?.cornerRoundness).toBe(3);
		expect(configuration?.fullscreen).toBe(true);
		expect(configuration?.annotationSizeFactor).toBe(1);
	});

	it("still opens the window when the client left before the reply", async () => {
		const manager = createManager();
		const reply = enqueue({ filename: image });
		reply.close();
		manager.tick();
		await nextImmediate();
		expect(manager.openSessionCount).toBe(1);
		expect(manager.lastIssuedWindowId).toBe(1);
	});

	it("forgets a session when its window closes, leaving others open", async () => {
		const manager = createManager(2);
		enqueue({ filename: image });
		enqueue({ filename: image });
		manager.tick();
		await nextImmediate();
		const [first] = toolkit.openWindows();
		if (!first) throw new Error("expected an open window");

		toolkit.dismiss(first.handle.id);
		expect(manager.openSessionCount).toBe(1);
		expect(toolkit.openWindows()).toHaveLength(1);
	});

	it("pre-warms with a hidden window and discards it", () => {
		const manager = createManager();
		const createWindow = vi.spyOn(toolkit, "createWindow");
		manager.prewarm();
		expect(createWindow).toHaveBeenCalledTimes(1);
		expect(createWindow.mock.calls[0]?.[2]).toEqual({ visible: false });
		expect(toolkit.openWindows()).toHaveLength(0);
		expect(manager.lastIssuedWindowId).toBe(0);
	});

	it("drains on the timer once started", async () => {
		vi.useFakeTimers();
		const manager = createManager();
		const reply = enqueue({ filename: image });
		manager.start();
		vi.advanceTimersByTime(10);
		manager.shutdown();
		await expect(reply.receive()).resolves.toEqual({ status: "ok", window_id: 1 });
	});

	it("drops queued requests and quits the toolkit on shutdown", async () => {
		const manager = createManager();
		const reply = enqueue({ filename: image });
		manager.shutdown();
		await expect(reply.receive()).rejects.toBeInstanceOf(ChannelClosedError);
		expect(requests.closed).toBe(true);
		expect(toolkit.hasQuit).toBe(true);
	});
});
