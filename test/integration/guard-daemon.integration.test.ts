import { EventEmitter } from "node:events";
import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, type Mock, vi } from "vitest";
import { runShutdownGuard } from "../../src/app.js";
import { buildCheckSet, type RawCheckLists } from "../../src/checks/parse.js";
import { defaultConfig, type GuardConfig } from "../../src/config.js";
import type { DropInLocation } from "../../src/guard/dropin.js";
import { type CapturedLogger, captureLogger, FakeProcessInspector, FakeServiceManager } from "../helpers/fakes.js";

const TARGETS = ["poweroff.target", "reboot.target", "halt.target"];

describe("shutdown guard end to end", () => {
	let tmpDir: string;
	let overrideDir: string;
	let location: DropInLocation;
	let manager: FakeServiceManager;
	let logs: CapturedLogger;
	let signals: EventEmitter;
	let exit: Mock<(code: number) => void>;

	beforeEach(async () => {
		tmpDir = await mkdtemp(join(tmpdir(), "shutdown-guard-e2e-"));
		overrideDir = join(tmpDir, "system");
		location = { overrideDir, dropInName: "shutdown-guard.conf" };
		manager = new FakeServiceManager(location);
		logs = captureLogger();
		signals = new EventEmitter();
		exit = vi.fn<(code: number) => void>();
	});

	afterEach(async () => {
		await rm(tmpDir, { recursive: true, force: true });
	});

	function config(lists: RawCheckLists, overrides: Partial<GuardConfig> = {}): GuardConfig {
		return defaultConfig({
			checks: buildCheckSet(lists),
			intervalSeconds: 0.01,
			overrideDir,
			...overrides,
		});
	}

	function start(cfg: GuardConfig, geteuid: () => number = () => 0): Promise<number> {
		return runShutdownGuard(cfg, {
			logger: logs.logger,
			serviceManager: manager,
			processes: new FakeProcessInspector(),
			geteuid,
			exit,
			signalSource: signals,
		});
	}

	async function blockedTargets(): Promise<string[]> {
		const blocked: string[] = [];
		for (const target of TARGETS) {
			if (await manager.isBlocked(target)) blocked.push(target);
		}
		return blocked;
	}

	it("exits 0 without ever blocking when nothing is configured and exit-on-pass is set", async () => {
		const code = await start(config({}, { exitOnPass: true }));

		expect(code).toBe(0);
		expect(manager.reloads).toBe(0);
		expect(logs.tags()).not.toContain("guard.block");
	});

	it("blocks while a required file is missing and unblocks once it appears", async () => {
		const ready = join(tmpDir, "backup.done");
		const running = start(config({ requiredFiles: [ready] }, { exitOnPass: true }));

		await vi.waitFor(async () => expect(await blockedTargets()).toEqual(TARGETS));
		await writeFile(ready, "");

		await expect(running).resolves.toBe(0);
		expect(await blockedTargets()).toEqual([]);
		expect(await readdir(overrideDir)).toEqual([]);
		expect(manager.reloads).toBe(2);
		expect(logs.tags().filter((t) => t === "guard.block" || t === "guard.unblock")).toEqual([
			"guard.block",
			"guard.unblock",
		]);
	});

	it("releases the guard and exits 0 on SIGTERM", async () => {
		const running = start(config({ execChecks: ["false"] }));

		await vi.waitFor(async () => expect(await blockedTargets()).toEqual(TARGETS));
		signals.emit("SIGTERM", "SIGTERM");

		await expect(running).resolves.toBe(0);
		expect(exit).toHaveBeenCalledWith(0);
		expect(await blockedTargets()).toEqual([]);
		expect(signals.listenerCount("SIGTERM")).toBe(0);
	});

	it("keeps the guard on SIGTERM when signals are ignored", async () => {
		const ready = join(tmpDir, "ready");
		const running = start(config({ requiredFiles: [ready] }, { exitOnPass: true, ignoreSignals: true }));

		await vi.waitFor(async () => expect(await blockedTargets()).toEqual(TARGETS));
		signals.emit("SIGTERM", "SIGTERM");
		await new Promise((resolve) => setTimeout(resolve, 50));

		expect(exit).not.toHaveBeenCalled();
		expect(await blockedTargets()).toEqual(TARGETS);
		expect(logs.tags()).toContain("signal.ignored");

		await writeFile(ready, "");
		await expect(running).resolves.toBe(0);
	});

	it("refuses to run without root", async () => {
		const code = await start(config({}), () => 1000);

		expect(code).toBe(1);
		const record = logs.records.find((r) => r.tag === "privilege.denied");
		expect(record?.level).toBe("critical");
		expect(record?.euid).toBe(1000);
		expect(manager.reloads).toBe(0);
	});

	it("installs and removes the guard in one-shot modes without evaluating checks", async () => {
		const lists = { requiredFiles: [join(tmpDir, "never")] };

		expect(await start(config(lists, { mode: "block" }))).toBe(0);
		expect(await blockedTargets()).toEqual(TARGETS);
		expect(await start(config(lists, { mode: "block" }))).toBe(0);
		expect(manager.reloads).toBe(1);

		expect(await start(config(lists, { mode: "unblock" }))).toBe(0);
		expect(await blockedTargets()).toEqual([]);
		expect(manager.reloads).toBe(2);
		expect(logs.tags()).not.toContain("required-file.fail");
	});

	it("clears a drop-in left by an earlier run when checks pass at startup", async () => {
		expect(await start(config({}, { mode: "block" }))).toBe(0);
		const running = start(config({}));

		await vi.waitFor(async () => expect(await blockedTargets()).toEqual([]));
		signals.emit("SIGINT", "SIGINT");

		await expect(running).resolves.toBe(0);
		expect(manager.reloads).toBe(2);
		expect(exit).toHaveBeenCalledWith(0);
	});
});
