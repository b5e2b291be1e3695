import { describe, expect, it, vi } from "vitest";
import { type CheckSet, emptyCheckSet } from "../../src/checks/types.js";
import { type DaemonConfig, runDaemon } from "../../src/daemon/loop.js";
import type { GuardResult } from "../../src/guard/controller.js";
import { ShutdownSignal } from "../../src/shutdown.js";
import { captureLogger } from "../helpers/fakes.js";

const NO_CHANGE: GuardResult = { changed: [], failed: [], reloaded: false };

function makeConfig(overrides: Partial<DaemonConfig> = {}): DaemonConfig {
	return {
		checks: emptyCheckSet(),
		intervalSeconds: 0.001,
		startBlocked: false,
		exitOnPass: false,
		...overrides,
	};
}

function setup(verdicts: boolean[]) {
	const shutdown = new ShutdownSignal();
	const evaluate = vi.fn<(checks: CheckSet) => Promise<boolean>>(async () => {
		const next = verdicts.shift();
		if (next === undefined) {
			shutdown.request("test finished");
			return false;
		}
		return next;
	});
	const setGuard = vi.fn<(enforce: boolean) => Promise<GuardResult>>().mockResolvedValue(NO_CHANGE);
	const logs = captureLogger();
	const deps = {
		engine: { evaluate },
		guard: { setGuard, targets: ["poweroff.target"] },
		logger: logs.logger,
	};
	return { shutdown, evaluate, setGuard, logs, deps };
}

describe("runDaemon", () => {
	it("exits at once without touching the guard when checks pass and exit-on-pass is set", async () => {
		const { shutdown, evaluate, setGuard, logs, deps } = setup([true]);

		const code = await runDaemon(makeConfig({ exitOnPass: true }), deps, shutdown);

		expect(code).toBe(0);
		expect(evaluate).toHaveBeenCalledTimes(1);
		expect(setGuard).not.toHaveBeenCalled();
		expect(logs.tags()).toEqual(["daemon.start", "daemon.exit-on-pass"]);
	});

	it("installs the guard on a failing start and releases it once checks pass", async () => {
		const { shutdown, setGuard, deps } = setup([false, false, true]);

		const code = await runDaemon(makeConfig({ exitOnPass: true }), deps, shutdown);

		expect(code).toBe(0);
		expect(setGuard.mock.calls).toEqual([[true], [true], [false]]);
	});

	it("installs the guard at startup when start-blocked is forced, even on a pass", async () => {
		const { shutdown, setGuard, deps } = setup([true, true]);

		await runDaemon(makeConfig({ startBlocked: true, exitOnPass: true }), deps, shutdown);

		expect(setGuard.mock.calls).toEqual([[true], [false]]);
	});

	it("releases idempotently on a passing start and keeps polling", async () => {
		const { shutdown, evaluate, setGuard, logs, deps } = setup([true, false, true]);

		const code = await runDaemon(makeConfig(), deps, shutdown);

		expect(code).toBe(0);
		expect(evaluate).toHaveBeenCalledTimes(4);
		expect(setGuard.mock.calls).toEqual([[false], [true], [false]]);
		expect(logs.records.at(-1)).toMatchObject({ tag: "daemon.stop", reason: "test finished" });
	});

	it("does not touch the guard after shutdown is requested mid-evaluation", async () => {
		const { shutdown, setGuard, deps } = setup([]);

		const code = await runDaemon(makeConfig(), deps, shutdown);

		expect(code).toBe(0);
		expect(setGuard).not.toHaveBeenCalled();
	});

	it("stops sleeping as soon as shutdown is requested", async () => {
		const { shutdown, evaluate, setGuard, deps } = setup([false]);
		const running = runDaemon(makeConfig({ intervalSeconds: 3600 }), deps, shutdown);

		await vi.waitFor(() => expect(setGuard).toHaveBeenCalledWith(true));
		shutdown.request("SIGTERM");

		await expect(running).resolves.toBe(0);
		expect(evaluate).toHaveBeenCalledTimes(1);
	});
});
