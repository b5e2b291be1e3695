import type { ConditionEngine } from "../checks/engine.js";
import { countChecks } from "../checks/types.js";
import type { GuardConfig } from "../config.js";
import type { GuardController } from "../guard/controller.js";
import type { GuardLogger } from "../logger.js";
import type { ShutdownSignal } from "../shutdown.js";

export interface DaemonDeps {
	engine: Pick<ConditionEngine, "evaluate">;
	guard: Pick<GuardController, "setGuard" | "targets">;
	logger: GuardLogger;
}

export type DaemonConfig = Pick<GuardConfig, "checks" | "intervalSeconds" | "startBlocked" | "exitOnPass">;

/**
 * Evaluates the checks every `intervalSeconds` and keeps the guard in line
 * with the verdict. Resolves with the process exit code once `exitOnPass`
 * fires or shutdown is requested.
 */
export async function runDaemon(config: DaemonConfig, deps: DaemonDeps, shutdown: ShutdownSignal): Promise<number> {
	const { engine, guard, logger } = deps;

	logger.info(
		{
			tag: "daemon.start",
			checks: countChecks(config.checks),
			intervalSeconds: config.intervalSeconds,
			targets: guard.targets,
		},
		"Starting shutdown guard",
	);

	const initial = await engine.evaluate(config.checks);
	if (shutdown.requested) {
		return stopped(logger, shutdown);
	}

	if (initial && !config.startBlocked) {
		if (config.exitOnPass) {
			logger.info({ tag: "daemon.exit-on-pass" }, "Checks pass at startup, exiting without blocking");
			return 0;
		}
		// Clears drop-ins a previous run may have left behind.
		await guard.setGuard(false);
	} else {
		await guard.setGuard(true);
	}

	const intervalMs = config.intervalSeconds * 1000;
	while (await shutdown.wait(intervalMs)) {
		const passed = await engine.evaluate(config.checks);
		if (shutdown.requested) {
			break;
		}

		if (passed) {
			await guard.setGuard(false);
			if (config.exitOnPass) {
				logger.info({ tag: "daemon.exit-on-pass" }, "Checks pass, guard released, exiting");
				return 0;
			}
		} else {
			await guard.setGuard(true);
		}
	}

	return stopped(logger, shutdown);
}

function stopped(logger: GuardLogger, shutdown: ShutdownSignal): number {
	logger.info({ tag: "daemon.stop", reason: shutdown.reason }, "Shutdown guard loop stopped");
	return 0;
}
