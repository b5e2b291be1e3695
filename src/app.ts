import { ConditionEngine } from "./checks/engine.js";
import { PgrepInspector, type ProcessInspector } from "./checks/processes.js";
import type { GuardConfig } from "./config.js";
import { runDaemon } from "./daemon/loop.js";
import { SignalHandlers, type SignalSource } from "./daemon/signals.js";
import { assertPrivileged, PrivilegeError } from "./errors.js";
import { GuardController } from "./guard/controller.js";
import { createLogger, type GuardLogger } from "./logger.js";
import { ShutdownSignal } from "./shutdown.js";
import { type ServiceManager, SystemctlManager } from "./systemd/manager.js";

/** Replaceable collaborators; production defaults are used for anything omitted. */
export interface RuntimeOverrides {
	logger?: GuardLogger;
	serviceManager?: ServiceManager;
	processes?: ProcessInspector;
	geteuid?: () => number;
	exit?: (code: number) => void;
	signalSource?: SignalSource;
}

export async function runShutdownGuard(config: GuardConfig, overrides: RuntimeOverrides = {}): Promise<number> {
	const logger = overrides.logger ?? createLogger({ level: config.logLevel, timestamps: config.timestamps });

	try {
		assertPrivileged(overrides.geteuid);
	} catch (err) {
		if (err instanceof PrivilegeError) {
			logger.fatal({ tag: "privilege.denied", euid: err.euid }, err.message);
			return 1;
		}
		throw err;
	}

	const serviceManager = overrides.serviceManager ?? new SystemctlManager();
	const guard = new GuardController({
		targets: config.targets,
		location: { overrideDir: config.overrideDir, dropInName: config.dropInName },
		serviceManager,
		logger,
	});

	if (config.mode !== "daemon") {
		const enforce = config.mode === "block";
		const result = await guard.setGuard(enforce);
		if (result.failed.length > 0) {
			logger.warn(
				{ tag: enforce ? "guard.block-failed" : "guard.unblock-failed", targets: result.failed },
				`Some targets could not be ${enforce ? "blocked" : "unblocked"}`,
			);
		}
		return 0;
	}

	const engine = new ConditionEngine({
		serviceManager,
		processes: overrides.processes ?? new PgrepInspector(),
		logger,
		shell: config.shell,
	});
	const shutdown = new ShutdownSignal();
	const signals = new SignalHandlers({
		guard,
		shutdown,
		logger,
		ignoreSignals: config.ignoreSignals,
		exit: overrides.exit,
		source: overrides.signalSource,
	}).install();

	try {
		const code = await runDaemon(config, { engine, guard, logger }, shutdown);
		await signals.settled();
		return code;
	} finally {
		signals.dispose();
	}
}
