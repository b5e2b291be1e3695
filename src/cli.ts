#!/usr/bin/env -S node --import tsx
import { Command, Option } from "commander";
import { runShutdownGuard } from "./app.js";
import { buildCheckSet } from "./checks/parse.js";
import { DEFAULT_TARGETS, defaultConfig, type GuardConfig, type GuardMode, parseInterval, validateConfig } from "./config.js";
import { classifyError, describeError } from "./errors.js";
import { createLogger, LOG_SEVERITIES, type LogSeverity } from "./logger.js";

interface CliOptions {
	forbiddenFile: string[];
	requiredFile: string[];
	activeUnit: string[];
	runningCommand: string[];
	runningCommandArgs: string[];
	exec: string[];
	interval: string;
	startBlocked?: boolean;
	exitOnPass?: boolean;
	ignoreSignals?: boolean;
	logLevel: LogSeverity;
	timestamps: boolean;
	block?: boolean;
	unblock?: boolean;
	target: string[];
	overrideDir: string;
	shell: string;
}

function collect(value: string, previous: string[]): string[] {
	return [...previous, value];
}

function modeFrom(opts: CliOptions): GuardMode {
	if (opts.block) return "block";
	if (opts.unblock) return "unblock";
	return "daemon";
}

function configFromOptions(opts: CliOptions): GuardConfig {
	return validateConfig(
		defaultConfig({
			checks: buildCheckSet({
				forbiddenFiles: opts.forbiddenFile,
				requiredFiles: opts.requiredFile,
				activeUnits: opts.activeUnit,
				runningCommands: opts.runningCommand,
				runningCommandArgs: opts.runningCommandArgs,
				execChecks: opts.exec,
			}),
			intervalSeconds: parseInterval(opts.interval),
			startBlocked: opts.startBlocked ?? false,
			exitOnPass: opts.exitOnPass ?? false,
			ignoreSignals: opts.ignoreSignals ?? false,
			logLevel: opts.logLevel,
			timestamps: opts.timestamps,
			mode: modeFrom(opts),
			targets: opts.target.length > 0 ? opts.target : [...DEFAULT_TARGETS],
			overrideDir: opts.overrideDir,
			shell: opts.shell,
		}),
	);
}

const program = new Command();

program
	.name("shutdown-guard")
	.description("Block poweroff, reboot and halt until every configured check passes")
	.option("-f, --forbidden-file <path>", "Block while this path exists (repeatable)", collect, [])
	.option("-r, --required-file <path>", "Block while this path is missing (repeatable)", collect, [])
	.option("-u, --active-unit <unit>", "Block while this unit is active (repeatable)", collect, [])
	.option("-c, --running-command <name>", "Block while a process with exactly this name runs (repeatable)", collect, [])
	.option(
		"-a, --running-command-args <cmdline>",
		"Block while a process with exactly this command line runs (repeatable)",
		collect,
		[],
	)
	.option(
		"-e, --exec <invocation>",
		"Block unless this command succeeds; prefix '!' to expect failure, '$' to run it through the shell (repeatable)",
		collect,
		[],
	)
	.option("-i, --interval <seconds>", "Seconds between evaluations (fractions allowed)", "10")
	.option("--start-blocked", "Install the guard at startup even if every check passes")
	.option("--exit-on-pass", "Release the guard and exit once every check passes")
	.option("--ignore-signals", "Do not release the guard on SIGINT, SIGQUIT or SIGTERM")
	.addOption(new Option("-l, --log-level <level>", "Minimum log severity").choices(LOG_SEVERITIES).default("info"))
	.option("--no-timestamps", "Omit timestamps from log lines")
	.addOption(new Option("--block", "Install the guard and exit").conflicts("unblock"))
	.addOption(new Option("--unblock", "Remove the guard and exit").conflicts("block"))
	.option("-t, --target <unit>", `Target to protect (repeatable, default: ${DEFAULT_TARGETS.join(", ")})`, collect, [])
	.option("--override-dir <path>", "Service manager runtime override directory", "/run/systemd/system")
	.option("--shell <path>", "Interpreter for '$' exec checks", "/bin/sh")
	.action(async (opts: CliOptions) => {
		let config: GuardConfig;
		try {
			config = configFromOptions(opts);
		} catch (err) {
			const logger = createLogger({ level: "info", timestamps: opts.timestamps });
			logger.fatal({ tag: "config.invalid", err: describeError(err) }, "Invalid configuration");
			process.exit(1);
			return;
		}

		try {
			const code = await runShutdownGuard(config);
			process.exit(code);
			return;
		} catch (err) {
			const logger = createLogger({ level: config.logLevel, timestamps: config.timestamps });
			logger.fatal(
				{ tag: "daemon.crashed", kind: classifyError(err), err: describeError(err) },
				"Shutdown guard failed",
			);
			process.exit(1);
			return;
		}
	});

await program.parseAsync();
