import { resolve } from "node:path";
import { type CheckSet, emptyCheckSet } from "./checks/types.js";
import { ConfigError } from "./errors.js";
import { isLogSeverity, type LogSeverity } from "./logger.js";

export type GuardMode = "daemon" | "block" | "unblock";

export interface GuardConfig {
	checks: CheckSet;
	intervalSeconds: number;
	startBlocked: boolean;
	exitOnPass: boolean;
	ignoreSignals: boolean;
	logLevel: LogSeverity;
	timestamps: boolean;
	mode: GuardMode;
	targets: string[];
	overrideDir: string;
	dropInName: string;
	shell: string;
}

export const DEFAULT_TARGETS = ["poweroff.target", "reboot.target", "halt.target"];

export function defaultConfig(overrides: Partial<GuardConfig> = {}): GuardConfig {
	return {
		checks: overrides.checks ?? emptyCheckSet(),
		intervalSeconds: overrides.intervalSeconds ?? 10,
		startBlocked: overrides.startBlocked ?? false,
		exitOnPass: overrides.exitOnPass ?? false,
		ignoreSignals: overrides.ignoreSignals ?? false,
		logLevel: overrides.logLevel ?? "info",
		timestamps: overrides.timestamps ?? true,
		mode: overrides.mode ?? "daemon",
		targets: overrides.targets ?? [...DEFAULT_TARGETS],
		overrideDir: resolve(overrides.overrideDir ?? "/run/systemd/system"),
		dropInName: overrides.dropInName ?? "shutdown-guard.conf",
		shell: overrides.shell ?? "/bin/sh",
	};
}

/** Longest wait a Node timer can hold (2^31 - 1 ms). */
export const MAX_INTERVAL_SECONDS = 2_147_483.647;

const UNIT_NAME = /^[\w:.@\\-]+\.[a-z]+$/;

export function validateConfig(config: GuardConfig): GuardConfig {
	if (!Number.isFinite(config.intervalSeconds) || config.intervalSeconds <= 0) {
		throw new ConfigError(`Interval must be a positive number of seconds, got '${config.intervalSeconds}'`);
	}
	if (config.intervalSeconds > MAX_INTERVAL_SECONDS) {
		throw new ConfigError(`Interval must not exceed ${MAX_INTERVAL_SECONDS} seconds, got '${config.intervalSeconds}'`);
	}
	if (!isLogSeverity(config.logLevel)) {
		throw new ConfigError(`Unknown log level '${config.logLevel}'`);
	}
	if (config.targets.length === 0) {
		throw new ConfigError("At least one target must be protected");
	}
	for (const target of config.targets) {
		if (!UNIT_NAME.test(target)) {
			throw new ConfigError(`'${target}' is not a unit name (expected e.g. poweroff.target)`);
		}
	}
	if (config.dropInName.length === 0 || config.dropInName.includes("/") || !config.dropInName.endsWith(".conf")) {
		throw new ConfigError(`Drop-in name '${config.dropInName}' must be a plain file name ending in .conf`);
	}
	return config;
}

export function parseInterval(raw: string): number {
	const value = Number(raw);
	if (raw.trim() === "" || !Number.isFinite(value) || value <= 0) {
		throw new ConfigError(`Interval must be a positive number of seconds, got '${raw}'`);
	}
	if (value > MAX_INTERVAL_SECONDS) {
		throw new ConfigError(`Interval must not exceed ${MAX_INTERVAL_SECONDS} seconds, got '${raw}'`);
	}
	return value;
}
