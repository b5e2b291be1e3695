import pino, { type DestinationStream, type Logger } from "pino";

export const LOG_SEVERITIES = ["debug", "info", "warning", "error", "critical"] as const;

export type LogSeverity = (typeof LOG_SEVERITIES)[number];

export type GuardLogger = Logger;

const PINO_LEVELS: Record<LogSeverity, pino.Level> = {
	debug: "debug",
	info: "info",
	warning: "warn",
	error: "error",
	critical: "fatal",
};

const SEVERITY_LABELS: Record<string, LogSeverity> = {
	debug: "debug",
	info: "info",
	warn: "warning",
	error: "error",
	fatal: "critical",
};

export interface LoggerOptions {
	level: LogSeverity;
	timestamps: boolean;
	/** Defaults to stderr. */
	destination?: DestinationStream;
}

export function isLogSeverity(value: string): value is LogSeverity {
	return LOG_SEVERITIES.some((severity) => severity === value);
}

export function createLogger(opts: LoggerOptions): GuardLogger {
	return pino(
		{
			level: PINO_LEVELS[opts.level],
			base: { service: "shutdown-guard" },
			timestamp: opts.timestamps ? pino.stdTimeFunctions.isoTime : false,
			formatters: {
				level: (label) => ({ level: SEVERITY_LABELS[label] ?? label }),
			},
		},
		opts.destination ?? pino.destination(2),
	);
}
