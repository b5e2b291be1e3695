export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigError";
	}
}

export class PrivilegeError extends Error {
	readonly euid?: number;

	constructor(message: string, euid?: number) {
		super(message);
		this.name = "PrivilegeError";
		this.euid = euid;
	}
}

export class CommandLaunchError extends Error {
	readonly command: string;

	constructor(command: string, message: string) {
		super(`Could not run ${command}: ${message}`);
		this.name = "CommandLaunchError";
		this.command = command;
	}
}

export class ServiceManagerError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ServiceManagerError";
	}
}

export class ProbeError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ProbeError";
	}
}

export type ErrorClassification = "fatal" | "recoverable";

export function classifyError(err: unknown): ErrorClassification {
	if (err instanceof ConfigError || err instanceof PrivilegeError) {
		return "fatal";
	}
	return "recoverable";
}

export function describeError(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

export function errnoCode(err: unknown): string | undefined {
	if (err instanceof Error && "code" in err && typeof err.code === "string") {
		return err.code;
	}
	return undefined;
}

export function assertPrivileged(geteuid: (() => number) | undefined = process.geteuid?.bind(process)): void {
	if (!geteuid) {
		throw new PrivilegeError("Cannot determine the effective user id on this platform");
	}
	const euid = geteuid();
	if (euid !== 0) {
		throw new PrivilegeError(
			`Root privileges are required to write unit overrides and reload the service manager (euid ${euid})`,
			euid,
		);
	}
}
