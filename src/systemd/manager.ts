import { CommandLaunchError, ServiceManagerError } from "../errors.js";
import { type CommandRunner, run, type RunResult } from "../utils/exec.js";

/**
 * The parts of the service manager the guard relies on. Block state itself
 * is changed through drop-in files; the manager only reports and reloads it.
 */
export interface ServiceManager {
	/** Whether `target` currently refuses manual start. */
	isBlocked(target: string): Promise<boolean>;
	/** Makes the manager re-read unit configuration, drop-ins included. */
	reload(): Promise<void>;
	isActive(unit: string): Promise<boolean>;
}

export class SystemctlManager implements ServiceManager {
	private readonly systemctl: string;
	private readonly runner: CommandRunner;

	constructor(systemctl = "systemctl", runner: CommandRunner = run) {
		this.systemctl = systemctl;
		this.runner = runner;
	}

	async isBlocked(target: string): Promise<boolean> {
		const result = await this.invoke(["show", "--property=RefuseManualStart", "--value", target]);
		if (result.exitCode !== 0) {
			throw new ServiceManagerError(
				`${this.systemctl} show ${target} exited with ${result.exitCode}: ${result.stderr.trim()}`,
			);
		}
		return result.stdout.trim() === "yes";
	}

	async reload(): Promise<void> {
		const result = await this.invoke(["daemon-reload"]);
		if (result.exitCode !== 0) {
			throw new ServiceManagerError(
				`${this.systemctl} daemon-reload exited with ${result.exitCode}: ${result.stderr.trim()}`,
			);
		}
	}

	async isActive(unit: string): Promise<boolean> {
		const result = await this.invoke(["is-active", "--quiet", unit]);
		return result.exitCode === 0;
	}

	private async invoke(args: string[]): Promise<RunResult> {
		try {
			return await this.runner(this.systemctl, args);
		} catch (err) {
			if (err instanceof CommandLaunchError) {
				throw new ServiceManagerError(err.message);
			}
			throw err;
		}
	}
}
