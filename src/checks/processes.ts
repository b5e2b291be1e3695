import { CommandLaunchError, ProbeError } from "../errors.js";
import { type CommandRunner, run } from "../utils/exec.js";

export interface ProcessInspector {
	/** A process whose command name is exactly `name` exists. */
	hasCommand(name: string): Promise<boolean>;
	/** A process whose full command line is exactly `pattern` exists. */
	hasCommandLine(pattern: string): Promise<boolean>;
}

/** `pgrep` takes an extended regex; this makes `value` match only itself. */
export function escapePattern(value: string): string {
	return value.replace(/[.[\]{}()*+?^$|\\]/g, "\\$&");
}

/** Asks `pgrep` with whole-string matching; exit 1 means "no match". */
export class PgrepInspector implements ProcessInspector {
	private readonly pgrep: string;
	private readonly runner: CommandRunner;

	constructor(pgrep = "pgrep", runner: CommandRunner = run) {
		this.pgrep = pgrep;
		this.runner = runner;
	}

	hasCommand(name: string): Promise<boolean> {
		return this.query(["-x", "--", escapePattern(name)]);
	}

	hasCommandLine(pattern: string): Promise<boolean> {
		return this.query(["-x", "-f", "--", escapePattern(pattern)]);
	}

	private async query(args: string[]): Promise<boolean> {
		let exitCode: number;
		let stderr: string;
		try {
			({ exitCode, stderr } = await this.runner(this.pgrep, args));
		} catch (err) {
			if (err instanceof CommandLaunchError) {
				throw new ProbeError(err.message);
			}
			throw err;
		}

		switch (exitCode) {
			case 0:
				return true;
			case 1:
				return false;
			default:
				throw new ProbeError(`${this.pgrep} ${args.join(" ")} exited with ${exitCode}: ${stderr.trim()}`);
		}
	}
}
