import { access } from "node:fs/promises";
import { describeError, errnoCode, ProbeError } from "../errors.js";
import type { GuardLogger } from "../logger.js";
import type { ServiceManager } from "../systemd/manager.js";
import { run, runShell } from "../utils/exec.js";
import type { ProcessInspector } from "./processes.js";
import { CHECK_ORDER, type Check, type CheckSet, describeCheck, type ExecCheck } from "./types.js";

export type VerdictChange = "initial" | "changed" | "unchanged";

export interface Verdict {
	passed: boolean;
	change: VerdictChange;
}

export interface ConditionEngineDeps {
	serviceManager: Pick<ServiceManager, "isActive">;
	processes: ProcessInspector;
	logger: GuardLogger;
	/** Interpreter for `$`-marked exec checks. */
	shell?: string;
	pathExists?: (path: string) => Promise<boolean>;
}

const FAIL_MESSAGES: { [K in Check["kind"]]: string } = {
	"forbidden-file": "Forbidden file exists",
	"required-file": "Required file is missing",
	"active-unit": "Unit is active",
	"running-command": "Command is running",
	"running-command-args": "Command line is running",
	exec: "Exec check did not give the expected result",
};

export async function pathExists(path: string): Promise<boolean> {
	try {
		await access(path);
		return true;
	} catch (err) {
		const code = errnoCode(err);
		if (code === "ENOENT" || code === "ENOTDIR") {
			return false;
		}
		throw new ProbeError(`Cannot stat ${path}: ${describeError(err)}`);
	}
}

export class ConditionEngine {
	private readonly serviceManager: Pick<ServiceManager, "isActive">;
	private readonly processes: ProcessInspector;
	private readonly logger: GuardLogger;
	private readonly shell: string;
	private readonly pathExists: (path: string) => Promise<boolean>;
	private _verdict: Verdict | undefined;

	constructor(deps: ConditionEngineDeps) {
		this.serviceManager = deps.serviceManager;
		this.processes = deps.processes;
		this.logger = deps.logger;
		this.shell = deps.shell ?? "/bin/sh";
		this.pathExists = deps.pathExists ?? pathExists;
	}

	/** Result of the most recent evaluation, if any. */
	get verdict(): Verdict | undefined {
		return this._verdict;
	}

	/** Resolves true when every check passes, i.e. shutdown may proceed. */
	async evaluate(checks: CheckSet): Promise<boolean> {
		const passed = await this.evaluateInOrder(checks);
		this.record(passed);
		return passed;
	}

	private async evaluateInOrder(checks: CheckSet): Promise<boolean> {
		for (const kind of CHECK_ORDER) {
			for (const check of checks[kind]) {
				if (!(await this.runCheck(check))) {
					return false;
				}
			}
		}
		return true;
	}

	private async runCheck(check: Check): Promise<boolean> {
		const subject = describeCheck(check);
		let passed: boolean;
		try {
			passed = await this.probe(check);
		} catch (err) {
			this.logger.error(
				{ tag: `${check.kind}.error`, check: subject, err: describeError(err) },
				`Could not evaluate ${check.kind} check`,
			);
			return false;
		}

		if (passed) {
			this.logger.debug({ tag: `${check.kind}.pass`, check: subject }, `Check passed: ${subject}`);
		} else {
			this.logger.info({ tag: `${check.kind}.fail`, check: subject }, `${FAIL_MESSAGES[check.kind]}: ${subject}`);
		}
		return passed;
	}

	private async probe(check: Check): Promise<boolean> {
		switch (check.kind) {
			case "forbidden-file":
				return !(await this.pathExists(check.path));
			case "required-file":
				return this.pathExists(check.path);
			case "active-unit":
				return !(await this.serviceManager.isActive(check.unit));
			case "running-command":
				return !(await this.processes.hasCommand(check.name));
			case "running-command-args":
				return !(await this.processes.hasCommandLine(check.pattern));
			case "exec":
				return this.runExec(check);
		}
	}

	private async runExec(check: ExecCheck): Promise<boolean> {
		let exitCode: number;
		if (check.useShell) {
			({ exitCode } = await runShell(check.invocation, this.shell));
		} else {
			const [file, ...args] = check.argv;
			if (file === undefined) {
				throw new ProbeError(`Exec check '${check.source}' has no command`);
			}
			({ exitCode } = await run(file, args));
		}

		const succeeded = exitCode === 0;
		const expected = !check.negate;
		this.logger.debug(
			{ tag: "exec.result", check: check.source, exitCode, expected: expected ? "success" : "failure" },
			`Exec check exited with ${exitCode}`,
		);
		return succeeded === expected;
	}

	private record(passed: boolean): void {
		const previous = this._verdict;
		const change: VerdictChange =
			previous === undefined ? "initial" : previous.passed === passed ? "unchanged" : "changed";
		this._verdict = { passed, change };

		if (change === "unchanged") {
			this.logger.debug(
				{ tag: "verdict.steady", passed },
				passed ? "All checks still passing" : "Checks still failing",
			);
			return;
		}
		if (passed) {
			this.logger.info({ tag: "verdict.transition", passed, change }, "All checks passed, shutdown may proceed");
		} else {
			this.logger.warn({ tag: "verdict.transition", passed, change }, "Checks failing, shutdown stays blocked");
		}
	}
}
