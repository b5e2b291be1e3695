import { execFile, type ExecFileOptions } from "node:child_process";
import { CommandLaunchError } from "../errors.js";

export interface RunResult {
	exitCode: number;
	stdout: string;
	stderr: string;
}

export type CommandRunner = (file: string, args: readonly string[]) => Promise<RunResult>;

/**
 * Runs `file` directly (no shell) and resolves with its exit code, whatever
 * it is. Rejects only when the process cannot be started or dies on a signal.
 */
export function run(file: string, args: readonly string[] = [], options: ExecFileOptions = {}): Promise<RunResult> {
	const label = [file, ...args].join(" ");
	return new Promise((resolve, reject) => {
		execFile(file, args, { maxBuffer: 50 * 1024 * 1024, encoding: "utf-8", ...options }, (error, stdout, stderr) => {
			const out = typeof stdout === "string" ? stdout : "";
			const errOut = typeof stderr === "string" ? stderr : "";
			if (!error) {
				resolve({ exitCode: 0, stdout: out, stderr: errOut });
				return;
			}
			if (typeof error.code === "number") {
				resolve({ exitCode: error.code, stdout: out, stderr: errOut });
				return;
			}
			if (error.signal) {
				reject(new CommandLaunchError(label, `terminated by ${error.signal}`));
				return;
			}
			reject(new CommandLaunchError(label, error.code ?? error.message));
		});
	});
}

/** Runs `command` through `shell -c` and resolves with the shell's exit code. */
export function runShell(command: string, shell = "/bin/sh", options: ExecFileOptions = {}): Promise<RunResult> {
	return run(shell, ["-c", command], options);
}
