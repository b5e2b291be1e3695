import { ConfigError } from "../errors.js";
import { type CheckSet, type ExecCheck } from "./types.js";

export const NEGATE_MARKER = "!";
export const SHELL_MARKER = "$";

export interface RawCheckLists {
	forbiddenFiles?: string[];
	requiredFiles?: string[];
	activeUnits?: string[];
	runningCommands?: string[];
	runningCommandArgs?: string[];
	execChecks?: string[];
}

/**
 * Reads the leading `!` (expect failure) and `$` (run through the shell)
 * markers off an exec check. Both may be present, in either order.
 */
export function parseExecInvocation(raw: string): ExecCheck {
	let rest = raw.trimStart();
	let negate = false;
	let useShell = false;

	while (rest.length > 0) {
		if (!negate && rest.startsWith(NEGATE_MARKER)) {
			negate = true;
		} else if (!useShell && rest.startsWith(SHELL_MARKER)) {
			useShell = true;
		} else {
			break;
		}
		rest = rest.slice(1).trimStart();
	}

	const invocation = rest.trimEnd();
	if (invocation.length === 0) {
		throw new ConfigError(`Exec check '${raw}' has no command after its markers`);
	}
	const argv = useShell ? [] : splitCommandString(invocation);

	return { kind: "exec", invocation, argv, negate, useShell, source: raw };
}

/**
 * Splits a command line into argv words. Quotes group words and
 * backslash escapes work inside double quotes; nothing else is interpreted.
 */
export function splitCommandString(input: string): string[] {
	const s = input.trim();
	if (!s) return [];
	const out: string[] = [];
	let cur = "";
	let pending = false;
	let inSingle = false;
	let inDouble = false;

	for (let i = 0; i < s.length; i++) {
		const ch = s.charAt(i);
		if (inSingle) {
			if (ch === "'") {
				inSingle = false;
				continue;
			}
			cur += ch;
			continue;
		}
		if (inDouble) {
			if (ch === '"') {
				inDouble = false;
				continue;
			}
			if (ch === "\\" && i + 1 < s.length) {
				i++;
				cur += s.charAt(i);
				continue;
			}
			cur += ch;
			continue;
		}
		if (ch === "'") {
			inSingle = true;
			pending = true;
			continue;
		}
		if (ch === '"') {
			inDouble = true;
			pending = true;
			continue;
		}
		if (/\s/.test(ch)) {
			if (pending) {
				out.push(cur);
				cur = "";
				pending = false;
			}
			continue;
		}
		cur += ch;
		pending = true;
	}

	if (inSingle || inDouble) {
		throw new ConfigError(`Unterminated quote in command: ${input}`);
	}
	if (pending) out.push(cur);
	return out;
}

function requireValue(flag: string, value: string): string {
	if (value.trim().length === 0) {
		throw new ConfigError(`${flag} requires a non-empty value`);
	}
	return value;
}

export function buildCheckSet(lists: RawCheckLists): CheckSet {
	return {
		"forbidden-file": (lists.forbiddenFiles ?? []).map((path) => ({
			kind: "forbidden-file" as const,
			path: requireValue("--forbidden-file", path),
		})),
		"required-file": (lists.requiredFiles ?? []).map((path) => ({
			kind: "required-file" as const,
			path: requireValue("--required-file", path),
		})),
		"active-unit": (lists.activeUnits ?? []).map((unit) => ({
			kind: "active-unit" as const,
			unit: requireValue("--active-unit", unit),
		})),
		"running-command": (lists.runningCommands ?? []).map((name) => ({
			kind: "running-command" as const,
			name: requireValue("--running-command", name),
		})),
		"running-command-args": (lists.runningCommandArgs ?? []).map((pattern) => ({
			kind: "running-command-args" as const,
			pattern: requireValue("--running-command-args", pattern),
		})),
		exec: (lists.execChecks ?? []).map((raw) => parseExecInvocation(raw)),
	};
}
