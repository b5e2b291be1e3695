export interface ForbiddenFileCheck {
	kind: "forbidden-file";
	path: string;
}

export interface RequiredFileCheck {
	kind: "required-file";
	path: string;
}

export interface ActiveUnitCheck {
	kind: "active-unit";
	unit: string;
}

export interface RunningCommandCheck {
	kind: "running-command";
	name: string;
}

export interface RunningCommandArgsCheck {
	kind: "running-command-args";
	pattern: string;
}

export interface ExecCheck {
	kind: "exec";
	/** Invocation with the leading markers stripped. */
	invocation: string;
	/** Words for direct execution; empty for shell invocations. */
	argv: readonly string[];
	negate: boolean;
	useShell: boolean;
	/** The invocation as configured, markers included. */
	source: string;
}

export type Check =
	| ForbiddenFileCheck
	| RequiredFileCheck
	| ActiveUnitCheck
	| RunningCommandCheck
	| RunningCommandArgsCheck
	| ExecCheck;

export type CheckKind = Check["kind"];

export type CheckOfKind<K extends CheckKind> = Extract<Check, { kind: K }>;

/** Kinds are evaluated in this order; evaluation stops at the first kind that fails. */
export const CHECK_ORDER = [
	"forbidden-file",
	"required-file",
	"active-unit",
	"running-command",
	"running-command-args",
	"exec",
] as const satisfies readonly CheckKind[];

export type CheckSet = {
	readonly [K in CheckKind]: readonly CheckOfKind<K>[];
};

export function emptyCheckSet(): CheckSet {
	return {
		"forbidden-file": [],
		"required-file": [],
		"active-unit": [],
		"running-command": [],
		"running-command-args": [],
		exec: [],
	};
}

export function countChecks(checks: CheckSet): number {
	return CHECK_ORDER.reduce((total, kind) => total + checks[kind].length, 0);
}

export function describeCheck(check: Check): string {
	switch (check.kind) {
		case "forbidden-file":
		case "required-file":
			return check.path;
		case "active-unit":
			return check.unit;
		case "running-command":
			return check.name;
		case "running-command-args":
			return check.pattern;
		case "exec":
			return check.source;
	}
}
