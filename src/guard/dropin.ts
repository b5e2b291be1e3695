import { mkdir, rm, rmdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { errnoCode } from "../errors.js";

export const DROP_IN_CONTENT = "[Unit]\nRefuseManualStart=yes\n";

export interface DropInLocation {
	overrideDir: string;
	dropInName: string;
}

export function dropInDir(location: DropInLocation, target: string): string {
	return join(location.overrideDir, `${target}.d`);
}

export function dropInPath(location: DropInLocation, target: string): string {
	return join(dropInDir(location, target), location.dropInName);
}

export async function writeDropIn(location: DropInLocation, target: string): Promise<string> {
	const path = dropInPath(location, target);
	await mkdir(dropInDir(location, target), { recursive: true, mode: 0o755 });
	await writeFile(path, DROP_IN_CONTENT, { encoding: "utf-8", mode: 0o644 });
	return path;
}

/**
 * Deletes the drop-in file, then its `<target>.d` directory if nothing else
 * lives there. Other drop-ins for the same target are left untouched.
 */
export async function removeDropIn(location: DropInLocation, target: string): Promise<string> {
	const path = dropInPath(location, target);
	await rm(path, { force: true });
	try {
		await rmdir(dropInDir(location, target));
	} catch (err) {
		const code = errnoCode(err);
		if (code !== "ENOENT" && code !== "ENOTEMPTY" && code !== "EEXIST") {
			throw err;
		}
	}
	return path;
}
