import { mkdtemp, readdir, readFile, rm, stat } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { dropInDir, dropInPath, removeDropIn, writeDropIn } from "../../src/guard/dropin.js";

describe("guard/dropin.ts", () => {
	let tmpDir: string;

	beforeEach(async () => {
		tmpDir = await mkdtemp(join(tmpdir(), "shutdown-guard-dropin-"));
	});

	afterEach(async () => {
		await rm(tmpDir, { recursive: true, force: true });
	});

	it("places the drop-in under <target>.d", () => {
		const location = { overrideDir: "/run/systemd/system", dropInName: "shutdown-guard.conf" };
		expect(dropInDir(location, "reboot.target")).toBe("/run/systemd/system/reboot.target.d");
		expect(dropInPath(location, "reboot.target")).toBe("/run/systemd/system/reboot.target.d/shutdown-guard.conf");
	});

	it("creates missing directories and overwrites an existing drop-in", async () => {
		const location = { overrideDir: join(tmpDir, "nested", "system"), dropInName: "guard.conf" };

		const path = await writeDropIn(location, "halt.target");
		await writeDropIn(location, "halt.target");

		expect(path).toBe(join(tmpDir, "nested", "system", "halt.target.d", "guard.conf"));
		expect(await readFile(path, "utf-8")).toBe("[Unit]\nRefuseManualStart=yes\n");
		expect((await stat(path)).isFile()).toBe(true);
	});

	it("tolerates removing a drop-in that is not there", async () => {
		const location = { overrideDir: tmpDir, dropInName: "guard.conf" };
		await expect(removeDropIn(location, "halt.target")).resolves.toBe(join(tmpDir, "halt.target.d", "guard.conf"));
		expect(await readdir(tmpDir)).toEqual([]);
	});
});
