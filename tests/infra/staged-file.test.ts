import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { isCredentialError } from "../../src/errors.js";
import { stageFile } from "../../src/infra/staged-file.js";

describe("stageFile", () => {
	let dir: string;
	let target: string;

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), "credswitch-stage-"));
		target = path.join(dir, "data.bin");
	});

	afterEach(() => {
		fs.rmSync(dir, { recursive: true, force: true });
	});

	it("replaces the target on commit", () => {
		fs.writeFileSync(target, "old");
		const staged = stageFile(target, { mode: 0o600 });
		staged.write("new");
		expect(fs.readFileSync(target, "utf-8")).toBe("old");
		staged.commit();
		staged.release();

		expect(staged.committed).toBe(true);
		expect(fs.readFileSync(target, "utf-8")).toBe("new");
		expect(fs.existsSync(staged.tempPath)).toBe(false);
		if (process.platform !== "win32") {
			expect(fs.statSync(target).mode & 0o777).toBe(0o600);
		}
	});

	it("places the temp file beside the target", () => {
		const staged = stageFile(target, { mode: 0o600, suffix: ".part" });
		try {
			expect(path.dirname(staged.tempPath)).toBe(dir);
			expect(path.basename(staged.tempPath)).toMatch(/^data\.bin\.[0-9a-f]{12}\.part$/);
		} finally {
			staged.release();
		}
	});

	it("removes the temp file on release without commit", () => {
		fs.writeFileSync(target, "old");
		const staged = stageFile(target, { mode: 0o600 });
		staged.write("new");
		staged.release();
		staged.release();

		expect(fs.existsSync(staged.tempPath)).toBe(false);
		expect(fs.readFileSync(target, "utf-8")).toBe("old");
		expect(fs.readdirSync(dir)).toEqual(["data.bin"]);
	});

	it("allows a single write", () => {
		const staged = stageFile(target, { mode: 0o600 });
		try {
			staged.write("a");
			expect(() => staged.write("b")).toThrow("staged file is no longer writable");
		} finally {
			staged.release();
		}
	});

	it("refuses to commit after release", () => {
		const staged = stageFile(target, { mode: 0o600 });
		staged.release();
		expect(() => staged.commit()).toThrow("staged file was already released");
		expect(fs.existsSync(target)).toBe(false);
	});

	it("reports a missing directory as a storage error", () => {
		try {
			stageFile(path.join(dir, "missing", "x"), { mode: 0o600 });
			expect.unreachable();
		} catch (err) {
			expect(isCredentialError(err) && err.kind).toBe("storage");
			expect(isCredentialError(err) && err.reason).toBe("not-found");
		}
	});
});
