import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { exitCodeFor, runWithSecret } from "../../src/handoff/runner.js";
import { useTestLogging, useUnwritableLogging } from "../helpers/logging.js";

describe("exitCodeFor", () => {
	it("prefers the exit code", () => {
		expect(exitCodeFor(0, null)).toBe(0);
		expect(exitCodeFor(7, null)).toBe(7);
	});

	it("maps signals to 128 + signal number", () => {
		expect(exitCodeFor(null, "SIGTERM")).toBe(128 + os.constants.signals.SIGTERM);
		expect(exitCodeFor(null, "SIGINT")).toBe(128 + os.constants.signals.SIGINT);
	});
});

// Targets are /bin/sh stubs, so these run on POSIX only.
describe("runWithSecret", () => {
	let work: string;
	let tempRoot: string;
	let outPath: string;
	let target: string;

	function writeTarget(exitLine: string): void {
		fs.writeFileSync(
			target,
			[
				"#!/bin/sh",
				`printf '%s|%s\\n' "$PROVIDER_TOKEN" "$*" > '${outPath}'`,
				exitLine,
				"",
			].join("\n"),
			{ mode: 0o700 },
		);
	}

	beforeEach(() => {
		work = fs.mkdtempSync(path.join(os.tmpdir(), "credswitch-run-"));
		tempRoot = path.join(work, "tmp");
		fs.mkdirSync(tempRoot);
		outPath = path.join(work, "out.txt");
		target = path.join(work, "target.sh");
	});

	afterEach(() => {
		useTestLogging();
		fs.rmSync(work, { recursive: true, force: true });
	});

	it("hands the secret to the child and returns its exit code", async () => {
		if (process.platform === "win32") return;
		writeTarget("exit 4");
		const result = await runWithSecret({
			secret: "test-secret",
			binary: target,
			args: ["--flag", "value"],
			envVar: "PROVIDER_TOKEN",
			env: { PATH: process.env.PATH, PROVIDER_TOKEN: "from-parent" },
			stdio: "ignore",
			tempRoot,
		});

		expect(result).toEqual({ exitCode: 4, signal: null });
		expect(fs.readFileSync(outPath, "utf-8")).toBe("test-secret|--flag value\n");
		expect(fs.readdirSync(tempRoot)).toEqual([]);
	});

	it("returns the shell status when the binary is missing", async () => {
		if (process.platform === "win32") return;
		writeTarget("exit 0");
		const result = await runWithSecret({
			secret: Buffer.from("test-secret", "utf-8"),
			binary: path.join(work, "missing"),
			envVar: "PROVIDER_TOKEN",
			env: { PATH: process.env.PATH, PROVIDER_TOKEN: "from-parent" },
			stdio: "ignore",
			tempRoot,
		});

		expect(result.exitCode).toBe(127);
		expect(fs.existsSync(outPath)).toBe(false);
		expect(fs.readdirSync(tempRoot)).toEqual([]);
	});

	it("settles and cleans up when the log file cannot be opened", async () => {
		if (process.platform === "win32") return;
		writeTarget("exit 3");
		useUnwritableLogging(work);
		const result = await runWithSecret({
			secret: "test-secret",
			binary: target,
			envVar: "PROVIDER_TOKEN",
			env: { PATH: process.env.PATH },
			stdio: "ignore",
			tempRoot,
		});

		expect(result).toEqual({ exitCode: 3, signal: null });
		expect(fs.readdirSync(tempRoot)).toEqual([]);
	});

	it("reports a signalled child as 128 + signal", async () => {
		if (process.platform === "win32") return;
		writeTarget("kill -TERM $$");
		const result = await runWithSecret({
			secret: "test-secret",
			binary: target,
			env: { PATH: process.env.PATH },
			stdio: "ignore",
			tempRoot,
		});

		expect(result).toEqual({ exitCode: 128 + os.constants.signals.SIGTERM, signal: "SIGTERM" });
	});

	it("cleans up when the launcher cannot be generated", async () => {
		if (process.platform === "win32") return;
		await expect(
			runWithSecret({ secret: "test-secret", binary: target, envVar: "NOT-VALID", tempRoot }),
		).rejects.toThrow("environment variable name is invalid");
		expect(fs.readdirSync(tempRoot)).toEqual([]);
	});

	it("leaves no signal handlers behind", async () => {
		if (process.platform === "win32") return;
		writeTarget("exit 0");
		const before = process.listenerCount("SIGINT");
		await runWithSecret({
			secret: "test-secret",
			binary: target,
			env: { PATH: process.env.PATH },
			stdio: "ignore",
			tempRoot,
		});
		expect(process.listenerCount("SIGINT")).toBe(before);
	});
});
