import { describe, expect, it } from "vitest";

import { commandHint, formatErrorLines } from "../../src/cli/report.js";
import { cryptoError, formatError, storageError, validationError } from "../../src/errors.js";

// biome-ignore lint/suspicious/noControlCharactersInRegex: strips ANSI colors
const ANSI = /\u001b\[[0-9;]*m/g;

function plain(lines: string[]): string[] {
	return lines.map((line) => line.replace(ANSI, ""));
}

describe("commandHint", () => {
	it("points key problems at recovery", () => {
		expect(commandHint(formatError("key file is empty", "empty"))).toBe(
			"If you saved a recovery phrase, run: credswitch recover restore <phrase>",
		);
		expect(commandHint(cryptoError("wrong key", "authentication-failed"))).toBe(
			"If the key was replaced, run: credswitch recover restore <phrase>",
		);
	});

	it("suggests init for a missing key file", () => {
		const enoent = Object.assign(new Error("missing"), { code: "ENOENT" });
		expect(commandHint(storageError("failed to read key file", "/cfg/credswitch.key", enoent))).toBe(
			"Run: credswitch init",
		);
		expect(commandHint(storageError("failed to read", "/cfg/secrets.enc", enoent))).toBeUndefined();
	});

	it("has nothing for phrase mismatches or validation", () => {
		expect(commandHint(cryptoError("recovery phrase does not match", "phrase-mismatch"))).toBeUndefined();
		expect(commandHint(validationError("bad"))).toBeUndefined();
	});
});

describe("formatErrorLines", () => {
	it("prints the summary, the hint and the command", () => {
		const err = formatError("key file is empty", "empty", { path: "/k", hint: "restore it" });
		expect(plain(formatErrorLines(err))).toEqual([
			"Error: format: key file is empty (path=/k)",
			"Hint: restore it",
			"If you saved a recovery phrase, run: credswitch recover restore <phrase>",
		]);
	});

	it("prints foreign errors by message", () => {
		expect(plain(formatErrorLines(new Error("Invalid settings file: x")))).toEqual([
			"Error: Invalid settings file: x",
		]);
	});
});
