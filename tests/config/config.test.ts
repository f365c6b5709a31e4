import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
	DEFAULT_TOKEN_ENV_VAR,
	SettingsError,
	getSettingsPath,
	isValidEnvVarName,
	loadSettings,
	resetSettingsCache,
} from "../../src/config/config.js";

describe("loadSettings", () => {
	let dir: string;

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), "credswitch-settings-"));
		resetSettingsCache();
	});

	afterEach(() => {
		resetSettingsCache();
		fs.rmSync(dir, { recursive: true, force: true });
	});

	it("returns defaults when the file is missing", () => {
		expect(loadSettings(dir)).toEqual({
			launcher: { envVar: DEFAULT_TOKEN_ENV_VAR },
			providers: {},
		});
	});

	it("parses JSON5 with comments and trailing commas", () => {
		fs.writeFileSync(
			getSettingsPath(dir),
			`{
				// where logs go
				logging: { level: "debug" },
				launcher: { envVar: "PROVIDER_TOKEN" },
				providers: {
					openrouter: { secretKey: "OPENROUTER_KEY", binary: "/usr/local/bin/claude", },
				},
			}`,
		);
		const settings = loadSettings(dir);
		expect(settings.logging).toEqual({ level: "debug" });
		expect(settings.launcher.envVar).toBe("PROVIDER_TOKEN");
		expect(settings.providers.openrouter).toEqual({
			secretKey: "OPENROUTER_KEY",
			binary: "/usr/local/bin/claude",
		});
	});

	it("rejects invalid env var names with the field path", () => {
		fs.writeFileSync(getSettingsPath(dir), `{ launcher: { envVar: "1BAD" } }`);
		expect(() => loadSettings(dir)).toThrow(
			"Invalid settings file: launcher.envVar: must be a valid environment variable name",
		);
	});

	it("reports unparsable files as SettingsError", () => {
		fs.writeFileSync(getSettingsPath(dir), "{ nope");
		expect(() => loadSettings(dir)).toThrow(SettingsError);
	});

	it("caches by mtime and reloads on change", () => {
		const file = getSettingsPath(dir);
		fs.writeFileSync(file, `{ launcher: { envVar: "FIRST" } }`);
		const first = loadSettings(dir);
		expect(loadSettings(dir)).toBe(first);

		fs.writeFileSync(file, `{ launcher: { envVar: "SECOND" } }`);
		const later = new Date(Date.now() + 5000);
		fs.utimesSync(file, later, later);
		expect(loadSettings(dir).launcher.envVar).toBe("SECOND");
	});
});

describe("isValidEnvVarName", () => {
	it("accepts identifiers", () => {
		expect(isValidEnvVarName("ANTHROPIC_AUTH_TOKEN")).toBe(true);
		expect(isValidEnvVarName("_x1")).toBe(true);
	});

	it("rejects everything else", () => {
		expect(isValidEnvVarName("")).toBe(false);
		expect(isValidEnvVarName("1ABC")).toBe(false);
		expect(isValidEnvVarName("A-B")).toBe(false);
		expect(isValidEnvVarName("A B")).toBe(false);
	});
});
