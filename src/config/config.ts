import fs from "node:fs";
import path from "node:path";

import JSON5 from "json5";
import { z } from "zod";

import { resolveConfigDir } from "./path.js";

export const SETTINGS_FILE_NAME = "settings.json";
export const DEFAULT_TOKEN_ENV_VAR = "ANTHROPIC_AUTH_TOKEN";

const ENV_VAR_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

// Logging configuration schema
const LoggingConfigSchema = z.object({
	level: z.enum(["silent", "fatal", "error", "warn", "info", "debug", "trace"]).optional(),
	file: z.string().optional(),
});

const LauncherConfigSchema = z.object({
	envVar: z
		.string()
		.regex(ENV_VAR_PATTERN, "must be a valid environment variable name")
		.default(DEFAULT_TOKEN_ENV_VAR),
});

const ProviderConfigSchema = z.object({
	// Env var the child process reads its key from (overrides launcher.envVar)
	envVar: z.string().regex(ENV_VAR_PATTERN, "must be a valid environment variable name").optional(),
	// Record name inside the secrets file (default: <PROVIDER>_API_KEY)
	secretKey: z.string().min(1).optional(),
	// Absolute path of the binary `exec` launches when --bin is not given
	binary: z.string().optional(),
});

// Main settings schema
const SettingsSchema = z.object({
	logging: LoggingConfigSchema.optional(),
	launcher: LauncherConfigSchema.default({}),
	providers: z.record(ProviderConfigSchema).default({}),
});

export type Settings = z.infer<typeof SettingsSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;

export class SettingsError extends Error {
	constructor(
		message: string,
		public readonly settingsPath: string,
	) {
		super(message);
		this.name = "SettingsError";
	}
}

let cachedSettings: Settings | null = null;
let settingsMtime: number | null = null;
let cachedSettingsPath: string | null = null;

export function getSettingsPath(configDir: string = resolveConfigDir()): string {
	return path.join(configDir, SETTINGS_FILE_NAME);
}

function defaults(): Settings {
	return SettingsSchema.parse({});
}

/**
 * Load and validate `<configDir>/settings.json` (JSON5).
 * A missing or unreadable file yields defaults; an invalid one throws.
 */
export function loadSettings(configDir: string = resolveConfigDir()): Settings {
	const settingsPath = getSettingsPath(configDir);

	let stat: fs.Stats;
	try {
		stat = fs.statSync(settingsPath);
	} catch (err) {
		const code = (err as NodeJS.ErrnoException).code;
		if (code === "ENOENT" || code === "EACCES") {
			return defaults();
		}
		throw err;
	}

	// Invalidate cache if path changed or mtime changed
	if (cachedSettings && cachedSettingsPath === settingsPath && settingsMtime === stat.mtimeMs) {
		return cachedSettings;
	}

	const raw = fs.readFileSync(settingsPath, "utf-8");
	let parsed: unknown;
	try {
		parsed = JSON5.parse(raw);
	} catch (err) {
		throw new SettingsError(
			`Invalid settings file: ${err instanceof Error ? err.message : String(err)}`,
			settingsPath,
		);
	}

	const result = SettingsSchema.safeParse(parsed);
	if (!result.success) {
		const issues = result.error.issues
			.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
			.join("; ");
		throw new SettingsError(`Invalid settings file: ${issues}`, settingsPath);
	}

	cachedSettings = result.data;
	settingsMtime = stat.mtimeMs;
	cachedSettingsPath = settingsPath;

	return result.data;
}

/**
 * Reset the settings cache (useful for testing).
 */
export function resetSettingsCache(): void {
	cachedSettings = null;
	settingsMtime = null;
	cachedSettingsPath = null;
}

export function isValidEnvVarName(name: string): boolean {
	return ENV_VAR_PATTERN.test(name);
}
