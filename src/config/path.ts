import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { storageError } from "../errors.js";

export const APP_NAME = "credswitch";
export const CONFIG_DIR_ENV = "CREDSWITCH_CONFIG_DIR";

/**
 * Global config directory override. Set via CLI or programmatically.
 */
let configDirOverride: string | null = null;

/**
 * Platform default:
 * - Windows: %APPDATA%\credswitch (falls back to ~/AppData/Roaming)
 * - elsewhere: $XDG_CONFIG_HOME/credswitch, or ~/.config/credswitch
 */
export function defaultConfigDir(
	platform: NodeJS.Platform = process.platform,
	env: NodeJS.ProcessEnv = process.env,
	home: string = os.homedir(),
): string {
	if (platform === "win32") {
		const appData = env.APPDATA || path.win32.join(home, "AppData", "Roaming");
		return path.win32.join(appData, APP_NAME);
	}
	const xdg = env.XDG_CONFIG_HOME;
	if (xdg && path.isAbsolute(xdg)) {
		return path.join(xdg, APP_NAME);
	}
	return path.join(home, ".config", APP_NAME);
}

/**
 * Resolve the config directory from:
 * 1. Programmatic override (set via setConfigDir)
 * 2. CREDSWITCH_CONFIG_DIR environment variable
 * 3. Platform default
 */
export function resolveConfigDir(): string {
	if (configDirOverride) {
		return configDirOverride;
	}

	const envDir = process.env[CONFIG_DIR_ENV];
	if (envDir) {
		return path.resolve(envDir);
	}

	return defaultConfigDir();
}

/**
 * Set the config directory override. Called from CLI parsing.
 */
export function setConfigDir(dir: string | null): void {
	configDirOverride = dir ? path.resolve(dir) : null;
}

/**
 * Reset config directory to default (for testing).
 */
export function resetConfigDir(): void {
	configDirOverride = null;
}

/**
 * Create the config directory if needed and restrict it to the owner.
 */
export function ensureConfigDir(dir: string): void {
	try {
		fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
	} catch (err) {
		throw storageError("failed to create config directory", dir, err);
	}
	try {
		fs.chmodSync(dir, 0o700);
	} catch {
		// Some filesystems ignore modes; the directory is still usable.
	}
}
