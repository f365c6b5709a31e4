/**
 * Single-use launcher scripts.
 *
 * A launcher reads the token file into one environment variable, deletes
 * the token file, and replaces itself with the target binary. It embeds the
 * token path, never the token. Unix launchers are `#!/bin/sh` scripts run
 * directly; Windows launchers are `.ps1` files run through PowerShell.
 */

import { randomBytes } from "node:crypto";
import fs from "node:fs";
import path from "node:path";

import { DEFAULT_TOKEN_ENV_VAR, isValidEnvVarName } from "../config/config.js";
import { storageError, validationError } from "../errors.js";
import { escapeShellArg, posixQuote, powerShellLiteral } from "./escape.js";

export type ExecutionMode = "direct" | "interpreter";

export interface LauncherScript {
	scriptPath: string;
	/** "interpreter": run through PowerShell. "direct": exec the script itself. */
	executionMode: ExecutionMode;
}

export interface LauncherOptions {
	/** Host platform to generate for. Defaults to `process.platform`. */
	platform?: NodeJS.Platform;
}

export function renderUnixLauncher(
	tokenPath: string,
	targetBinary: string,
	targetArgs: readonly string[],
	envVarName: string,
): string {
	const token = posixQuote(tokenPath);
	const command = [targetBinary, ...targetArgs].map(posixQuote).join(" ");
	return [
		"#!/bin/sh",
		"# credswitch launcher (single use)",
		`${envVarName}="$(cat -- ${token})" || { rm -f -- ${token}; echo 'credswitch: cannot read token file' >&2; exit 1; }`,
		`rm -f -- ${token}`,
		`export ${envVarName}`,
		`exec ${command}`,
		"",
	].join("\n");
}

export function renderWindowsLauncher(
	tokenPath: string,
	targetBinary: string,
	targetArgs: readonly string[],
	envVarName: string,
): string {
	const token = powerShellLiteral(tokenPath);
	const args = targetArgs.map((arg) => ` ${escapeShellArg(arg)}`).join("");
	return [
		"# credswitch launcher (single use)",
		"$ErrorActionPreference = 'Stop'",
		"try {",
		`\t$env:${envVarName} = Get-Content -LiteralPath ${token} -Raw -Encoding UTF8`,
		"} catch {",
		`\tRemove-Item -LiteralPath ${token} -Force -ErrorAction SilentlyContinue`,
		"\t[Console]::Error.WriteLine('credswitch: cannot read token file')",
		"\texit 1",
		"}",
		`Remove-Item -LiteralPath ${token} -Force`,
		`& ${powerShellLiteral(targetBinary)}${args}`,
		"exit $LASTEXITCODE",
		"",
	].join("\r\n");
}

/**
 * Write a launcher for `targetBinary targetArgs...` into `authDir`.
 */
export function generateLauncherScript(
	authDir: string,
	tokenPath: string,
	targetBinary: string,
	targetArgs: readonly string[] = [],
	envVarName: string = DEFAULT_TOKEN_ENV_VAR,
	options: LauncherOptions = {},
): LauncherScript {
	if (tokenPath === "") {
		throw validationError("token path cannot be empty");
	}
	if (targetBinary === "") {
		throw validationError("target binary path cannot be empty");
	}
	const envVar = envVarName === "" ? DEFAULT_TOKEN_ENV_VAR : envVarName;
	if (!isValidEnvVarName(envVar)) {
		throw validationError("environment variable name is invalid", { envVar });
	}

	const windows = (options.platform ?? process.platform) === "win32";
	const body = windows
		? renderWindowsLauncher(tokenPath, targetBinary, targetArgs, envVar)
		: renderUnixLauncher(tokenPath, targetBinary, targetArgs, envVar);
	const scriptPath = path.join(
		authDir,
		`launcher-${randomBytes(8).toString("hex")}${windows ? ".ps1" : ""}`,
	);

	let fd: number;
	try {
		fd = fs.openSync(scriptPath, "wx", windows ? 0o600 : 0o700);
	} catch (err) {
		throw storageError("failed to create launcher script", scriptPath, err);
	}
	try {
		fs.writeFileSync(fd, body);
		if (!windows) fs.fchmodSync(fd, 0o700);
	} catch (err) {
		fs.closeSync(fd);
		fs.rmSync(scriptPath, { force: true });
		throw storageError("failed to write launcher script", scriptPath, err);
	}
	fs.closeSync(fd);

	return { scriptPath, executionMode: windows ? "interpreter" : "direct" };
}

/**
 * The process to spawn for a launcher.
 */
export function launchCommand(script: LauncherScript): { command: string; args: string[] } {
	if (script.executionMode === "interpreter") {
		return {
			command: "powershell",
			args: ["-NoProfile", "-ExecutionPolicy", "Bypass", "-File", script.scriptPath],
		};
	}
	return { command: script.scriptPath, args: [] };
}
