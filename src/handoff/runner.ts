/**
 * Run a target binary with one secret handed over through a launcher.
 */

import { type StdioOptions, spawn } from "node:child_process";
import os from "node:os";

import { DEFAULT_TOKEN_ENV_VAR } from "../config/config.js";
import { storageError } from "../errors.js";
import { getChildLogger } from "../logging.js";
import { createTempAuthDir, removeTempAuthDir, writeTokenFile } from "./auth-dir.js";
import { generateLauncherScript, launchCommand } from "./launcher.js";

const logger = getChildLogger({ module: "handoff" });

const FORWARDED_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

export type RunWithSecretOptions = {
	secret: string | Uint8Array;
	/** Absolute path of the program to run. */
	binary: string;
	args?: readonly string[];
	/** Defaults to ANTHROPIC_AUTH_TOKEN. */
	envVar?: string;
	/** Base environment for the child. Defaults to `process.env`. */
	env?: NodeJS.ProcessEnv;
	stdio?: StdioOptions;
	platform?: NodeJS.Platform;
	/** Parent directory for the temp auth directory. Defaults to the OS temp dir. */
	tempRoot?: string;
};

export type RunResult = {
	exitCode: number;
	signal: NodeJS.Signals | null;
};

export function exitCodeFor(code: number | null, signal: NodeJS.Signals | null): number {
	if (code !== null) return code;
	if (signal) return 128 + (os.constants.signals[signal] ?? 0);
	return 1;
}

/**
 * Write the secret to a private token file, generate a launcher for it, and
 * run the launcher. The auth directory is removed once the child exits,
 * whatever the outcome.
 */
export async function runWithSecret(options: RunWithSecretOptions): Promise<RunResult> {
	const envVar = options.envVar || DEFAULT_TOKEN_ENV_VAR;
	const authDir = createTempAuthDir(options.tempRoot);
	try {
		const tokenPath = writeTokenFile(authDir, options.secret);
		const script = generateLauncherScript(
			authDir,
			tokenPath,
			options.binary,
			options.args ?? [],
			envVar,
			{ platform: options.platform },
		);
		const { command, args } = launchCommand(script);

		// The child gets the secret only from the launcher.
		const env = { ...(options.env ?? process.env) };
		delete env[envVar];

		logger.debug({ binary: options.binary, envVar }, "starting launcher");
		return await new Promise<RunResult>((resolve, reject) => {
			const child = spawn(command, args, { env, stdio: options.stdio ?? "inherit" });

			const forward = (signal: NodeJS.Signals) => {
				child.kill(signal);
			};
			const handlers = FORWARDED_SIGNALS.map((signal) => {
				const handler = () => forward(signal);
				process.on(signal, handler);
				return [signal, handler] as const;
			});
			const detach = () => {
				for (const [signal, handler] of handlers) process.off(signal, handler);
			};

			child.once("error", (err) => {
				detach();
				reject(storageError("failed to start launcher", script.scriptPath, err));
			});
			child.once("close", (code, signal) => {
				detach();
				const exitCode = exitCodeFor(code, signal);
				logger.debug({ exitCode, signal }, "launcher exited");
				resolve({ exitCode, signal });
			});
		});
	} finally {
		removeTempAuthDir(authDir);
	}
}
