/**
 * CLI command for running a program with a stored provider secret.
 *
 * Usage:
 *   credswitch exec <provider> [--bin <path>] [-- args...]
 *
 * Arguments meant for the program go after "--".
 *
 * The secret reaches the child only through a single-use launcher; it is
 * never placed in this process's environment or on a command line.
 */

import path from "node:path";

import type { Command } from "commander";

import { type ProviderConfig, type Settings, loadSettings } from "../config/config.js";
import { resolveConfigDir } from "../config/path.js";
import { validationError } from "../errors.js";
import { runWithSecret } from "../handoff/index.js";
import { getChildLogger } from "../logging.js";
import { getSecret, secretKeyName } from "../secrets/index.js";
import { secretsLocation } from "./secret.js";

const logger = getChildLogger({ module: "cmd-exec" });

export type ExecTarget = {
	secretKey: string;
	envVar: string;
	binary: string;
};

/**
 * Work out which secret, env var and binary `provider` maps to.
 */
export function resolveExecTarget(
	settings: Settings,
	provider: string,
	binOverride?: string,
): ExecTarget {
	const configured: ProviderConfig = settings.providers[provider] ?? {};
	const binary = binOverride ?? configured.binary;
	if (!binary) {
		throw validationError("no binary configured for provider", {
			provider,
			hint: "pass --bin <absolute path> or set providers.<name>.binary in settings.json",
		});
	}
	if (!path.isAbsolute(binary)) {
		throw validationError("binary path must be absolute", { provider, binary });
	}
	return {
		secretKey: configured.secretKey ?? secretKeyName(provider),
		envVar: configured.envVar ?? settings.launcher.envVar,
		binary,
	};
}

export function registerExecCommand(program: Command): void {
	program
		.command("exec <provider> [args...]")
		.description("Run a program with the provider's secret in its environment")
		.option("--bin <path>", "Absolute path of the program to run")
		.action(async (provider: string, args: string[], opts: { bin?: string }) => {
			const configDir = resolveConfigDir();
			const target = resolveExecTarget(loadSettings(configDir), provider, opts.bin);

			const secret = getSecret(secretsLocation(configDir), target.secretKey);
			if (secret === null) {
				throw validationError("no secret stored for provider", {
					provider,
					key: target.secretKey,
					hint: `store one with: credswitch secret set ${target.secretKey}`,
				});
			}

			logger.info(
				{ provider, key: target.secretKey, envVar: target.envVar },
				"handing secret to child process",
			);
			const { exitCode } = await runWithSecret({
				secret,
				binary: target.binary,
				args,
				envVar: target.envVar,
			});
			process.exitCode = exitCode;
		});
}
