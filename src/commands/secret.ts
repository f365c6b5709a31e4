/**
 * CLI commands for managing stored secrets.
 *
 * Usage:
 *   credswitch secret set <name>      (value from stdin)
 *   credswitch secret remove <name>
 *   credswitch secret list
 */

import type { Command } from "commander";

import { promptHidden, readStdin } from "../cli/prompt.js";
import { resolveConfigDir } from "../config/path.js";
import { validationError } from "../errors.js";
import { ensureKeyFile, keyFilePath } from "../keys/index.js";
import {
	type SecretsLocation,
	listSecretNames,
	removeSecret,
	secretsFilePath,
	setSecret,
} from "../secrets/index.js";

export function secretsLocation(configDir: string = resolveConfigDir()): SecretsLocation {
	return { secretsPath: secretsFilePath(configDir), keyPath: keyFilePath(configDir) };
}

async function readSecretValue(name: string): Promise<string> {
	if (process.stdin.isTTY) {
		const value = await promptHidden(`Value for ${name}: `);
		if (value === null) {
			throw validationError("no value entered");
		}
		return value;
	}
	return readStdin();
}

export function registerSecretCommands(program: Command): void {
	const secret = program.command("secret").description("Manage encrypted secrets");

	secret
		.command("set <name>")
		.description("Store a secret, reading its value from stdin")
		.action(async (name: string) => {
			const configDir = resolveConfigDir();
			ensureKeyFile(configDir);
			const value = await readSecretValue(name);
			setSecret(secretsLocation(configDir), name, value);
			console.log(`Stored ${name}.`);
		});

	secret
		.command("remove <name>")
		.alias("rm")
		.description("Delete a stored secret")
		.action((name: string) => {
			if (removeSecret(secretsLocation(), name)) {
				console.log(`Removed ${name}.`);
			} else {
				console.log(`No secret named ${name}.`);
			}
		});

	secret
		.command("list")
		.alias("ls")
		.description("List stored secret names")
		.action(() => {
			const names = listSecretNames(secretsLocation());
			if (names.length === 0) {
				console.log("No secrets stored.");
				return;
			}
			for (const name of names) console.log(name);
		});
}
