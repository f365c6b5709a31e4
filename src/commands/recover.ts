/**
 * CLI commands for recovery phrases.
 *
 * Usage:
 *   credswitch recover create
 *   credswitch recover restore <phrase>
 */

import type { Command } from "commander";

import { isInteractive, promptYesNo } from "../cli/prompt.js";
import { resolveConfigDir } from "../config/path.js";
import { keyFilePath } from "../keys/index.js";
import { createRecoveryPhrase, restoreFromPhrase } from "../recovery/phrase.js";

export function registerRecoverCommands(program: Command): void {
	const recover = program.command("recover").description("Back up or restore the key as a phrase");

	recover
		.command("create")
		.description("Print a recovery phrase for the current key")
		.action(() => {
			const phrase = createRecoveryPhrase(keyFilePath(resolveConfigDir()));
			console.log("Recovery phrase (anyone holding it can decrypt your secrets):");
			console.log("");
			console.log(phrase);
		});

	recover
		.command("restore <phrase>")
		.description("Write the key encoded in a recovery phrase, replacing the current key")
		.option("-y, --yes", "Skip the confirmation prompt")
		.action(async (phrase: string, opts: { yes?: boolean }) => {
			if (!opts.yes && isInteractive()) {
				if (!(await promptYesNo("Replace the current key file?"))) {
					console.log("Aborted. No changes made.");
					return;
				}
			}
			const keyPath = restoreFromPhrase(resolveConfigDir(), phrase);
			console.log(`Restored key file: ${keyPath}`);
		});
}
