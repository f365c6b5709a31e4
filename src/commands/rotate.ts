/**
 * CLI command for replacing the key pair.
 *
 * Usage:
 *   credswitch rotate [--yes]
 */

import type { Command } from "commander";

import { isInteractive, promptYesNo } from "../cli/prompt.js";
import { resolveConfigDir } from "../config/path.js";
import { validationError } from "../errors.js";
import { rotateKey } from "../keys/index.js";

export function registerRotateCommand(program: Command): void {
	program
		.command("rotate")
		.description("Generate a new key and re-encrypt stored secrets under it")
		.option("-y, --yes", "Skip the confirmation prompt")
		.action(async (opts: { yes?: boolean }) => {
			if (!opts.yes) {
				if (!isInteractive()) {
					throw validationError("refusing to rotate without confirmation", {
						hint: "pass --yes when not running in a terminal",
					});
				}
				console.log("Rotating replaces your key. Existing recovery phrases stop working.");
				if (!(await promptYesNo("Rotate the key now?"))) {
					console.log("Aborted. No changes made.");
					return;
				}
			}

			const result = rotateKey(resolveConfigDir());
			console.log(
				result.reencrypted
					? `Key rotated and secrets re-encrypted: ${result.keyPath}`
					: `Key rotated: ${result.keyPath}`,
			);
			console.log("Run `credswitch recover create` to record a phrase for the new key.");
		});
}
