import type { Command } from "commander";

import { resolveConfigDir } from "../config/path.js";
import { ensureKeyFile } from "../keys/index.js";

export function registerInitCommand(program: Command): void {
	program
		.command("init")
		.description("Create the key file if it does not exist")
		.action(() => {
			const { path, created } = ensureKeyFile(resolveConfigDir());
			if (created) {
				console.log(`Created key file: ${path}`);
				console.log("Run `credswitch recover create` and store the phrase somewhere safe.");
			} else {
				console.log(`Key file already exists: ${path}`);
			}
		});
}
