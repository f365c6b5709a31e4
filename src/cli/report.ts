import chalk from "chalk";

import { type CredentialError, describeError, isCredentialError } from "../errors.js";

/**
 * The CLI command that usually gets the user out of `err`, if any.
 */
export function commandHint(err: CredentialError): string | undefined {
	switch (err.kind) {
		case "format":
			return "If you saved a recovery phrase, run: credswitch recover restore <phrase>";
		case "crypto":
			return err.reason === "phrase-mismatch"
				? undefined
				: "If the key was replaced, run: credswitch recover restore <phrase>";
		case "storage":
			if (err.reason === "not-found" && err.context.path?.endsWith(".key")) {
				return "Run: credswitch init";
			}
			return undefined;
		default:
			return undefined;
	}
}

/** Render an error for the terminal as the lines to print. */
export function formatErrorLines(err: unknown): string[] {
	const { summary, hint } = describeError(err);
	const lines = [chalk.red(`Error: ${summary}`)];
	if (hint) lines.push(chalk.yellow(`Hint: ${hint}`));
	if (isCredentialError(err)) {
		const command = commandHint(err);
		if (command) lines.push(chalk.gray(command));
	}
	return lines;
}

export function reportError(err: unknown): void {
	for (const line of formatErrorLines(err)) {
		console.error(line);
	}
	process.exitCode = 1;
}
