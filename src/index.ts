#!/usr/bin/env node

import chalk from "chalk";

import { createProgram } from "./cli/program.js";
import { reportError } from "./cli/report.js";
import { registerExecCommand } from "./commands/exec.js";
import { registerInitCommand } from "./commands/init.js";
import { registerRecoverCommands } from "./commands/recover.js";
import { registerRotateCommand } from "./commands/rotate.js";
import { registerSecretCommands } from "./commands/secret.js";
import { setConfigDir } from "./config/path.js";
import { setVerbose } from "./globals.js";
import {
	closeLogger,
	getChildLogger,
	getLogger,
	getLoggerError,
	getResolvedLoggerSettings,
} from "./logging.js";

const logger = getChildLogger({ module: "cli" });

// Create CLI program
const program = createProgram();

// Register commands
registerInitCommand(program);
registerRotateCommand(program);
registerSecretCommands(program);
registerRecoverCommands(program);
registerExecCommand(program);

// Global options must be applied before any command touches config or logs
program.hook("preAction", (thisCommand) => {
	const opts = thisCommand.opts<{ configDir?: string; verbose?: boolean }>();
	if (opts.configDir) {
		setConfigDir(opts.configDir);
	}
	if (opts.verbose) {
		setVerbose(true);
	}
	// Initialize logger after the config dir is set
	getLogger();
	const logError = getLoggerError();
	if (logError) {
		const { file } = getResolvedLoggerSettings();
		const reason = logError instanceof Error ? logError.message : String(logError);
		console.error(chalk.yellow(`Warning: logging disabled, cannot open ${file}: ${reason}`));
	}
});

async function main(): Promise<void> {
	await program.parseAsync();
}

main()
	.catch((err: unknown) => {
		reportError(err);
		logger.error({ error: err instanceof Error ? err.message : String(err) }, "command failed");
	})
	.finally(() => {
		// Flush the pino destination so the CLI exits cleanly.
		closeLogger();
	});
