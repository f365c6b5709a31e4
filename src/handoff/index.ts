export { createTempAuthDir, removeTempAuthDir, writeTokenFile } from "./auth-dir.js";
export { escapeShellArg, posixQuote, powerShellLiteral } from "./escape.js";
export {
	type ExecutionMode,
	type LauncherOptions,
	type LauncherScript,
	generateLauncherScript,
	launchCommand,
	renderUnixLauncher,
	renderWindowsLauncher,
} from "./launcher.js";
export { type RunResult, type RunWithSecretOptions, exitCodeFor, runWithSecret } from "./runner.js";
