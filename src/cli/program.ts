import { createRequire } from "node:module";
import { Command } from "commander";

const require = createRequire(import.meta.url);

function getVersion(): string {
	try {
		// Resolve package.json relative to this module (works from src or dist)
		const pkg: { version?: string } = require("../../package.json");
		return pkg.version ?? "0.0.0";
	} catch {
		return "0.0.0";
	}
}

export function createProgram(): Command {
	const program = new Command();

	program
		.name("credswitch")
		.description("Encrypted provider secrets with single-use handoff to child processes")
		.version(getVersion())
		.option("-v, --verbose", "Enable verbose logging")
		.option("-d, --config-dir <path>", "Directory holding the key, secrets and settings");

	return program;
}
