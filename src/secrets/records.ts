/**
 * KEY=VALUE records inside the decrypted secrets payload.
 */

import { validationError } from "../errors.js";
import { getChildLogger } from "../logging.js";

const logger = getChildLogger({ module: "secret-records" });

export type SecretRecords = Map<string, string>;

/**
 * Parse newline-separated KEY=VALUE records. Splits on the first "=".
 * Empty lines, lines without "=", and records with an empty key or value
 * are skipped; skipped records are logged by line number only.
 */
export function parseSecrets(text: string): SecretRecords {
	const records: SecretRecords = new Map();
	const lines = text.split("\n");
	for (const [index, rawLine] of lines.entries()) {
		const line = rawLine.endsWith("\r") ? rawLine.slice(0, -1) : rawLine;
		if (line === "") continue;

		const eq = line.indexOf("=");
		if (eq === -1) {
			logger.warn({ line: index + 1 }, "skipping secrets line without '='");
			continue;
		}
		const key = line.slice(0, eq);
		const value = line.slice(eq + 1);
		if (key === "" || value === "") {
			logger.warn({ line: index + 1, key }, "skipping secrets record with empty key or value");
			continue;
		}
		records.set(key, value);
	}
	return records;
}

export function assertValidRecord(key: string, value: string): void {
	if (key === "" || key.includes("=") || /[\r\n]/.test(key)) {
		throw validationError("secret name must be non-empty and contain no '=' or newlines", {
			key: key.replace(/[\r\n]/g, " "),
		});
	}
	if (value === "") {
		throw validationError("secret value cannot be empty", { key });
	}
	if (/[\r\n]/.test(value)) {
		throw validationError("secret value cannot contain newlines", { key });
	}
}

/**
 * Format records for storage, sorted by key for deterministic output.
 */
export function formatSecrets(records: ReadonlyMap<string, string>): string {
	const keys = [...records.keys()].sort();
	let out = "";
	for (const key of keys) {
		const value = records.get(key) ?? "";
		if (key === "" || value === "") continue;
		assertValidRecord(key, value);
		out += `${key}=${value}\n`;
	}
	return out;
}

/**
 * Conventional record name for a provider's API key:
 * "openrouter" → "OPENROUTER_API_KEY", "z.ai" → "Z_AI_API_KEY".
 */
export function secretKeyName(provider: string): string {
	return `${provider.toUpperCase().replace(/[^A-Z0-9]/g, "_")}_API_KEY`;
}
