/**
 * Record-level operations on the secrets file.
 *
 * Every mutation decrypts the whole payload, edits the records, and
 * re-encrypts the whole payload; the plaintext buffer is zeroized on the
 * way out.
 */

import { getChildLogger } from "../logging.js";
import { assertValidRecord, formatSecrets, parseSecrets, type SecretRecords } from "./records.js";
import { encryptSecrets, secretsExist, withDecryptedSecrets } from "./vault.js";

const logger = getChildLogger({ module: "secret-store" });

export type SecretsLocation = {
	secretsPath: string;
	keyPath: string;
};

function readRecords({ secretsPath, keyPath }: SecretsLocation): SecretRecords {
	if (!secretsExist(secretsPath)) return new Map();
	return withDecryptedSecrets(secretsPath, keyPath, (secrets) => parseSecrets(secrets.toString()));
}

function writeRecords({ secretsPath, keyPath }: SecretsLocation, records: SecretRecords): void {
	const payload = Buffer.from(formatSecrets(records), "utf-8");
	try {
		encryptSecrets(secretsPath, keyPath, payload);
	} finally {
		payload.fill(0);
	}
}

export function setSecret(location: SecretsLocation, key: string, value: string): void {
	assertValidRecord(key, value);
	const records = readRecords(location);
	const replaced = records.has(key);
	records.set(key, value);
	writeRecords(location, records);
	logger.info({ key, replaced }, "stored secret");
}

export function removeSecret(location: SecretsLocation, key: string): boolean {
	const records = readRecords(location);
	if (!records.delete(key)) return false;
	writeRecords(location, records);
	logger.info({ key }, "removed secret");
	return true;
}

export function listSecretNames(location: SecretsLocation): string[] {
	return [...readRecords(location).keys()].sort();
}

/**
 * Look up one record. Returns null when the secrets file or the record is
 * absent; decrypt failures propagate.
 */
export function getSecret(location: SecretsLocation, key: string): string | null {
	return readRecords(location).get(key) ?? null;
}
