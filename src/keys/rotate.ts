/**
 * Key rotation.
 *
 *   idle → check-secrets
 *     no secrets:  replace-key-only → done
 *     secrets:     decrypt-old → backup-old-key → replace-key → reencrypt
 *                    ok:     delete-backup → done
 *                    failed: restore-old-key → fatal
 *
 * After every call, success or failure, at least one (key file, secrets
 * file) pair on disk decrypts: the old key until the rename, the backup
 * while re-encrypting, the new key afterwards. Nothing is mutated until
 * the old key has decrypted the existing secrets.
 *
 * Not safe against a concurrent rotation of the same directory.
 */

import fs from "node:fs";

import {
	CredentialError,
	isCredentialError,
	recoveryRequiredError,
	storageError,
} from "../errors.js";
import { stageFile } from "../infra/staged-file.js";
import { getChildLogger } from "../logging.js";
import { decryptSecrets, encryptSecrets, secretsExist, secretsFilePath } from "../secrets/vault.js";
import { KEY_FILE_MODE, keyFilePath, stageNewKeyFile } from "./key-file.js";

const logger = getChildLogger({ module: "key-rotate" });

export const BACKUP_SUFFIX = ".bak";

export type RotationState =
	| "idle"
	| "check-secrets"
	| "replace-key-only"
	| "decrypt-old"
	| "backup-old-key"
	| "replace-key"
	| "reencrypt"
	| "delete-backup"
	| "restore-old-key"
	| "done"
	| "fatal";

export interface RotateKeyOptions {
	/** Re-encryption step; defaults to `encryptSecrets`. */
	encrypt?: (secretsPath: string, keyPath: string, plaintext: Uint8Array) => void;
	/** Puts the backup back over the key path; defaults to an atomic rename. */
	restore?: (backupPath: string, keyPath: string) => void;
}

export interface RotationResult {
	keyPath: string;
	reencrypted: boolean;
	states: RotationState[];
}

export function backupKeyPath(keyPath: string): string {
	return `${keyPath}${BACKUP_SUFFIX}`;
}

function restoreByRename(backupPath: string, keyPath: string): void {
	try {
		fs.renameSync(backupPath, keyPath);
	} catch (err) {
		throw storageError("failed to restore key from backup", keyPath, err, { backupPath });
	}
}

function replaceKey(keyPath: string): void {
	const staged = stageNewKeyFile(keyPath);
	try {
		staged.commit();
	} finally {
		staged.release();
	}
}

function writeBackup(keyPath: string, backupPath: string): void {
	let current: Buffer;
	try {
		current = fs.readFileSync(keyPath);
	} catch (err) {
		throw storageError("failed to read key file for backup", keyPath, err);
	}
	const staged = stageFile(backupPath, { mode: KEY_FILE_MODE });
	try {
		staged.write(current);
		staged.commit();
	} finally {
		staged.release();
		current.fill(0);
	}
}

/**
 * Rethrow a re-encryption failure after a successful rollback, keeping its
 * kind and reason and marking that the previous key is back in place.
 */
function rolledBack(err: unknown, keyPath: string, secretsPath: string): CredentialError {
	const context = { keyPath, secretsPath, rolledBack: "true" };
	if (isCredentialError(err)) {
		return new CredentialError(err.kind, `key rotation rolled back: ${err.message}`, {
			reason: err.reason,
			context: { ...err.context, ...context },
			cause: err,
		});
	}
	return new CredentialError(
		"storage",
		`key rotation rolled back: ${err instanceof Error ? err.message : String(err)}`,
		{ reason: "io", context, cause: err },
	);
}

/**
 * Replace the key pair in `configDir` and re-encrypt its secrets under the
 * new key.
 */
export function rotateKey(configDir: string, options: RotateKeyOptions = {}): RotationResult {
	const encrypt = options.encrypt ?? encryptSecrets;
	const restore = options.restore ?? restoreByRename;

	const keyPath = keyFilePath(configDir);
	const secretsPath = secretsFilePath(configDir);
	const backupPath = backupKeyPath(keyPath);
	const states: RotationState[] = ["idle", "check-secrets"];

	if (!secretsExist(secretsPath)) {
		states.push("replace-key-only");
		replaceKey(keyPath);
		states.push("done");
		logger.info({ keyPath, reencrypted: false }, "rotated key");
		logger.debug({ states }, "rotation states");
		return { keyPath, reencrypted: false, states };
	}

	if (fs.existsSync(backupPath)) {
		// An earlier rotation may have left the only key that matches the secrets here.
		throw recoveryRequiredError(
			"a key backup from an earlier rotation still exists; resolve it before rotating again",
			backupPath,
			undefined,
			{ keyPath, secretsPath },
		);
	}

	states.push("decrypt-old");
	const plaintext = decryptSecrets(secretsPath, keyPath);
	try {
		states.push("backup-old-key");
		writeBackup(keyPath, backupPath);

		states.push("replace-key");
		try {
			replaceKey(keyPath);
		} catch (err) {
			// The rename never happened, so the old key is still in place.
			fs.rmSync(backupPath, { force: true });
			throw err;
		}

		states.push("reencrypt");
		try {
			encrypt(secretsPath, keyPath, plaintext.view());
		} catch (err) {
			states.push("restore-old-key");
			try {
				restore(backupPath, keyPath);
			} catch (restoreErr) {
				states.push("fatal");
				logger.error(
					{ keyPath, secretsPath, backupPath, states },
					"key rotation failed and rollback failed",
				);
				throw recoveryRequiredError(
					"key rotation failed and the previous key could not be restored",
					backupPath,
					restoreErr,
					{
						keyPath,
						secretsPath,
						reencryptError: err instanceof Error ? err.message : String(err),
					},
				);
			}
			states.push("fatal");
			logger.warn({ keyPath, secretsPath, states }, "key rotation rolled back");
			throw rolledBack(err, keyPath, secretsPath);
		}

		states.push("delete-backup");
		try {
			fs.rmSync(backupPath, { force: true });
		} catch (err) {
			// The new key and secrets already agree; a stale backup is only clutter.
			logger.warn(
				{ backupPath, error: err instanceof Error ? err.message : String(err) },
				"failed to delete key backup",
			);
		}
		states.push("done");
	} finally {
		plaintext.close();
	}

	logger.info({ keyPath, reencrypted: true }, "rotated key");
	logger.debug({ states }, "rotation states");
	return { keyPath, reencrypted: true, states };
}
