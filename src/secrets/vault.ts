/**
 * Encrypted secrets file.
 *
 * The secrets file is a single envelope (see envelope.ts) holding
 * newline-delimited KEY=VALUE records, encrypted to the key file's
 * recipient. It is always rewritten whole through a staged temp file, so
 * a failed write leaves the previous file in place.
 *
 * Failure kinds:
 * - storage  — file missing (reason "not-found") or unreadable
 * - format   — the key file does not parse
 * - crypto   — wrong key, tampering, truncation, or not an envelope
 */

import fs from "node:fs";
import path from "node:path";

import { type CredentialError, isCredentialError, storageError, withHint } from "../errors.js";
import { stageFile } from "../infra/staged-file.js";
import { loadIdentity, loadRecipient } from "../keys/key-file.js";
import { getChildLogger } from "../logging.js";
import { openEnvelope, sealEnvelope } from "./envelope.js";
import { SecretBytes, type SecretBytesHandle, useSecret } from "./secret-bytes.js";

const logger = getChildLogger({ module: "vault" });

export const SECRETS_FILE_NAME = "secrets.enc";
export const SECRETS_FILE_MODE = 0o600;

const KEY_HINT = "the key file is unusable; restore it from a recovery phrase";
const CRYPTO_HINT =
	"the secrets file does not match this key or is damaged; restore the matching key from a recovery phrase, or the secrets from a backup";
const NOT_FOUND_HINT = "no secrets file; restore one from a backup or store a secret first";
const PERMISSION_HINT = "check the permissions of the config directory and its files";

export function secretsFilePath(configDir: string): string {
	return path.join(configDir, SECRETS_FILE_NAME);
}

export function secretsExist(secretsPath: string): boolean {
	return fs.existsSync(secretsPath);
}

function hinted(err: unknown, fallback: string): unknown {
	if (!isCredentialError(err)) return err;
	if (err.kind === "storage") {
		if (err.reason === "permission-denied") return withHint(err, PERMISSION_HINT);
		if (err.reason === "not-found") return withHint(err, fallback);
	}
	if (err.kind === "format") return withHint(err, KEY_HINT);
	if (err.kind === "crypto") return withHint(err, CRYPTO_HINT);
	return err;
}

function keyError(err: unknown, keyPath: string): unknown {
	if (isCredentialError(err) && err.kind === "storage" && err.reason === "not-found") {
		return withHint(err, `no key file at ${keyPath}; restore it from a recovery phrase`);
	}
	return hinted(err, KEY_HINT);
}

/**
 * Encrypt `plaintext` to the recipient in `keyPath` and replace
 * `secretsPath` with the envelope (mode 0600).
 */
export function encryptSecrets(
	secretsPath: string,
	keyPath: string,
	plaintext: string | Uint8Array,
): void {
	let recipient: ReturnType<typeof loadRecipient>;
	try {
		recipient = loadRecipient(keyPath);
	} catch (err) {
		throw keyError(err, keyPath);
	}

	const bytes = typeof plaintext === "string" ? Buffer.from(plaintext, "utf-8") : plaintext;
	let envelope: Buffer;
	try {
		envelope = sealEnvelope(bytes, recipient);
	} finally {
		// Only wipe the copy made here; caller-owned bytes stay the caller's.
		if (typeof plaintext === "string") bytes.fill(0);
	}

	const staged = stageFile(secretsPath, { mode: SECRETS_FILE_MODE });
	try {
		staged.write(envelope);
		staged.commit();
	} catch (err) {
		throw hinted(err, PERMISSION_HINT);
	} finally {
		staged.release();
	}

	logger.debug({ secretsPath, bytes: envelope.length }, "wrote secrets file");
}

function readEnvelope(secretsPath: string): Buffer {
	try {
		return fs.readFileSync(secretsPath);
	} catch (err) {
		throw hinted(storageError("failed to read secrets file", secretsPath, err), NOT_FOUND_HINT);
	}
}

/**
 * Decrypt `secretsPath` with the identity in `keyPath`. The caller owns the
 * result and must `close()` it.
 */
export function decryptSecrets(secretsPath: string, keyPath: string): SecretBytes {
	let identity: ReturnType<typeof loadIdentity>;
	try {
		identity = loadIdentity(keyPath);
	} catch (err) {
		throw keyError(err, keyPath);
	}

	const envelope = readEnvelope(secretsPath);
	try {
		return new SecretBytes(openEnvelope(envelope, identity));
	} catch (err) {
		const failure = hinted(err, CRYPTO_HINT);
		if (isCredentialError(failure)) {
			throw addPath(failure, secretsPath);
		}
		throw failure;
	}
}

function addPath(err: CredentialError, secretsPath: string): CredentialError {
	err.context.path ??= secretsPath;
	return err;
}

/**
 * Same contract as `decryptSecrets`, typed as a handle that must be
 * released. Release zeroizes and is idempotent.
 */
export function decryptToZeroizable(secretsPath: string, keyPath: string): SecretBytesHandle {
	return decryptSecrets(secretsPath, keyPath);
}

/**
 * Decrypt, run `fn`, and zeroize the plaintext on every exit path.
 */
export function withDecryptedSecrets<T>(
	secretsPath: string,
	keyPath: string,
	fn: (secrets: SecretBytes) => T,
): T {
	return useSecret(decryptSecrets(secretsPath, keyPath), fn);
}
