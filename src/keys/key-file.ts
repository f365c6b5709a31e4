/**
 * Key file storage.
 *
 * One X25519 key pair per config directory, stored as two lines:
 *
 *   CREDSWITCH-SECRET-KEY-<base64url private scalar>
 *   credswitch-recipient-<base64url public key>
 *
 * Security:
 * - Key files are written 0600 through a staged temp file and an atomic rename
 * - Private key material is never logged or included in errors
 * - A file with fewer than two non-empty lines never loads, even partially
 */

import { createPrivateKey, createPublicKey, generateKeyPairSync, type KeyObject } from "node:crypto";
import fs from "node:fs";
import path from "node:path";

import { ensureConfigDir } from "../config/path.js";
import { type CredentialError, formatError, isCredentialError, storageError } from "../errors.js";
import { type StagedFile, stageFile } from "../infra/staged-file.js";
import { getChildLogger } from "../logging.js";

const logger = getChildLogger({ module: "key-file" });

export const KEY_FILE_NAME = "credswitch.key";
export const KEY_FILE_MODE = 0o600;

const IDENTITY_PREFIX = "CREDSWITCH-SECRET-KEY-";
const RECIPIENT_PREFIX = "credswitch-recipient-";

// 32 raw bytes, unpadded base64url
const RAW_KEY_PATTERN = /^[A-Za-z0-9_-]{43}$/;

// DER headers for X25519 keys (the 32 raw key bytes follow)
const X25519_PKCS8_PREFIX = Buffer.from("302e020100300506032b656e04220420", "hex");
const X25519_SPKI_PREFIX = Buffer.from("302a300506032b656e032100", "hex");

export interface KeyPair {
	/** Private half, used to decrypt. */
	identity: KeyObject;
	/** Public half, used to encrypt. */
	recipient: KeyObject;
}

const CORRUPTED_HINT = "key file may be corrupted; restore it from a recovery phrase or a backup";

export function keyFilePath(configDir: string): string {
	return path.join(configDir, KEY_FILE_NAME);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Encoding
// ═══════════════════════════════════════════════════════════════════════════════

export function rawPublicKey(recipient: KeyObject): Buffer {
	return recipient.export({ type: "spki", format: "der" }).subarray(X25519_SPKI_PREFIX.length);
}

function rawPrivateKey(identity: KeyObject): Buffer {
	return identity.export({ type: "pkcs8", format: "der" }).subarray(X25519_PKCS8_PREFIX.length);
}

export function formatIdentity(identity: KeyObject): string {
	return IDENTITY_PREFIX + rawPrivateKey(identity).toString("base64url");
}

export function formatRecipient(recipient: KeyObject): string {
	return RECIPIENT_PREFIX + rawPublicKey(recipient).toString("base64url");
}

function decodeRaw(line: string, prefix: string): Buffer | null {
	if (!line.startsWith(prefix)) return null;
	const encoded = line.slice(prefix.length);
	if (!RAW_KEY_PATTERN.test(encoded)) return null;
	const raw = Buffer.from(encoded, "base64url");
	return raw.length === 32 ? raw : null;
}

export function parseIdentity(line: string): KeyObject | null {
	const raw = decodeRaw(line, IDENTITY_PREFIX);
	if (!raw) return null;
	try {
		return createPrivateKey({
			key: Buffer.concat([X25519_PKCS8_PREFIX, raw]),
			format: "der",
			type: "pkcs8",
		});
	} catch {
		return null;
	} finally {
		raw.fill(0);
	}
}

/** Rebuild an X25519 public key from its 32 raw bytes. Throws on bad input. */
export function publicKeyFromRaw(raw: Uint8Array): KeyObject {
	return createPublicKey({
		key: Buffer.concat([X25519_SPKI_PREFIX, raw]),
		format: "der",
		type: "spki",
	});
}

export function parseRecipient(line: string): KeyObject | null {
	const raw = decodeRaw(line, RECIPIENT_PREFIX);
	if (!raw) return null;
	try {
		return publicKeyFromRaw(raw);
	} catch {
		return null;
	}
}

/** Serialized key file body: identity line, recipient line, each newline-terminated. */
export function formatKeyFile(pair: KeyPair): string {
	return `${formatIdentity(pair.identity)}\n${formatRecipient(pair.recipient)}\n`;
}

export function generateKeyPair(): KeyPair {
	const { privateKey, publicKey } = generateKeyPairSync("x25519");
	return { identity: privateKey, recipient: publicKey };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Reading
// ═══════════════════════════════════════════════════════════════════════════════

type KeyLines = { identityLine: string; recipientLine: string };

function readKeyLines(keyPath: string): KeyLines {
	let content: string;
	try {
		content = fs.readFileSync(keyPath, "utf-8");
	} catch (err) {
		throw storageError("failed to read key file", keyPath, err);
	}
	return splitKeyLines(content, keyPath);
}

/**
 * Split key file content into its two lines. Exposed for recovery-phrase
 * restore, which validates a key file before writing it.
 */
export function splitKeyLines(content: string, keyPath: string): KeyLines {
	const lines = content
		.split(/\r?\n/)
		.map((line) => line.trim())
		.filter((line) => line.length > 0);

	if (lines.length === 0) {
		throw formatError("key file is empty", "empty", { path: keyPath });
	}
	if (lines.length < 2) {
		throw formatError("key file is missing recipient line", "missing-recipient", {
			path: keyPath,
			hint: "key file should contain identity and recipient lines",
		});
	}
	return { identityLine: lines[0], recipientLine: lines[1] };
}

function corrupted(keyPath: string, line: "identity" | "recipient"): CredentialError {
	return formatError("key file is corrupted", "corrupted", {
		path: keyPath,
		line,
		hint: CORRUPTED_HINT,
	});
}

/** Load the private half (line 1). */
export function loadIdentity(keyPath: string): KeyObject {
	const { identityLine } = readKeyLines(keyPath);
	const identity = parseIdentity(identityLine);
	if (!identity) throw corrupted(keyPath, "identity");
	return identity;
}

/** Load the public half (line 2). */
export function loadRecipient(keyPath: string): KeyObject {
	const { recipientLine } = readKeyLines(keyPath);
	const recipient = parseRecipient(recipientLine);
	if (!recipient) throw corrupted(keyPath, "recipient");
	return recipient;
}

/**
 * Parse both halves from already-split lines and check that the recipient
 * belongs to the identity.
 */
export function parseKeyPair(lines: KeyLines, keyPath: string): KeyPair {
	const identity = parseIdentity(lines.identityLine);
	if (!identity) throw corrupted(keyPath, "identity");
	const recipient = parseRecipient(lines.recipientLine);
	if (!recipient) throw corrupted(keyPath, "recipient");

	const derived = rawPublicKey(createPublicKey(identity));
	if (!derived.equals(rawPublicKey(recipient))) {
		throw formatError("key file recipient does not match its identity", "mismatch", {
			path: keyPath,
			hint: CORRUPTED_HINT,
		});
	}
	return { identity, recipient };
}

export function loadKeyPair(keyPath: string): KeyPair {
	return parseKeyPair(readKeyLines(keyPath), keyPath);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Writing
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Write a fresh key pair to a temp file beside `keyPath` without touching
 * `keyPath` itself. The caller decides when to `commit` (rename over the
 * key path) and must always `release`.
 */
export function stageNewKeyFile(keyPath: string, pair: KeyPair = generateKeyPair()): StagedFile {
	const staged = stageFile(keyPath, { mode: KEY_FILE_MODE });
	try {
		staged.write(formatKeyFile(pair));
	} catch (err) {
		staged.release();
		throw err;
	}
	return staged;
}

/**
 * Create a new key pair at `keyPath`, replacing whatever is there.
 * Callers must not point this at a live key whose secrets still need it.
 */
export function generateKeyFile(keyPath: string): void {
	const staged = stageNewKeyFile(keyPath);
	try {
		staged.commit();
	} finally {
		staged.release();
	}
	logger.info({ keyPath }, "generated key file");
}

export type EnsureKeyResult = { path: string; created: boolean };

/**
 * Create the key file in `configDir` unless one already exists.
 *
 * The complete file is staged first and then hard-linked into place, which
 * fails with EEXIST if another invocation got there first. Filesystems
 * without hard links fall back to an exclusive create of the key path.
 */
export function ensureKeyFile(configDir: string): EnsureKeyResult {
	ensureConfigDir(configDir);
	const keyPath = keyFilePath(configDir);

	if (fs.existsSync(keyPath)) {
		return { path: keyPath, created: false };
	}

	const body = formatKeyFile(generateKeyPair());
	const staged = stageFile(keyPath, { mode: KEY_FILE_MODE });
	try {
		staged.write(body);
		fs.linkSync(staged.tempPath, keyPath);
	} catch (err) {
		const code = (err as NodeJS.ErrnoException).code;
		if (code === "EEXIST") {
			return { path: keyPath, created: false };
		}
		if (isCredentialError(err)) {
			throw err;
		}
		if (code !== "EPERM" && code !== "ENOTSUP" && code !== "EXDEV") {
			throw storageError("failed to create key file", keyPath, err);
		}
		return createExclusive(keyPath, body);
	} finally {
		staged.release();
	}

	logger.info({ keyPath }, "created key file");
	return { path: keyPath, created: true };
}

function createExclusive(keyPath: string, body: string): EnsureKeyResult {
	let fd: number;
	try {
		fd = fs.openSync(keyPath, "wx", KEY_FILE_MODE);
	} catch (err) {
		if ((err as NodeJS.ErrnoException).code === "EEXIST") {
			return { path: keyPath, created: false };
		}
		throw storageError("failed to create key file", keyPath, err);
	}
	try {
		fs.writeFileSync(fd, body);
		fs.fsyncSync(fd);
	} catch (err) {
		fs.closeSync(fd);
		fs.rmSync(keyPath, { force: true });
		throw storageError("failed to write key file", keyPath, err);
	}
	fs.closeSync(fd);
	logger.info({ keyPath }, "created key file");
	return { path: keyPath, created: true };
}
