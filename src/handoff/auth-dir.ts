/**
 * Private staging area for one secret handoff.
 *
 * Security:
 * - The directory is 0700 and uniquely named per call
 * - Token files are 0600, exclusively created, and hold nothing but the secret
 * - The launcher deletes the token file before the target starts; the caller
 *   removes the directory after the child exits
 */

import { randomBytes } from "node:crypto";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { storageError, validationError } from "../errors.js";
import { getChildLogger } from "../logging.js";

const logger = getChildLogger({ module: "auth-dir" });

const AUTH_DIR_PREFIX = "credswitch-auth-";

export function createTempAuthDir(parent: string = os.tmpdir()): string {
	let authDir: string;
	try {
		authDir = fs.mkdtempSync(path.join(parent, AUTH_DIR_PREFIX));
	} catch (err) {
		throw storageError("failed to create temp auth directory", parent, err);
	}

	try {
		fs.chmodSync(authDir, 0o700);
	} catch (err) {
		fs.rmSync(authDir, { recursive: true, force: true });
		throw storageError("failed to set auth directory permissions", authDir, err);
	}

	logger.debug({ authDir }, "created temp auth directory");
	return authDir;
}

/**
 * Write `secret` as raw bytes to a new 0600 file in `authDir`.
 */
export function writeTokenFile(authDir: string, secret: string | Uint8Array): string {
	if (secret.length === 0) {
		throw validationError("token cannot be empty");
	}

	const tokenPath = path.join(authDir, `token-${randomBytes(8).toString("hex")}`);
	let fd: number;
	try {
		fd = fs.openSync(tokenPath, "wx", 0o600);
	} catch (err) {
		throw storageError("failed to create token file", tokenPath, err);
	}

	try {
		fs.writeFileSync(fd, secret);
		fs.fchmodSync(fd, 0o600);
	} catch (err) {
		fs.closeSync(fd);
		fs.rmSync(tokenPath, { force: true });
		throw storageError("failed to write token file", tokenPath, err);
	}
	fs.closeSync(fd);

	return tokenPath;
}

/** Remove the auth directory and anything left in it. Idempotent. */
export function removeTempAuthDir(authDir: string): void {
	fs.rmSync(authDir, { recursive: true, force: true });
	logger.debug({ authDir }, "removed temp auth directory");
}
