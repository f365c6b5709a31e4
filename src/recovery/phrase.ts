/**
 * Recovery phrases: the key file written out as copyable words.
 *
 * The phrase is the canonical key file, base64 without padding, cut into
 * 8-character words joined by "-", followed by one integrity word. The
 * integrity word catches transcription mistakes; it is not a secret and
 * the phrase is as sensitive as the key file itself.
 */

import { createHmac, timingSafeEqual } from "node:crypto";

import { ensureConfigDir } from "../config/path.js";
import { type CredentialError, cryptoError, isCredentialError, validationError } from "../errors.js";
import { stageFile } from "../infra/staged-file.js";
import {
	KEY_FILE_MODE,
	formatKeyFile,
	keyFilePath,
	loadKeyPair,
	parseKeyPair,
	splitKeyLines,
} from "../keys/key-file.js";
import { getChildLogger } from "../logging.js";

const logger = getChildLogger({ module: "recovery" });

const WORD_LENGTH = 8;
const MAX_PHRASE_LENGTH = 65536;
const PHRASE_MAC_KEY = "credswitch-recovery-phrase-v1";

function integrityWord(keyFile: Uint8Array): string {
	return createHmac("sha256", PHRASE_MAC_KEY).update(keyFile).digest("hex").slice(0, WORD_LENGTH);
}

function toWords(encoded: string): string[] {
	const words: string[] = [];
	for (let i = 0; i < encoded.length; i += WORD_LENGTH) {
		words.push(encoded.slice(i, i + WORD_LENGTH));
	}
	return words;
}

export function createRecoveryPhrase(keyPath: string): string {
	const keyFile = Buffer.from(formatKeyFile(loadKeyPair(keyPath)), "utf-8");
	const encoded = keyFile.toString("base64").replace(/=+$/, "");
	const phrase = [...toWords(encoded), integrityWord(keyFile)].join("-");
	keyFile.fill(0);
	return phrase;
}

function phraseMismatch(cause?: unknown): CredentialError {
	return cryptoError(
		"recovery phrase does not match",
		"phrase-mismatch",
		{ hint: "check the phrase for typos; every word must be copied exactly" },
		cause,
	);
}

/**
 * Decode `phrase` and write it as the key file in `configDir`, replacing
 * any existing key. Returns the key file path.
 */
export function restoreFromPhrase(configDir: string, phrase: string): string {
	if (phrase.length > MAX_PHRASE_LENGTH) {
		throw validationError("recovery phrase is too long", { maxLength: String(MAX_PHRASE_LENGTH) });
	}
	const words = phrase
		.replace(/\s+/g, "")
		.split("-")
		.filter((word) => word.length > 0);
	if (words.length < 2) {
		throw validationError("recovery phrase is too short");
	}

	const mac = words[words.length - 1];
	const keyFile = Buffer.from(words.slice(0, -1).join(""), "base64");
	try {
		const expected = Buffer.from(integrityWord(keyFile), "utf-8");
		const actual = Buffer.from(mac, "utf-8");
		if (actual.length !== expected.length || !timingSafeEqual(actual, expected)) {
			throw phraseMismatch();
		}

		const keyPath = keyFilePath(configDir);
		const content = keyFile.toString("utf-8");
		try {
			parseKeyPair(splitKeyLines(content, keyPath), keyPath);
		} catch (err) {
			throw isCredentialError(err) && err.kind === "format" ? phraseMismatch(err) : err;
		}

		ensureConfigDir(configDir);
		const staged = stageFile(keyPath, { mode: KEY_FILE_MODE });
		try {
			staged.write(keyFile);
			staged.commit();
		} finally {
			staged.release();
		}
		logger.info({ keyPath }, "restored key file from recovery phrase");
		return keyPath;
	} finally {
		keyFile.fill(0);
	}
}
