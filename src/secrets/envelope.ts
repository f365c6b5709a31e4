/**
 * Secrets envelope: X25519 key agreement, HKDF-SHA256, AES-256-GCM.
 *
 * Layout (no header, no version field):
 *
 *   ephemeral public key (32) | nonce (12) | ciphertext (n) | tag (16)
 *
 * The HKDF salt binds both public keys, so altering any byte of the
 * envelope fails authentication.
 */

import {
	createCipheriv,
	createDecipheriv,
	createPublicKey,
	diffieHellman,
	generateKeyPairSync,
	hkdfSync,
	type KeyObject,
	randomBytes,
} from "node:crypto";

import { cryptoError } from "../errors.js";
import { publicKeyFromRaw, rawPublicKey } from "../keys/key-file.js";

const ALGORITHM = "aes-256-gcm";
const HKDF_INFO = "credswitch/secrets";
const PUBLIC_KEY_LENGTH = 32;
const NONCE_LENGTH = 12;
const TAG_LENGTH = 16;
const KEY_LENGTH = 32;

export const ENVELOPE_OVERHEAD = PUBLIC_KEY_LENGTH + NONCE_LENGTH + TAG_LENGTH;

function deriveKey(sharedSecret: Buffer, ephemeralRaw: Buffer, recipientRaw: Buffer): Buffer {
	const salt = Buffer.concat([ephemeralRaw, recipientRaw]);
	return Buffer.from(hkdfSync("sha256", sharedSecret, salt, HKDF_INFO, KEY_LENGTH));
}

function agree(privateKey: KeyObject, publicKey: KeyObject): Buffer {
	try {
		return diffieHellman({ privateKey, publicKey });
	} catch (err) {
		throw cryptoError("key agreement failed", "key-agreement-failed", {}, err);
	}
}

/**
 * Encrypt `plaintext` to `recipient`. Every call uses a fresh ephemeral key
 * and nonce.
 */
export function sealEnvelope(plaintext: Uint8Array, recipient: KeyObject): Buffer {
	const { privateKey: ephemeral, publicKey: ephemeralPublic } = generateKeyPairSync("x25519");
	const ephemeralRaw = rawPublicKey(ephemeralPublic);
	const sharedSecret = agree(ephemeral, recipient);
	const key = deriveKey(sharedSecret, ephemeralRaw, rawPublicKey(recipient));

	try {
		const nonce = randomBytes(NONCE_LENGTH);
		const cipher = createCipheriv(ALGORITHM, key, nonce, { authTagLength: TAG_LENGTH });
		const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
		return Buffer.concat([ephemeralRaw, nonce, ciphertext, cipher.getAuthTag()]);
	} finally {
		sharedSecret.fill(0);
		key.fill(0);
	}
}

/**
 * Decrypt an envelope with `identity`. The returned buffer belongs to the
 * caller, who is responsible for zeroizing it.
 */
export function openEnvelope(envelope: Buffer, identity: KeyObject): Buffer {
	if (envelope.length < ENVELOPE_OVERHEAD) {
		throw cryptoError("secrets envelope is truncated", "truncated", {
			length: String(envelope.length),
			minimum: String(ENVELOPE_OVERHEAD),
		});
	}

	const ephemeralRaw = envelope.subarray(0, PUBLIC_KEY_LENGTH);
	const nonce = envelope.subarray(PUBLIC_KEY_LENGTH, PUBLIC_KEY_LENGTH + NONCE_LENGTH);
	const ciphertext = envelope.subarray(PUBLIC_KEY_LENGTH + NONCE_LENGTH, envelope.length - TAG_LENGTH);
	const tag = envelope.subarray(envelope.length - TAG_LENGTH);

	let ephemeral: KeyObject;
	try {
		ephemeral = publicKeyFromRaw(ephemeralRaw);
	} catch (err) {
		throw cryptoError("secrets envelope is malformed", "authentication-failed", {}, err);
	}

	const sharedSecret = agree(identity, ephemeral);
	const key = deriveKey(
		sharedSecret,
		Buffer.from(ephemeralRaw),
		rawPublicKey(createPublicKey(identity)),
	);

	let head: Buffer | null = null;
	let tail: Buffer | null = null;
	try {
		const decipher = createDecipheriv(ALGORITHM, key, nonce, { authTagLength: TAG_LENGTH });
		decipher.setAuthTag(tag);
		head = decipher.update(ciphertext);
		tail = decipher.final();
		const plaintext = Buffer.alloc(head.length + tail.length);
		head.copy(plaintext, 0);
		tail.copy(plaintext, head.length);
		return plaintext;
	} catch (err) {
		throw cryptoError(
			"failed to decrypt secrets: wrong key or damaged data",
			"authentication-failed",
			{},
			err,
		);
	} finally {
		head?.fill(0);
		tail?.fill(0);
		sharedSecret.fill(0);
		key.fill(0);
	}
}
