import { describe, expect, it } from "vitest";

import { isCredentialError } from "../../src/errors.js";
import { generateKeyPair } from "../../src/keys/key-file.js";
import { ENVELOPE_OVERHEAD, openEnvelope, sealEnvelope } from "../../src/secrets/envelope.js";

function reasonOf(fn: () => unknown): string | undefined {
	try {
		fn();
	} catch (err) {
		if (isCredentialError(err)) return `${err.kind}/${err.reason}`;
		throw err;
	}
	return undefined;
}

describe("secrets envelope", () => {
	const pair = generateKeyPair();
	const plaintext = Buffer.from("OPENROUTER_API_KEY=test-secret\n", "utf-8");

	it("opens what it seals", () => {
		const envelope = sealEnvelope(plaintext, pair.recipient);
		expect(envelope.length).toBe(plaintext.length + ENVELOPE_OVERHEAD);
		expect(openEnvelope(envelope, pair.identity).toString("utf-8")).toBe(
			"OPENROUTER_API_KEY=test-secret\n",
		);
	});

	it("seals empty plaintext", () => {
		const envelope = sealEnvelope(new Uint8Array(0), pair.recipient);
		expect(envelope.length).toBe(ENVELOPE_OVERHEAD);
		expect(openEnvelope(envelope, pair.identity).length).toBe(0);
	});

	it("uses a fresh ephemeral key and nonce each time", () => {
		const a = sealEnvelope(plaintext, pair.recipient);
		const b = sealEnvelope(plaintext, pair.recipient);
		expect(a.subarray(0, 44).equals(b.subarray(0, 44))).toBe(false);
	});

	it("does not contain the plaintext", () => {
		const envelope = sealEnvelope(plaintext, pair.recipient);
		expect(envelope.includes(Buffer.from("test-secret"))).toBe(false);
	});

	it("rejects the wrong identity", () => {
		const envelope = sealEnvelope(plaintext, pair.recipient);
		expect(reasonOf(() => openEnvelope(envelope, generateKeyPair().identity))).toBe(
			"crypto/authentication-failed",
		);
	});

	it("rejects a flipped byte in every region", () => {
		const envelope = sealEnvelope(plaintext, pair.recipient);
		for (const offset of [0, 32, 44, envelope.length - 1]) {
			const tampered = Buffer.from(envelope);
			tampered[offset] ^= 0x01;
			expect(reasonOf(() => openEnvelope(tampered, pair.identity))).toMatch(/^crypto\//);
		}
	});

	it("rejects truncated input", () => {
		const envelope = sealEnvelope(plaintext, pair.recipient);
		expect(reasonOf(() => openEnvelope(envelope.subarray(0, ENVELOPE_OVERHEAD - 1), pair.identity))).toBe(
			"crypto/truncated",
		);
		expect(reasonOf(() => openEnvelope(Buffer.alloc(0), pair.identity))).toBe("crypto/truncated");
		expect(reasonOf(() => openEnvelope(envelope.subarray(0, envelope.length - 1), pair.identity))).toBe(
			"crypto/authentication-failed",
		);
	});
});
