import { describe, expect, it } from "vitest";

import {
	assertValidRecord,
	formatSecrets,
	parseSecrets,
	secretKeyName,
} from "../../src/secrets/records.js";

describe("parseSecrets", () => {
	it("parses KEY=VALUE lines", () => {
		const records = parseSecrets("A_API_KEY=one\nB_API_KEY=two\n");
		expect([...records]).toEqual([
			["A_API_KEY", "one"],
			["B_API_KEY", "two"],
		]);
	});

	it("splits on the first '=' only", () => {
		expect(parseSecrets("TOKEN=abc==def").get("TOKEN")).toBe("abc==def");
	});

	it("accepts CRLF line endings", () => {
		expect(parseSecrets("A=1\r\nB=2\r\n").get("A")).toBe("1");
	});

	it("skips blank, malformed and empty records", () => {
		const records = parseSecrets("\nno-equals\n=value\nEMPTY=\nOK=yes\n");
		expect([...records]).toEqual([["OK", "yes"]]);
	});

	it("keeps the last value for a repeated key", () => {
		expect(parseSecrets("A=1\nA=2\n").get("A")).toBe("2");
	});
});

describe("formatSecrets", () => {
	it("sorts keys and terminates every line", () => {
		const text = formatSecrets(
			new Map([
				["Z_API_KEY", "z"],
				["A_API_KEY", "a"],
			]),
		);
		expect(text).toBe("A_API_KEY=a\nZ_API_KEY=z\n");
	});

	it("skips empty entries", () => {
		expect(formatSecrets(new Map([["A", ""]]))).toBe("");
	});

	it("refuses values that would break the line format", () => {
		expect(() => formatSecrets(new Map([["A", "x\ny"]]))).toThrow(
			"secret value cannot contain newlines",
		);
	});
});

describe("assertValidRecord", () => {
	it("rejects bad names", () => {
		expect(() => assertValidRecord("A=B", "v")).toThrow(
			"secret name must be non-empty and contain no '=' or newlines",
		);
		expect(() => assertValidRecord("", "v")).toThrow(
			"secret name must be non-empty and contain no '=' or newlines",
		);
	});

	it("rejects empty values", () => {
		expect(() => assertValidRecord("A", "")).toThrow("secret value cannot be empty");
	});

	it("allows '=' inside values", () => {
		expect(() => assertValidRecord("A", "x=y")).not.toThrow();
	});
});

describe("secretKeyName", () => {
	it("derives the conventional record name", () => {
		expect(secretKeyName("openrouter")).toBe("OPENROUTER_API_KEY");
		expect(secretKeyName("z.ai")).toBe("Z_AI_API_KEY");
		expect(secretKeyName("kimi-k2")).toBe("KIMI_K2_API_KEY");
	});
});
