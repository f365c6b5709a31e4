import { describe, expect, it } from "vitest";

import { escapeShellArg, posixQuote, powerShellLiteral } from "../../src/handoff/escape.js";

describe("escapeShellArg", () => {
	it("quotes the empty string", () => {
		expect(escapeShellArg("")).toBe("''");
	});

	it("wraps plain arguments in single quotes", () => {
		expect(escapeShellArg("--model")).toBe("'--model'");
	});

	it("doubles embedded single quotes", () => {
		expect(escapeShellArg("can't")).toBe("'can''t'");
	});

	it("neutralizes variable expansion", () => {
		expect(escapeShellArg("$HOME")).toBe("'`$HOME'");
		expect(escapeShellArg("$(Get-Process)")).toBe("'`$(Get-Process)'");
	});

	it("escapes backticks before anything else", () => {
		expect(escapeShellArg("a`b")).toBe("'a``b'");
		expect(escapeShellArg("`$")).toBe("'```$'");
	});

	it("escapes statement separators and pipes", () => {
		expect(escapeShellArg("a;b|c")).toBe("'a`;b`|c'");
	});

	it("escapes double quotes", () => {
		expect(escapeShellArg('say "hi"')).toBe("'say `\"hi`\"'");
	});

	it("escapes control characters", () => {
		expect(escapeShellArg("one\ntwo")).toBe("'one`ntwo'");
		expect(escapeShellArg("\t\r\b\0")).toBe("'`t`r`b`0'");
	});
});

describe("powerShellLiteral", () => {
	it("only doubles single quotes", () => {
		expect(powerShellLiteral("C:\\Users\\o'neil\\token")).toBe("'C:\\Users\\o''neil\\token'");
		expect(powerShellLiteral("$x")).toBe("'$x'");
	});
});

describe("posixQuote", () => {
	it("leaves plain words bare", () => {
		expect(posixQuote("/usr/local/bin/claude")).toBe("/usr/local/bin/claude");
		expect(posixQuote("--max-turns")).toBe("--max-turns");
	});

	it("single-quotes everything else", () => {
		expect(posixQuote("")).toBe("''");
		expect(posixQuote("two words")).toBe("'two words'");
		expect(posixQuote("$(whoami)")).toBe("'$(whoami)'");
		expect(posixQuote("~/notes")).toBe("'~/notes'");
		expect(posixQuote("a=b")).toBe("'a=b'");
	});

	it("closes and reopens quotes around embedded single quotes", () => {
		expect(posixQuote("it's")).toBe("'it'\\''s'");
	});
});
