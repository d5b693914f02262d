import { describe, expect, it } from "vitest";
import { isPrintableChar, sanitizeForTerminal } from "../src/sanitize.js";

describe("sanitizeForTerminal", () => {
	it("removes title sequences and colour codes but keeps the text", () => {
		expect(sanitizeForTerminal("\x1b]0;title\x07hi \x1b[31mred\x1b[0m")).toBe("hi red");
	});

	it("removes 8-bit control sequences", () => {
		expect(sanitizeForTerminal("\u009b31mx\u009d0;t\u009cy")).toBe("xy");
	});

	it("drops C0 and C1 control characters and DEL", () => {
		expect(sanitizeForTerminal("a\x00b\x7fc\u0085d")).toBe("abcd");
	});

	it("swallows an unterminated string sequence", () => {
		expect(sanitizeForTerminal("x\x1b]0;never ends")).toBe("x");
	});

	it("replaces line breaks and tabs with spaces by default", () => {
		expect(sanitizeForTerminal("a\r\nb\tc\rd")).toBe("a b c d");
	});

	it("keeps line breaks and tabs when asked", () => {
		expect(sanitizeForTerminal("a\r\nb\tc\rd", { preserveNewlines: true, preserveTabs: true })).toBe("a\nb\tc\nd");
	});

	it("keeps non-ASCII text", () => {
		expect(sanitizeForTerminal("中文 😀")).toBe("中文 😀");
	});
});

describe("isPrintableChar", () => {
	it("accepts single printable characters only", () => {
		expect(isPrintableChar("a")).toBe(true);
		expect(isPrintableChar("😀")).toBe(true);
		expect(isPrintableChar("\x1b")).toBe(false);
		expect(isPrintableChar("\u0090")).toBe(false);
		expect(isPrintableChar("ab")).toBe(false);
		expect(isPrintableChar("")).toBe(false);
	});
});
