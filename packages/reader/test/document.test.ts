import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Document } from "../src/document.js";

describe("Document", () => {
	it("splits text into lines without a trailing empty line", () => {
		expect(new Document("a\nb\n", "t").lines).toEqual(["a", "b"]);
		expect(new Document("a\r\nb", "t").lines).toEqual(["a", "b"]);
		expect(new Document("", "t").lines).toEqual([""]);
	});

	it("drops a byte order mark", () => {
		expect(new Document("\uFEFFhello", "t").lines).toEqual(["hello"]);
	});

	it("removes escape sequences but keeps tabs", () => {
		expect(new Document("x\x1b[31my\tz\x07", "t").lines).toEqual(["xy\tz"]);
	});

	it("sanitizes the title", () => {
		expect(new Document("", "bad\x1b]0;evil\x07name").title).toBe("badname");
	});

	it("wraps lines to the given width and records their source line", () => {
		const doc = new Document("abcdef\ngh", "t");
		expect(doc.layout(3)).toEqual([
			{ text: "abc", sourceLine: 0 },
			{ text: "def", sourceLine: 0 },
			{ text: "gh", sourceLine: 1 },
		]);
	});

	it("caches the layout for the same width", () => {
		const doc = new Document("abcdef", "t");
		const first = doc.layout(3);
		expect(doc.layout(3)).toBe(first);
		expect(doc.layout(4)).not.toBe(first);
	});

	it("expands tabs with the given tab size", () => {
		const doc = new Document("a\tb", "t");
		expect(doc.layout(20, 8)).toEqual([{ text: "a       b", sourceLine: 0 }]);
	});

	describe("load", () => {
		let dir: string;

		beforeEach(() => {
			dir = mkdtempSync(join(tmpdir(), "folio-doc-"));
		});

		afterEach(() => {
			rmSync(dir, { recursive: true, force: true });
		});

		it("reads a file and uses its name as the title", async () => {
			const path = join(dir, "notes.txt");
			writeFileSync(path, "first\nsecond\n");
			const doc = await Document.load(path);
			expect(doc.title).toBe("notes.txt");
			expect(doc.lines).toEqual(["first", "second"]);
		});

		it("rejects a directory", async () => {
			await expect(Document.load(dir)).rejects.toThrow(`Not a file: ${dir}`);
		});

		it("rejects a missing file", async () => {
			await expect(Document.load(join(dir, "missing.txt"))).rejects.toThrow(/ENOENT/);
		});
	});
});
