import { describe, expect, it } from "vitest";
import { InvariantError } from "../src/errors.js";
import { CONTINUATION, Frame } from "../src/frame.js";

describe("Frame", () => {
	it("renders an untouched frame as empty rows", () => {
		const frame = new Frame(3, 2);
		expect(frame.renderedRows()).toEqual(["", ""]);
	});

	it("writes text at a 1-based position", () => {
		const frame = new Frame(10, 2);
		frame.write(1, 1, "hello");
		frame.write(2, 3, "hi");
		expect(frame.renderedRows()).toEqual(["hello", "  hi"]);
	});

	it("clips writes outside the grid", () => {
		const frame = new Frame(5, 2);
		frame.write(0, 1, "x");
		frame.write(3, 1, "x");
		frame.write(1, 6, "x");
		frame.write(1, 0, "x");
		frame.write(1, 4, "abcdef");
		expect(frame.renderedRows()).toEqual(["   ab", ""]);
	});

	describe("wide glyphs", () => {
		it("marks the cell to the right of a wide glyph as a continuation", () => {
			const frame = new Frame(10, 1);
			frame.write(1, 1, "中");
			expect(frame.cellAt(1, 1)?.glyph).toBe("中");
			expect(frame.cellAt(1, 2)?.glyph).toBe(CONTINUATION);
			expect(frame.renderRow(1)).toBe("中");
		});

		it("clears the continuation when the left half is overwritten", () => {
			const frame = new Frame(10, 1);
			frame.write(1, 1, "中");
			frame.write(1, 1, "a");
			expect(frame.cellAt(1, 2)?.glyph).toBe(" ");
			expect(frame.renderRow(1)).toBe("a");
		});

		it("clears the anchor when the right half is overwritten", () => {
			const frame = new Frame(10, 1);
			frame.write(1, 1, "中");
			frame.write(1, 2, "b");
			expect(frame.cellAt(1, 1)?.glyph).toBe(" ");
			expect(frame.renderRow(1)).toBe(" b");
		});

		it("clears both neighbours when a wide glyph straddles two others", () => {
			const frame = new Frame(10, 1);
			frame.write(1, 1, "中文");
			frame.write(1, 2, "字");
			expect(frame.cellAt(1, 1)?.glyph).toBe(" ");
			expect(frame.cellAt(1, 3)?.glyph).toBe(CONTINUATION);
			expect(frame.cellAt(1, 4)?.glyph).toBe(" ");
			expect(frame.renderRow(1)).toBe(" 字");
		});

		it("stops writing when a wide glyph does not fit", () => {
			const frame = new Frame(3, 1);
			frame.write(1, 2, "a中");
			expect(frame.renderRow(1)).toBe(" a");
		});
	});

	describe("styles", () => {
		it("groups cells with the same style into one run", () => {
			const frame = new Frame(10, 1);
			frame.write(1, 1, "ab", { bold: true });
			frame.write(1, 3, "cd");
			expect(frame.renderRow(1)).toBe("\x1b[1mab\x1b[0mcd");
		});

		it("applies SGR sequences embedded in the text", () => {
			const frame = new Frame(10, 1);
			frame.write(1, 1, "a\x1b[31mb\x1b[0mc");
			expect(frame.cellAt(1, 2)?.style).toEqual({ fg: "31" });
			expect(frame.renderRow(1)).toBe("a\x1b[31mb\x1b[0mc");
		});

		it("keeps trailing spaces that carry a style", () => {
			const frame = new Frame(5, 1);
			frame.write(1, 1, "  ", { inverse: true });
			expect(frame.renderRow(1)).toBe("\x1b[7m  \x1b[0m");
		});

		it("ignores non-SGR escape sequences", () => {
			const frame = new Frame(10, 1);
			frame.write(1, 1, "a\x1b[2Kb\x1b]0;title\x07c");
			expect(frame.renderRow(1)).toBe("abc");
		});
	});

	it("expands tabs to the next tab stop", () => {
		const frame = new Frame(10, 1, { tabSize: 4 });
		frame.write(1, 1, "a\tb");
		expect(frame.renderRow(1)).toBe("a   b");
	});

	it("writes line breaks as spaces", () => {
		const frame = new Frame(10, 1);
		frame.write(1, 1, "a\nb\r\nc");
		expect(frame.renderRow(1)).toBe("a b c");
	});

	it("clear resets every cell", () => {
		const frame = new Frame(4, 1);
		frame.write(1, 1, "abcd", { bold: true });
		frame.clear();
		expect(frame.renderRow(1)).toBe("");
		expect(frame.cellAt(1, 1)).toEqual({ glyph: " ", style: undefined });
	});

	it("clamps invalid dimensions unless strict", () => {
		const frame = new Frame(-3, 2, { strict: false });
		expect(frame.width).toBe(0);
		expect(frame.renderedRows()).toEqual(["", ""]);
		expect(() => new Frame(-3, 2, { strict: true })).toThrow(InvariantError);
	});
});
