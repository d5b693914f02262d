import { describe, expect, it } from "vitest";
import { isMouseReport, parseMouseEvent } from "../src/mouse.js";
import { csi } from "./tokens.js";

describe("parseMouseEvent", () => {
	it("parses a left press with 0-based coordinates", () => {
		expect(parseMouseEvent("\x1b[<0;10;5M")).toEqual({
			action: "press",
			button: "left",
			col: 9,
			row: 4,
			shift: false,
			alt: false,
			ctrl: false,
		});
	});

	it("parses a release", () => {
		expect(parseMouseEvent(csi("\x1b[<2;1;1m"))).toMatchObject({ action: "release", button: "right" });
	});

	it("parses wheel events", () => {
		expect(parseMouseEvent("\x1b[<64;3;3M")?.action).toBe("wheel-up");
		expect(parseMouseEvent("\x1b[<65;3;3M")?.action).toBe("wheel-down");
	});

	it("parses drag and motion with modifiers", () => {
		expect(parseMouseEvent("\x1b[<48;2;2M")).toMatchObject({ action: "drag", button: "left", ctrl: true });
		expect(parseMouseEvent("\x1b[<35;2;2M")).toMatchObject({ action: "move", button: "none" });
	});

	it("rejects other tokens", () => {
		expect(parseMouseEvent(csi("\x1b[A"))).toBeUndefined();
		expect(parseMouseEvent({ kind: "char", text: "a" })).toBeUndefined();
	});
});

describe("isMouseReport", () => {
	it("recognises SGR reports by prefix", () => {
		expect(isMouseReport(csi("\x1b[<0;1;1M"))).toBe(true);
		expect(isMouseReport(csi("\x1b[A"))).toBe(false);
	});
});
