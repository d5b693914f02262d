import { DifferentialRenderer, type InputToken, MemoryOutputSink, type TerminalInput } from "@folio/tui";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { Document } from "../src/document.js";
import { createPagerKeybindings } from "../src/keybindings.js";
import { Pager } from "../src/pager.js";

const TEN_LINES = Array.from({ length: 10 }, (_, i) => `line ${i + 1}`).join("\n");

function key(text: string): TerminalInput {
	const token: InputToken = { kind: "char", text };
	return { type: "token", token };
}

function wheel(action: "wheel-up" | "wheel-down"): TerminalInput {
	return {
		type: "mouse",
		mouse: { action, button: "none", col: 0, row: 0, shift: false, alt: false, ctrl: false },
	};
}

describe("Pager", () => {
	let sink: MemoryOutputSink;
	let renderer: DifferentialRenderer;

	beforeEach(() => {
		sink = new MemoryOutputSink();
		renderer = new DifferentialRenderer(sink);
	});

	function open(text = TEN_LINES, width = 20, height = 5): Pager {
		const pager = new Pager(new Document(text, "notes.txt"), renderer);
		pager.resize(width, height);
		return pager;
	}

	it("draws a header, the visible lines and a footer", () => {
		const pager = open();
		pager.render();
		expect(sink.take()).toBe(
			"\x1b[1;1H\x1b[2K\x1b[7m notes.txt          \x1b[0m" +
				"\x1b[2;1H\x1b[2Kline 1" +
				"\x1b[3;1H\x1b[2Kline 2" +
				"\x1b[4;1H\x1b[2Kline 3" +
				"\x1b[5;1H\x1b[2K\x1b[2m          1-3/10 30%\x1b[0m",
		);
	});

	it("redraws only the content and footer when scrolling one line", () => {
		const pager = open();
		pager.render();
		sink.take();

		expect(pager.handleInput(key("j"))).toBe("lineDown");
		pager.render();

		expect(sink.take()).toBe(
			"\x1b[2;1H\x1b[2Kline 2" +
				"\x1b[3;1H\x1b[2Kline 3" +
				"\x1b[4;1H\x1b[2Kline 4" +
				"\x1b[5;1H\x1b[2K\x1b[2m          2-4/10 40%\x1b[0m",
		);
	});

	it("pages and jumps to either end", () => {
		const pager = open();
		pager.handleInput(key(" "));
		expect(pager.position.top).toBe(3);
		pager.handleInput(key("G"));
		expect(pager.position.top).toBe(7);
		pager.handleInput(key("j"));
		expect(pager.position.top).toBe(7);
		pager.handleInput(key("b"));
		expect(pager.position.top).toBe(4);
		pager.handleInput(key("g"));
		expect(pager.position.top).toBe(0);
		pager.handleInput(key("k"));
		expect(pager.position.top).toBe(0);
	});

	it("scrolls half a page with ctrl+d and ctrl+u", () => {
		const pager = open(TEN_LINES, 20, 8);
		pager.handleInput(key("\x04"));
		expect(pager.position.top).toBe(3);
		pager.handleInput(key("\x15"));
		expect(pager.position.top).toBe(0);
	});

	it("scrolls one line per wheel event", () => {
		const pager = open();
		expect(pager.handleInput(wheel("wheel-down"))).toBe("lineDown");
		expect(pager.handleInput(wheel("wheel-down"))).toBe("lineDown");
		expect(pager.handleInput(wheel("wheel-up"))).toBe("lineUp");
		expect(pager.position.top).toBe(1);
	});

	it("ignores unbound keys and pasted text", () => {
		const pager = open();
		expect(pager.handleInput(key("z"))).toBeUndefined();
		expect(pager.handleInput({ type: "paste", text: "jjj" })).toBeUndefined();
		expect(pager.position.top).toBe(0);
	});

	it("quits on q, ctrl+c or escape", () => {
		for (const input of [key("q"), key("\x03"), { type: "token", token: { kind: "escape" } } satisfies TerminalInput]) {
			const onQuit = vi.fn();
			const pager = new Pager(new Document(TEN_LINES, "t"), renderer, { onQuit });
			pager.resize(20, 5);
			expect(pager.handleInput(input)).toBe("quit");
			expect(pager.finished).toBe(true);
			expect(onQuit).toHaveBeenCalledTimes(1);
		}
	});

	it("uses configured keybindings", () => {
		const pager = new Pager(new Document(TEN_LINES, "t"), renderer, {
			keybindings: createPagerKeybindings({ lineDown: "n" }),
		});
		pager.resize(20, 5);
		expect(pager.handleInput(key("j"))).toBeUndefined();
		expect(pager.handleInput(key("n"))).toBe("lineDown");
	});

	it("shows the toggle result in the footer until the next action", () => {
		const pager = new Pager(new Document(TEN_LINES, "notes.txt"), renderer, {
			onToggleMouse: () => "Mouse off",
		});
		pager.resize(20, 5);
		pager.render();
		sink.take();

		expect(pager.handleInput(key("m"))).toBe("toggleMouse");
		pager.render();
		expect(sink.take()).toBe("\x1b[5;1H\x1b[2K\x1b[2mMouse off 1-3/10 30%\x1b[0m");

		pager.handleInput(key("k"));
		pager.render();
		expect(sink.take()).toBe("\x1b[5;1H\x1b[2K\x1b[2m          1-3/10 30%\x1b[0m");
	});

	it("redraws the whole screen on ctrl+l", () => {
		const pager = open();
		pager.render();
		sink.take();

		pager.handleInput(key("\x0c"));
		pager.render();
		expect(renderer.stats.fullRedraws).toBe(2);
		expect(renderer.stats.rowsRedrawn).toBe(10);
	});

	it("shows only content when the screen is shorter than three rows", () => {
		const pager = open(TEN_LINES, 20, 2);
		pager.render();
		expect(sink.take()).toBe("\x1b[1;1H\x1b[2Kline 1\x1b[2;1H\x1b[2Kline 2");
		expect(pager.position.visible).toBe(2);
	});

	it("keeps the top source line when the width changes", () => {
		const pager = open("abcdefgh\nijklmnop\nqrst", 4, 3);
		expect(pager.position.total).toBe(5);
		pager.handleInput(key("j"));
		pager.handleInput(key("j"));
		pager.handleInput(key("j"));
		expect(pager.position.top).toBe(3);

		pager.resize(4, 3);
		expect(pager.position.top).toBe(3);

		pager.resize(8, 3);
		expect(pager.position).toEqual({ top: 1, total: 3, visible: 1 });
	});

	it("reports an empty document as fully visible", () => {
		const pager = open("", 20, 3);
		pager.render();
		expect(sink.take()).toBe(
			"\x1b[1;1H\x1b[2K\x1b[7m notes.txt          \x1b[0m" +
				"\x1b[2;1H\x1b[2K" +
				"\x1b[3;1H\x1b[2K\x1b[2m          1-1/1 100%\x1b[0m",
		);
	});
});
