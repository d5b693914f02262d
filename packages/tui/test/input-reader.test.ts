import { EventEmitter } from "events";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ManualClock } from "../src/clock.js";
import type { InputToken } from "../src/input-decoder.js";
import { InputReader } from "../src/input-reader.js";
import type { MouseEvent } from "../src/mouse.js";
import { csi } from "./tokens.js";

describe("InputReader", () => {
	let clock: ManualClock;
	let reader: InputReader;
	let tokens: InputToken[];

	beforeEach(() => {
		vi.useFakeTimers();
		clock = new ManualClock();
		reader = new InputReader({ clock });
		tokens = [];
		reader.on("token", (token) => tokens.push(token));
	});

	afterEach(() => {
		reader.destroy();
		vi.useRealTimers();
	});

	it("delivers a lone ESC only after the escape timeout fires", () => {
		reader.push("\x1b");
		expect(tokens).toEqual([]);
		expect(reader.pending).toBe(true);

		clock.advance(49);
		vi.advanceTimersByTime(49);
		expect(tokens).toEqual([]);

		clock.advance(1);
		vi.advanceTimersByTime(1);
		expect(tokens).toEqual([{ kind: "escape" }]);
		expect(reader.pending).toBe(false);
	});

	it("delivers a CSI immediately when it arrives in two chunks", () => {
		reader.push("\x1b[");
		expect(tokens).toEqual([]);
		reader.push("A");
		expect(tokens).toEqual([csi("\x1b[A")]);
		expect(reader.pending).toBe(false);
	});

	it("emits plain characters in order", () => {
		reader.push("ab");
		expect(tokens).toEqual([
			{ kind: "char", text: "a" },
			{ kind: "char", text: "b" },
		]);
	});

	it("collects bracketed paste content into one event", () => {
		const pastes: string[] = [];
		reader.on("paste", (text) => pastes.push(text));

		reader.push("\x1b[200~hello");
		reader.push(" world\x1b[201~x");

		expect(pastes).toEqual(["hello world"]);
		expect(tokens).toEqual([{ kind: "char", text: "x" }]);
	});

	it("emits mouse events alongside the raw token", () => {
		const events: MouseEvent[] = [];
		reader.on("mouse", (event) => events.push(event));

		reader.push("\x1b[<64;3;4M");

		expect(tokens).toEqual([csi("\x1b[<64;3;4M")]);
		expect(events).toEqual([
			{ action: "wheel-up", button: "none", col: 2, row: 3, shift: false, alt: false, ctrl: false },
		]);
	});

	it("reads from an attached source until detached", () => {
		const source = new EventEmitter();
		reader.attach(source);
		source.emit("data", Buffer.from("q"));
		reader.detach();
		source.emit("data", Buffer.from("r"));

		expect(tokens).toEqual([{ kind: "char", text: "q" }]);
	});

	it("cancels the pending timer on destroy", () => {
		reader.push("\x1b");
		reader.destroy();
		expect(reader.pending).toBe(false);
		expect(reader.decoder.bufferedBytes).toBe(0);
	});
});
