import { describe, expect, it } from "vitest";
import { KeybindingsManager } from "../src/keybindings.js";
import { csi } from "./tokens.js";

type Action = "save" | "close" | "up";

const DEFAULTS = {
	save: "ctrl+s",
	close: ["q", "escape"],
	up: ["up", "k"],
} satisfies Record<Action, string | string[]>;

describe("KeybindingsManager", () => {
	it("matches default bindings", () => {
		const keys = new KeybindingsManager<Action>(DEFAULTS);
		expect(keys.matches({ kind: "char", text: "\x13" }, "save")).toBe(true);
		expect(keys.matches({ kind: "escape" }, "close")).toBe(true);
		expect(keys.matches({ kind: "char", text: "k" }, "close")).toBe(false);
	});

	it("resolves the first matching action", () => {
		const keys = new KeybindingsManager<Action>(DEFAULTS);
		expect(keys.resolve(csi("\x1b[A"))).toBe("up");
		expect(keys.resolve({ kind: "char", text: "z" })).toBeUndefined();
		expect(keys.resolve({ kind: "replacement", reason: "malformed" })).toBeUndefined();
	});

	it("lets user configuration replace the defaults per action", () => {
		const keys = new KeybindingsManager<Action>(DEFAULTS, { close: "x" });
		expect(keys.getKeys("close")).toEqual(["x"]);
		expect(keys.getKeys("up")).toEqual(["up", "k"]);
		expect(keys.resolve({ kind: "char", text: "q" })).toBeUndefined();
	});

	it("accepts key events as well as tokens", () => {
		const keys = new KeybindingsManager<Action>(DEFAULTS);
		expect(keys.resolve({ name: "s", ctrl: true, alt: false, shift: false })).toBe("save");
	});

	it("rebuilds the bindings on setConfig", () => {
		const keys = new KeybindingsManager<Action>(DEFAULTS, { save: "f2" });
		keys.setConfig({});
		expect(keys.getKeys("save")).toEqual(["ctrl+s"]);
	});
});
