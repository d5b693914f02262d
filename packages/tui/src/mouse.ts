import type { InputToken } from "./input-decoder.js";

export type MouseAction = "press" | "release" | "drag" | "move" | "wheel-up" | "wheel-down" | "wheel-left" | "wheel-right";

export type MouseButton = "left" | "middle" | "right" | "none";

/**
 * SGR 鼠标事件。col/row 从 0 开始。
 */
export interface MouseEvent {
	action: MouseAction;
	button: MouseButton;
	col: number;
	row: number;
	shift: boolean;
	alt: boolean;
	ctrl: boolean;
}

const SGR_MOUSE_REGEX = /^\x1b\[<(\d+);(\d+);(\d+)([Mm])$/;
const BUTTONS: readonly MouseButton[] = ["left", "middle", "right", "none"];
const WHEEL_ACTIONS: readonly MouseAction[] = ["wheel-up", "wheel-down", "wheel-left", "wheel-right"];

/**
 * 解析 SGR（1006）鼠标报告：`ESC [ < code ; x ; y M|m`。
 * 不是鼠标报告时返回 undefined。
 */
export function parseMouseEvent(input: InputToken | string): MouseEvent | undefined {
	let raw: string;
	if (typeof input === "string") {
		raw = input;
	} else if (input.kind === "csi") {
		raw = input.raw;
	} else {
		return undefined;
	}

	const match = raw.match(SGR_MOUSE_REGEX);
	if (!match) return undefined;

	const code = Number.parseInt(match[1] ?? "", 10);
	const x = Number.parseInt(match[2] ?? "", 10);
	const y = Number.parseInt(match[3] ?? "", 10);
	const released = match[4] === "m";

	const base = code & 3;
	const modifiers = {
		shift: (code & 4) !== 0,
		alt: (code & 8) !== 0,
		ctrl: (code & 16) !== 0,
	};
	const position = { col: Math.max(0, x - 1), row: Math.max(0, y - 1) };

	if (code & 64) {
		return { action: WHEEL_ACTIONS[base] ?? "wheel-up", button: "none", ...position, ...modifiers };
	}

	const button = BUTTONS[base] ?? "none";
	let action: MouseAction;
	if (code & 32) {
		action = button === "none" ? "move" : "drag";
	} else if (released) {
		action = "release";
	} else {
		action = "press";
	}

	return { action, button, ...position, ...modifiers };
}

export function isMouseReport(token: InputToken): boolean {
	return token.kind === "csi" && token.raw.startsWith("\x1b[<");
}
