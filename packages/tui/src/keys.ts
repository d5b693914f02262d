import type { InputToken } from "./input-decoder.js";

/**
 * 按键描述。name 对可打印字符就是字符本身（区分大小写），
 * 对功能键是固定名称，例如 "up"、"pageDown"、"f5"。
 */
export interface KeyEvent {
	name: string;
	ctrl: boolean;
	alt: boolean;
	shift: boolean;
}

/**
 * 按键标识，格式为 "[ctrl+][alt+][shift+]name"，例如 "ctrl+c"、"shift+tab"、"G"。
 */
export type KeyId = string;

const NAMED_CONTROLS: Record<string, string> = {
	"\r": "enter",
	"\n": "enter",
	"\t": "tab",
	"\x7f": "backspace",
	"\b": "backspace",
	" ": "space",
};

const CSI_LETTER_KEYS: Record<string, string> = {
	A: "up",
	B: "down",
	C: "right",
	D: "left",
	E: "clear",
	F: "end",
	H: "home",
	P: "f1",
	Q: "f2",
	R: "f3",
	S: "f4",
};

const CSI_TILDE_KEYS: Record<number, string> = {
	1: "home",
	2: "insert",
	3: "delete",
	4: "end",
	5: "pageUp",
	6: "pageDown",
	7: "home",
	8: "end",
	11: "f1",
	12: "f2",
	13: "f3",
	14: "f4",
	15: "f5",
	17: "f6",
	18: "f7",
	19: "f8",
	20: "f9",
	21: "f10",
	23: "f11",
	24: "f12",
};

function plainKey(name: string, modifiers: Partial<Omit<KeyEvent, "name">> = {}): KeyEvent {
	return { name, ctrl: modifiers.ctrl ?? false, alt: modifiers.alt ?? false, shift: modifiers.shift ?? false };
}

function describeChar(text: string): KeyEvent | undefined {
	const named = NAMED_CONTROLS[text];
	if (named) return plainKey(named);

	const code = text.codePointAt(0);
	if (code === undefined) return undefined;

	if (code === 0) return plainKey("space", { ctrl: true });
	if (code >= 1 && code <= 26) {
		return plainKey(String.fromCharCode(code + 0x60), { ctrl: true });
	}
	// 0x1c-0x1f：Ctrl+\ ] ^ _
	if (code >= 0x1c && code <= 0x1f) {
		return plainKey(String.fromCharCode(code + 0x40), { ctrl: true });
	}
	if (code < 0x20 || (code >= 0x80 && code <= 0x9f)) return undefined;

	return plainKey(text);
}

/**
 * xterm 修饰参数：值减 1 后按位表示 shift(1)、alt(2)、ctrl(4)。
 */
function applyModifier(event: KeyEvent, param: string | undefined): KeyEvent {
	const value = param ? Number.parseInt(param, 10) : 1;
	if (!Number.isFinite(value) || value <= 1) return event;
	const bits = value - 1;
	return {
		...event,
		shift: event.shift || (bits & 1) !== 0,
		alt: event.alt || (bits & 2) !== 0,
		ctrl: event.ctrl || (bits & 4) !== 0,
	};
}

function describeCsi(raw: string): KeyEvent | undefined {
	const match = raw.match(/^\x1b\[([0-9;]*)([~A-Za-z])$/);
	if (!match) return undefined;

	const params = (match[1] ?? "").split(";");
	const final = match[2] ?? "";

	if (final === "Z") return plainKey("tab", { shift: true });

	if (final === "~") {
		const name = CSI_TILDE_KEYS[Number.parseInt(params[0] ?? "", 10)];
		return name ? applyModifier(plainKey(name), params[1]) : undefined;
	}

	const name = CSI_LETTER_KEYS[final];
	return name ? applyModifier(plainKey(name), params[1]) : undefined;
}

function describeSs3(raw: string): KeyEvent | undefined {
	const name = CSI_LETTER_KEYS[raw.slice(2)];
	return name ? plainKey(name) : undefined;
}

/**
 * 把输入令牌解释为按键。鼠标报告、字符串序列和替换字符返回 undefined。
 */
export function describeKey(token: InputToken): KeyEvent | undefined {
	switch (token.kind) {
		case "char":
			return describeChar(token.text);
		case "alt": {
			if (token.text === "\x7f" || token.text === "\b") return plainKey("backspace", { alt: true });
			const inner = describeChar(token.text);
			return inner ? { ...inner, alt: true } : undefined;
		}
		case "escape":
			return plainKey("escape");
		case "csi":
			return describeCsi(token.raw);
		case "ss3":
			return describeSs3(token.raw);
		case "string":
		case "replacement":
			return undefined;
	}
}

export function formatKey(event: KeyEvent): KeyId {
	let id = "";
	if (event.ctrl) id += "ctrl+";
	if (event.alt) id += "alt+";
	if (event.shift) id += "shift+";
	return id + event.name;
}

/**
 * 解析按键标识。最后一段是键名，所以 "ctrl++" 表示 Ctrl 加 "+" 键。
 */
export function parseKeyId(keyId: KeyId): KeyEvent {
	const modifiers = { ctrl: false, alt: false, shift: false };
	let rest = keyId;
	for (;;) {
		const plus = rest.indexOf("+");
		if (plus <= 0 || plus === rest.length - 1) break;
		const modifier = rest.slice(0, plus).toLowerCase();
		if (modifier !== "ctrl" && modifier !== "alt" && modifier !== "shift") break;
		modifiers[modifier] = true;
		rest = rest.slice(plus + 1);
	}
	return { name: rest, ...modifiers };
}

function sameName(a: string, b: string): boolean {
	// 单字符键名区分大小写（"g" 与 "G" 是不同的键）
	if (a.length === 1 || b.length === 1) return a === b;
	return a.toLowerCase() === b.toLowerCase();
}

/**
 * 检查令牌是否是指定的按键。
 */
export function matchesKey(token: InputToken | KeyEvent | undefined, keyId: KeyId): boolean {
	if (!token) return false;
	const event = "kind" in token ? describeKey(token) : token;
	if (!event) return false;

	const expected = parseKeyId(keyId);
	return (
		sameName(event.name, expected.name) &&
		event.ctrl === expected.ctrl &&
		event.alt === expected.alt &&
		event.shift === expected.shift
	);
}
