/**
 * 单元格样式。字段全部可选，空对象表示默认样式。
 * 颜色保存完整的 SGR 参数，例如 "31"、"38;5;240" 或 "48;2;10;20;30"。
 */
export interface Style {
	readonly fg?: string;
	readonly bg?: string;
	readonly bold?: boolean;
	readonly dim?: boolean;
	readonly italic?: boolean;
	readonly underline?: boolean;
	readonly inverse?: boolean;
	readonly strikethrough?: boolean;
}

/** 标准前景色（背景色用 background() 转换） */
export const Colors = {
	black: "30",
	red: "31",
	green: "32",
	yellow: "33",
	blue: "34",
	magenta: "35",
	cyan: "36",
	white: "37",
	gray: "90",
	brightRed: "91",
	brightGreen: "92",
	brightYellow: "93",
	brightBlue: "94",
	brightMagenta: "95",
	brightCyan: "96",
	brightWhite: "97",
} as const;

export type ColorName = keyof typeof Colors;

/**
 * 把前景色参数转换为对应的背景色参数。
 */
export function background(fg: string): string {
	if (fg.startsWith("38;")) return `48;${fg.slice(3)}`;
	const code = Number.parseInt(fg, 10);
	if ((code >= 30 && code <= 37) || (code >= 90 && code <= 97)) {
		return String(code + 10);
	}
	return fg;
}

export function color256(index: number): string {
	return `38;5;${index}`;
}

export function rgb(r: number, g: number, b: number): string {
	return `38;2;${r};${g};${b}`;
}

const sgrCache = new WeakMap<Style, string>();

/**
 * 样式对应的 SGR 序列；默认样式返回空字符串。
 */
export function styleToSgr(style: Style | undefined): string {
	if (!style) return "";
	const cached = sgrCache.get(style);
	if (cached !== undefined) return cached;

	const codes: string[] = [];
	if (style.bold) codes.push("1");
	if (style.dim) codes.push("2");
	if (style.italic) codes.push("3");
	if (style.underline) codes.push("4");
	if (style.inverse) codes.push("7");
	if (style.strikethrough) codes.push("9");
	if (style.fg) codes.push(style.fg);
	if (style.bg) codes.push(style.bg);

	const sgr = codes.length === 0 ? "" : `\x1b[${codes.join(";")}m`;
	sgrCache.set(style, sgr);
	return sgr;
}

/**
 * 样式相等的判断依据：SGR 相同的样式视为同一样式。
 */
export function styleKey(style: Style | undefined): string {
	return styleToSgr(style);
}

export function isDefaultStyle(style: Style | undefined): boolean {
	return styleToSgr(style) === "";
}

/**
 * 跟踪文本中的 SGR 序列，得到当前生效的样式。
 * 非 SGR 的 CSI 序列不影响样式。
 */
export class StyleTracker {
	private bold = false;
	private dim = false;
	private italic = false;
	private underline = false;
	private inverse = false;
	private strikethrough = false;
	private fgColor: string | undefined;
	private bgColor: string | undefined;
	private snapshot: Style | undefined;
	private dirty = false;

	constructor(initial?: Style) {
		if (initial) this.set(initial);
	}

	/**
	 * 处理一个 CSI 序列，返回它是否是 SGR 序列。
	 */
	process(sequence: string): boolean {
		const match = sequence.match(/^\x1b\[([\d;:]*)m$/);
		if (!match) return false;

		const params = match[1] ?? "";
		if (params === "" || params === "0") {
			this.reset();
			return true;
		}

		const parts = params.split(/[;:]/);
		let i = 0;
		while (i < parts.length) {
			// 空参数按 0 处理（如 ESC[;1m）
			const part = parts[i] ?? "";
			const code = part === "" ? 0 : Number.parseInt(part, 10);

			// 38;5;N / 38;2;R;G;B 以及对应的背景色占用多个参数
			if (code === 38 || code === 48) {
				let color: string | undefined;
				if (parts[i + 1] === "5" && parts[i + 2] !== undefined) {
					color = parts.slice(i, i + 3).join(";");
					i += 3;
				} else if (parts[i + 1] === "2" && parts[i + 4] !== undefined) {
					color = parts.slice(i, i + 5).join(";");
					i += 5;
				}
				if (color !== undefined) {
					if (code === 38) this.fgColor = color;
					else this.bgColor = color;
					this.dirty = true;
					continue;
				}
			}

			this.apply(code);
			i++;
		}
		return true;
	}

	private apply(code: number): void {
		this.dirty = true;
		switch (code) {
			case 0:
				this.reset();
				break;
			case 1:
				this.bold = true;
				break;
			case 2:
				this.dim = true;
				break;
			case 3:
				this.italic = true;
				break;
			case 4:
				this.underline = true;
				break;
			case 7:
				this.inverse = true;
				break;
			case 9:
				this.strikethrough = true;
				break;
			case 21:
				this.bold = false;
				break;
			case 22:
				this.bold = false;
				this.dim = false;
				break;
			case 23:
				this.italic = false;
				break;
			case 24:
				this.underline = false;
				break;
			case 27:
				this.inverse = false;
				break;
			case 29:
				this.strikethrough = false;
				break;
			case 39:
				this.fgColor = undefined;
				break;
			case 49:
				this.bgColor = undefined;
				break;
			default:
				if ((code >= 30 && code <= 37) || (code >= 90 && code <= 97)) {
					this.fgColor = String(code);
				} else if ((code >= 40 && code <= 47) || (code >= 100 && code <= 107)) {
					this.bgColor = String(code);
				}
				break;
		}
	}

	set(style: Style): void {
		this.bold = style.bold ?? false;
		this.dim = style.dim ?? false;
		this.italic = style.italic ?? false;
		this.underline = style.underline ?? false;
		this.inverse = style.inverse ?? false;
		this.strikethrough = style.strikethrough ?? false;
		this.fgColor = style.fg;
		this.bgColor = style.bg;
		this.dirty = true;
	}

	reset(): void {
		this.bold = false;
		this.dim = false;
		this.italic = false;
		this.underline = false;
		this.inverse = false;
		this.strikethrough = false;
		this.fgColor = undefined;
		this.bgColor = undefined;
		this.dirty = true;
	}

	/**
	 * 当前样式；默认样式返回 undefined。
	 * 样式没有变化时返回同一个对象，相邻单元格可以共享引用。
	 */
	current(): Style | undefined {
		if (!this.dirty) return this.snapshot;
		this.dirty = false;

		const style: { -readonly [K in keyof Style]: Style[K] } = {};
		if (this.fgColor !== undefined) style.fg = this.fgColor;
		if (this.bgColor !== undefined) style.bg = this.bgColor;
		if (this.bold) style.bold = true;
		if (this.dim) style.dim = true;
		if (this.italic) style.italic = true;
		if (this.underline) style.underline = true;
		if (this.inverse) style.inverse = true;
		if (this.strikethrough) style.strikethrough = true;
		this.snapshot = isDefaultStyle(style) ? undefined : Object.freeze(style);
		return this.snapshot;
	}
}
