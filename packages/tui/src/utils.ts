import { eastAsianWidth } from "get-east-asian-width";

export const DEFAULT_TAB_SIZE = 4;

// 字形分割器（共享实例）
const segmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });

/**
 * 检查字形集群是否可能是表情符号。
 * 快速预筛选，避免对每个字形都运行表情符号正则。
 */
function couldBeEmoji(segment: string, cp: number): boolean {
	return (
		(cp >= 0x1f000 && cp <= 0x1fbff) || // 表情符号和象形文字
		(cp >= 0x2300 && cp <= 0x23ff) || // 杂项技术符号
		(cp >= 0x2600 && cp <= 0x27bf) || // 杂项符号、装饰符号
		(cp >= 0x2b50 && cp <= 0x2b55) || // 特定的星星/圆圈
		segment.includes("\uFE0F") || // 包含 VS16（表情符号呈现选择器）
		segment.length > 2 // 多代码点序列（ZWJ、肤色等）
	);
}

// Regexes for character classification (same as string-width library)
const zeroWidthRegex = /^(?:\p{Default_Ignorable_Code_Point}|\p{Control}|\p{Mark}|\p{Surrogate})+$/u;
const leadingNonPrintingRegex = /^[\p{Default_Ignorable_Code_Point}\p{Control}\p{Format}\p{Mark}\p{Surrogate}]+/u;
const emojiPresentationRegex = /\p{Emoji_Presentation}/u;

// Cache for non-ASCII strings
const WIDTH_CACHE_SIZE = 512;
const widthCache = new Map<string, number>();

/**
 * Calculate the terminal width of a single grapheme cluster.
 * Control characters, combining marks and other ignorable clusters are 0 wide.
 */
export function graphemeWidth(segment: string): number {
	const first = segment.codePointAt(0);
	if (first === undefined) {
		return 0;
	}

	// Zero-width clusters
	if (zeroWidthRegex.test(segment)) {
		return 0;
	}

	// Emoji check with pre-filter
	if (couldBeEmoji(segment, first) && (segment.includes("\uFE0F") || emojiPresentationRegex.test(segment))) {
		return 2;
	}

	// Get base visible codepoint
	const base = segment.replace(leadingNonPrintingRegex, "");
	const cp = base.codePointAt(0);
	if (cp === undefined) {
		return 0;
	}

	let width = eastAsianWidth(cp);

	// Trailing halfwidth/fullwidth forms
	if (segment.length > 1) {
		for (const char of segment.slice(1)) {
			const c = char.codePointAt(0);
			if (c !== undefined && c >= 0xff00 && c <= 0xffef) {
				width += eastAsianWidth(c);
			}
		}
	}

	return width;
}

/**
 * Calculate the visible width of a string in terminal columns.
 * Escape sequences take no columns; tabs advance to the next tab stop.
 */
export function visibleWidth(str: string, tabSize = DEFAULT_TAB_SIZE): number {
	if (str.length === 0) {
		return 0;
	}

	// Fast path: pure ASCII printable
	let isPureAscii = true;
	for (let i = 0; i < str.length; i++) {
		const code = str.charCodeAt(i);
		if (code < 0x20 || code > 0x7e) {
			isPureAscii = false;
			break;
		}
	}
	if (isPureAscii) {
		return str.length;
	}

	const cacheKey = tabSize === DEFAULT_TAB_SIZE ? str : `${tabSize}\0${str}`;
	const cached = widthCache.get(cacheKey);
	if (cached !== undefined) {
		return cached;
	}

	let width = 0;
	for (const token of tokenizeAnsi(str)) {
		if (token.type !== "grapheme") continue;
		if (token.value === "\t") {
			width += tabSize - (width % tabSize);
		} else {
			width += graphemeWidth(token.value);
		}
	}

	// Cache result
	if (widthCache.size >= WIDTH_CACHE_SIZE) {
		const firstKey = widthCache.keys().next().value;
		if (firstKey !== undefined) {
			widthCache.delete(firstKey);
		}
	}
	widthCache.set(cacheKey, width);

	return width;
}

const CSI_REGEX = /\x1b\[[0-?]*[ -/]*[@-~]/y;

/**
 * Extract an escape sequence from a string at the given position.
 * Recognizes CSI (any final byte), and OSC/DCS/SOS/PM/APC strings
 * terminated by BEL (OSC and APC only) or ST.
 */
export function extractAnsiCode(str: string, pos: number): { code: string; length: number } | null {
	if (pos >= str.length || str[pos] !== "\x1b") return null;

	const next = str[pos + 1];

	if (next === "[") {
		CSI_REGEX.lastIndex = pos;
		const match = CSI_REGEX.exec(str);
		if (match) return { code: match[0], length: match[0].length };
		return null;
	}

	if (next === "]" || next === "_" || next === "P" || next === "X" || next === "^") {
		const allowBel = next === "]" || next === "_";
		let j = pos + 2;
		while (j < str.length) {
			if (allowBel && str[j] === "\x07") return { code: str.substring(pos, j + 1), length: j + 1 - pos };
			if (str[j] === "\x1b" && str[j + 1] === "\\") return { code: str.substring(pos, j + 2), length: j + 2 - pos };
			j++;
		}
		return null;
	}

	return null;
}

export type AnsiToken = { type: "ansi"; value: string } | { type: "grapheme"; value: string };

/**
 * 把文本拆分为转义序列和字形集群。
 * 不完整的转义序列中的 ESC 作为单独的字形返回。
 */
export function* tokenizeAnsi(text: string): Generator<AnsiToken> {
	let i = 0;
	while (i < text.length) {
		const ansi = extractAnsiCode(text, i);
		if (ansi) {
			yield { type: "ansi", value: ansi.code };
			i += ansi.length;
			continue;
		}

		// 查找下一个 ESC；ESC 是控制字符，字形边界总在它两侧
		let end = text.indexOf("\x1b", i + 1);
		if (end === -1) end = text.length;

		for (const { segment } of segmenter.segment(text.slice(i, end))) {
			yield { type: "grapheme", value: segment };
		}
		i = end;
	}
}

/**
 * 删除所有转义序列。
 */
export function stripAnsi(text: string): string {
	if (!text.includes("\x1b")) return text;
	let result = "";
	for (const token of tokenizeAnsi(text)) {
		if (token.type === "grapheme") result += token.value;
	}
	return result;
}

/**
 * 把制表符展开为空格，对齐到 tabSize 的倍数。
 */
export function expandTabs(text: string, tabSize = DEFAULT_TAB_SIZE, startColumn = 0): string {
	if (!text.includes("\t")) return text;

	let column = startColumn;
	let result = "";
	for (const token of tokenizeAnsi(text)) {
		if (token.type === "ansi") {
			result += token.value;
		} else if (token.value === "\t") {
			const spaces = tabSize - (column % tabSize);
			result += " ".repeat(spaces);
			column += spaces;
		} else if (token.value === "\n") {
			result += token.value;
			column = startColumn;
		} else {
			result += token.value;
			column += graphemeWidth(token.value);
		}
	}
	return result;
}

/**
 * 把文本截断到 maxWidth 列以内，不拆分字形集群，转义序列原样保留。
 * 制表符按 startColumn 起算的制表位展开，换行符变为空格。
 *
 * 提供 ellipsis 时，被截断的文本以重置序列和省略号结尾。
 */
export function truncateToWidth(
	text: string,
	maxWidth: number,
	options: { ellipsis?: string; startColumn?: number; tabSize?: number } = {},
): string {
	const width = Math.floor(maxWidth);
	if (!(width > 0) || text.length === 0) return "";

	const tabSize = options.tabSize ?? DEFAULT_TAB_SIZE;
	if (!/[\t\n\r]/.test(text) && visibleWidth(text, tabSize) <= width) {
		return text;
	}

	const ellipsis = options.ellipsis ?? "";
	const ellipsisWidth = visibleWidth(ellipsis);
	const needsEllipsis = ellipsis !== "" && visibleWidth(text, tabSize) > width;
	if (needsEllipsis && ellipsisWidth >= width) {
		return truncateToWidth(ellipsis, width);
	}
	const target = needsEllipsis ? width - ellipsisWidth : width;

	let result = "";
	let currentWidth = 0;
	let column = options.startColumn ?? 0;

	for (const token of tokenizeAnsi(text)) {
		if (token.type === "ansi") {
			result += token.value;
			continue;
		}

		const grapheme = token.value;
		if (grapheme === "\x1b") continue;

		const remaining = target - currentWidth;
		if (remaining <= 0) break;

		if (grapheme === "\t") {
			const take = Math.min(tabSize - (column % tabSize), remaining);
			result += " ".repeat(take);
			currentWidth += take;
			column += take;
			continue;
		}

		if (grapheme === "\n" || grapheme === "\r" || grapheme === "\r\n") {
			result += " ";
			currentWidth += 1;
			column += 1;
			continue;
		}

		const w = graphemeWidth(grapheme);
		if (w > remaining) break;
		result += grapheme;
		currentWidth += w;
		column += w;
	}

	return needsEllipsis ? `${result}\x1b[0m${ellipsis}` : result;
}

export type PadAlign = "left" | "right" | "center";

/**
 * 截断并用填充字符补齐到恰好 width 列。
 * align 表示文本的对齐方式："left" 在右侧补齐。
 */
export function padToWidth(text: string, width: number, align: PadAlign = "left", pad = " "): string {
	const w = Math.floor(width);
	if (!(w > 0)) return "";

	const clipped = truncateToWidth(text, w);
	const padLength = w - visibleWidth(clipped);
	if (padLength <= 0) return clipped;

	switch (align) {
		case "left":
			return clipped + pad.repeat(padLength);
		case "right":
			return pad.repeat(padLength) + clipped;
		case "center": {
			const left = Math.floor(padLength / 2);
			return pad.repeat(left) + clipped + pad.repeat(padLength - left);
		}
	}
}

/**
 * 按单元格宽度折行，不拆分字形集群。
 * 保留换行符；制表符相对 startColumn 展开；比 width 更宽的字形被丢弃。
 * 输入应为纯文本（不含转义序列）。
 */
export function wrapCells(text: string, width: number, startColumn = 0, tabSize = DEFAULT_TAB_SIZE): string[] {
	const w = Math.floor(width);
	if (!(w > 0)) return [""];

	const lines: string[] = [];
	let line = "";
	let lineWidth = 0;
	let column = startColumn;

	const breakLine = () => {
		lines.push(line);
		line = "";
		lineWidth = 0;
		column = startColumn;
	};

	for (const { segment } of segmenter.segment(text)) {
		if (segment === "\n" || segment === "\r\n") {
			breakLine();
			continue;
		}

		if (segment === "\t") {
			const spaces = tabSize - (column % tabSize);
			for (let i = 0; i < spaces; i++) {
				if (lineWidth >= w) breakLine();
				line += " ";
				lineWidth += 1;
				column += 1;
			}
			continue;
		}

		const cluster = segment === "\r" ? " " : segment;
		const cw = graphemeWidth(cluster);
		if (cw <= 0 || cw > w) continue;

		if (lineWidth > 0 && lineWidth + cw > w) {
			breakLine();
		}

		line += cluster;
		lineWidth += cw;
		column += cw;
	}

	lines.push(line);
	return lines;
}

/**
 * 按单词折行。连续空白折叠为一个空格；比 width 更长的单词单独占一行，不拆分。
 */
export function wrapPlainText(text: string, width: number, tabSize = DEFAULT_TAB_SIZE): string[] {
	const normalized = expandTabs(text, tabSize);
	if (normalized.length === 0) return [""];

	const w = Math.floor(width);
	if (!(w > 0)) return [normalized];

	const wrapped: string[] = [];
	let current = "";
	let currentWidth = 0;

	for (const word of normalized.split(/\s+/)) {
		if (!word) continue;

		const wordWidth = visibleWidth(word, tabSize);
		if (currentWidth === 0) {
			current = word;
			currentWidth = wordWidth;
		} else if (currentWidth + 1 + wordWidth <= w) {
			current += ` ${word}`;
			currentWidth += 1 + wordWidth;
		} else {
			wrapped.push(current);
			current = word;
			currentWidth = wordWidth;
		}
	}

	if (current) wrapped.push(current);
	return wrapped.length > 0 ? wrapped : [""];
}
