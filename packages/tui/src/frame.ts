import { clampDimension } from "./errors.js";
import { RESET } from "./ansi.js";
import { type Style, StyleTracker, styleToSgr } from "./style.js";
import { DEFAULT_TAB_SIZE, graphemeWidth, tokenizeAnsi } from "./utils.js";

/**
 * 宽字形右侧被占用的单元格。渲染时跳过，不输出任何字符。
 */
export const CONTINUATION: unique symbol = Symbol("folio.wide-continuation");

export type Glyph = string | typeof CONTINUATION;

export interface Cell {
	readonly glyph: Glyph;
	readonly style: Style | undefined;
}

export interface FrameOptions {
	tabSize?: number;
	/** 尺寸非法时抛出 InvariantError，而不是钳制 */
	strict?: boolean;
}

/**
 * 一帧的单元格网格。坐标从 1 开始，(1, 1) 是左上角。
 *
 * 写入越界时静默丢弃，超出行宽的部分被截断；
 * 宽字形写入锚点单元格，右侧单元格标记为 CONTINUATION。
 */
export class Frame {
	readonly width: number;
	readonly height: number;
	private readonly tabSize: number;
	private glyphs: Glyph[][];
	private styles: (Style | undefined)[][];

	constructor(width: number, height: number, options: FrameOptions = {}) {
		this.width = clampDimension(width, "width", options.strict);
		this.height = clampDimension(height, "height", options.strict);
		this.tabSize = options.tabSize !== undefined && options.tabSize > 0 ? Math.floor(options.tabSize) : DEFAULT_TAB_SIZE;
		this.glyphs = [];
		this.styles = [];
		this.clear();
	}

	/**
	 * 所有单元格恢复为无样式的空格。
	 */
	clear(): void {
		this.glyphs = Array.from({ length: this.height }, () => new Array<Glyph>(this.width).fill(" "));
		this.styles = Array.from({ length: this.height }, () => new Array<Style | undefined>(this.width).fill(undefined));
	}

	/**
	 * 从 (row, col) 开始写入文本。
	 * 文本中的 SGR 序列改变后续字形的样式，其他转义序列不占用单元格。
	 * 制表符展开到下一个制表位，换行符写为空格。
	 */
	write(row: number, col: number, text: string, style?: Style): void {
		const r = Math.trunc(row) - 1;
		let c = Math.trunc(col) - 1;
		if (!(r >= 0 && r < this.height && c >= 0 && c < this.width)) return;

		const glyphRow = this.glyphs[r];
		const styleRow = this.styles[r];
		if (!glyphRow || !styleRow) return;

		const tracker = new StyleTracker(style);

		for (const token of tokenizeAnsi(text)) {
			if (token.type === "ansi") {
				if (token.value.startsWith("\x1b[")) tracker.process(token.value);
				continue;
			}
			if (c >= this.width) break;

			const segment = token.value;
			if (segment === "\x1b") continue;

			if (segment === "\t") {
				const spaces = this.tabSize - (c % this.tabSize);
				const current = tracker.current();
				for (let i = 0; i < spaces && c < this.width; i++) {
					this.clearWideOverlap(glyphRow, styleRow, c);
					glyphRow[c] = " ";
					styleRow[c] = current;
					c++;
				}
				continue;
			}

			const cluster = segment === "\n" || segment === "\r" || segment === "\r\n" ? " " : segment;
			const w = graphemeWidth(cluster);
			if (w <= 0) continue;
			if (w > this.width - c) break;

			this.clearWideOverlap(glyphRow, styleRow, c);
			glyphRow[c] = cluster;
			styleRow[c] = tracker.current();
			for (let i = 1; i < w; i++) {
				this.clearWideOverlap(glyphRow, styleRow, c + i);
				glyphRow[c + i] = CONTINUATION;
				styleRow[c + i] = undefined;
			}
			c += w;
		}
	}

	/**
	 * 覆盖一个单元格前，清掉与它重叠的宽字形的另一半。
	 */
	private clearWideOverlap(glyphRow: Glyph[], styleRow: (Style | undefined)[], c: number): void {
		if (glyphRow[c] === CONTINUATION) {
			if (c > 0) {
				glyphRow[c - 1] = " ";
				styleRow[c - 1] = undefined;
			}
		} else if (glyphRow[c + 1] === CONTINUATION) {
			glyphRow[c + 1] = " ";
			styleRow[c + 1] = undefined;
		}
		glyphRow[c] = " ";
		styleRow[c] = undefined;
	}

	cellAt(row: number, col: number): Cell | undefined {
		const glyph = this.glyphs[row - 1]?.[col - 1];
		if (glyph === undefined) return undefined;
		return { glyph, style: this.styles[row - 1]?.[col - 1] };
	}

	/**
	 * 渲染一行（1 起始）：去掉行尾无样式的空格，跳过 CONTINUATION，
	 * 相同样式的相邻单元格合并为一段，带样式的段以 RESET 结尾。
	 */
	renderRow(row: number): string {
		const glyphRow = this.glyphs[row - 1];
		const styleRow = this.styles[row - 1];
		if (!glyphRow || !styleRow) return "";

		let last = -1;
		for (let i = this.width - 1; i >= 0; i--) {
			const glyph = glyphRow[i];
			if (glyph === CONTINUATION || glyph !== " " || styleToSgr(styleRow[i]) !== "") {
				last = i;
				break;
			}
		}
		if (last === -1) return "";

		let out = "";
		let run = "";
		let runSgr = "";

		for (let i = 0; i <= last; i++) {
			const glyph = glyphRow[i];
			if (glyph === undefined || glyph === CONTINUATION) continue;

			const sgr = styleToSgr(styleRow[i]);
			if (sgr !== runSgr && run) {
				out += runSgr ? `${runSgr}${run}${RESET}` : run;
				run = "";
			}
			runSgr = sgr;
			run += glyph;
		}

		if (run) {
			out += runSgr ? `${runSgr}${run}${RESET}` : run;
		}
		return out;
	}

	renderedRows(): string[] {
		const rows: string[] = [];
		for (let row = 1; row <= this.height; row++) {
			rows.push(this.renderRow(row));
		}
		return rows;
	}
}
