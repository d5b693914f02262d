import { BEGIN_SYNCHRONIZED_UPDATE, CLEAR_LINE, END_SYNCHRONIZED_UPDATE, moveTo, RESET } from "./ansi.js";
import { debugLog } from "./debug-log.js";
import { assertInvariant, clampDimension } from "./errors.js";
import { Frame } from "./frame.js";
import type { OutputSink } from "./output.js";
import { type Style, styleToSgr } from "./style.js";

export interface DifferentialRendererOptions {
	tabSize?: number;
	/** 用 DEC 2026 包裹每帧的变更，终端在整帧到达前不重绘（默认：关闭） */
	synchronizedOutput?: boolean;
	strict?: boolean;
}

export interface RenderStats {
	/** 已提交的帧数 */
	frames: number;
	/** 因尺寸变化或 invalidate() 导致整屏重绘的次数 */
	fullRedraws: number;
	/** 累计重绘的行数 */
	rowsRedrawn: number;
	/** 累计写出的字节数 */
	bytesWritten: number;
}

/**
 * 差分渲染器：每帧只重写与上一帧不同的行。
 *
 * 一帧的生命周期是 startFrame() → write()/raw() → endFrame()。
 * 帧外的 write() 和 writeImmediate() 直接输出，不经过行缓存。
 */
export class DifferentialRenderer {
	private previousRows: (string | undefined)[] = [];
	private width = 0;
	private height = 0;
	private frame: Frame | undefined;
	private rawSequences: string[] = [];
	private batch: string[] | undefined;
	private readonly tabSize: number | undefined;
	private readonly synchronizedOutput: boolean;
	private readonly strict: boolean | undefined;
	private readonly counters: RenderStats = { frames: 0, fullRedraws: 0, rowsRedrawn: 0, bytesWritten: 0 };

	constructor(
		private readonly output: OutputSink,
		options: DifferentialRendererOptions = {},
	) {
		this.tabSize = options.tabSize;
		this.synchronizedOutput = options.synchronizedOutput ?? false;
		this.strict = options.strict;
	}

	get stats(): Readonly<RenderStats> {
		return { ...this.counters };
	}

	/** 当前打开的帧；帧外为 undefined */
	get activeFrame(): Frame | undefined {
		return this.frame;
	}

	/**
	 * 开始新的一帧。尺寸与上一帧不同时，行缓存全部作废。
	 */
	startFrame(width: number, height: number): Frame {
		const w = clampDimension(width, "width", this.strict);
		const h = clampDimension(height, "height", this.strict);

		this.rawSequences = [];
		if (w !== this.width || h !== this.height) {
			debugLog("render", `size changed (${this.width}x${this.height} -> ${w}x${h})`);
			this.width = w;
			this.height = h;
			this.invalidate();
		}

		this.frame = new Frame(w, h, { tabSize: this.tabSize, strict: this.strict });
		return this.frame;
	}

	/**
	 * 帧内写入帧缓冲；帧外等同于 writeImmediate()。
	 */
	write(row: number, col: number, text: string, style?: Style): void {
		if (this.frame) {
			this.frame.write(row, col, text, style);
			return;
		}
		this.writeImmediate(row, col, text, style);
	}

	/**
	 * 追加一段原样输出的控制序列。
	 * 帧内在 endFrame() 时先于行变更输出；帧外立即输出。
	 */
	raw(sequence: string): void {
		if (this.batch) {
			this.batch.push(sequence);
		} else if (this.frame) {
			this.rawSequences.push(sequence);
		} else {
			this.emit(sequence);
		}
	}

	/**
	 * 移动光标并写入文本，不经过帧缓冲和行缓存。
	 * 用于光标定位、闪烁提示等不属于帧内容的输出。给出样式时文本前加 SGR、后加 RESET。
	 *
	 * 注意：行缓存不知道这次写入，屏幕与缓存会因此不一致，下一帧可能跳过本该重绘的行。
	 * 写过的行要用 invalidateRows() 标记为脏，或在之后调用 invalidate()。
	 */
	writeImmediate(row: number, col: number, text: string, style?: Style): void {
		const sgr = styleToSgr(style);
		const body = sgr === "" ? text : `${sgr}${text}${RESET}`;
		const data = `${moveTo(Math.trunc(row), Math.trunc(col))}${body}`;
		if (this.batch) {
			this.batch.push(data);
			return;
		}
		this.emit(data);
	}

	/**
	 * 把回调中的所有立即输出合并为一次写入。回调抛出时丢弃已收集的输出。
	 */
	batchWrite(fn: () => void): void {
		const outer = this.batch;
		const batch: string[] = [];
		this.batch = batch;
		try {
			fn();
		} finally {
			this.batch = outer;
		}
		if (outer) {
			outer.push(...batch);
		} else {
			this.emit(batch.join(""));
		}
	}

	/**
	 * 提交当前帧：先输出 raw 序列，再为每个变更的行输出“定位 + 清行 + 内容”。
	 * 返回写出的字节数；与上一帧完全相同的帧写出 0 字节。
	 */
	endFrame(): number {
		const frame = this.frame;
		if (!frame) {
			this.output.flush();
			return 0;
		}

		const rows = frame.renderedRows();
		if (!assertInvariant(this.previousRows.length === rows.length, "行缓存与帧高度不一致", this.strict)) {
			this.invalidate();
		}
		let changes = "";
		let rowsRedrawn = 0;

		for (let i = 0; i < rows.length; i++) {
			const text = rows[i] ?? "";
			if (this.previousRows[i] === text) continue;
			changes += `${moveTo(i + 1, 1)}${CLEAR_LINE}${text}`;
			this.previousRows[i] = text;
			rowsRedrawn++;
		}

		if (this.synchronizedOutput && changes) {
			changes = `${BEGIN_SYNCHRONIZED_UPDATE}${changes}${END_SYNCHRONIZED_UPDATE}`;
		}

		const out = this.rawSequences.join("") + changes;
		this.frame = undefined;
		this.rawSequences = [];

		if (out) {
			this.output.write(out);
		}
		this.output.flush();

		const bytes = Buffer.byteLength(out, "utf8");
		this.counters.frames++;
		this.counters.rowsRedrawn += rowsRedrawn;
		this.counters.bytesWritten += bytes;
		if (rowsRedrawn > 0) {
			debugLog("render", `frame ${this.counters.frames}: ${rowsRedrawn} rows, ${bytes} bytes`);
		}
		return bytes;
	}

	/**
	 * 作废整个行缓存，下一帧重绘所有行（例如屏幕被外部清空后）。
	 */
	invalidate(): void {
		this.previousRows = new Array<string | undefined>(this.height).fill(undefined);
		this.counters.fullRedraws++;
	}

	/**
	 * 作废指定行（1 起始）的缓存。
	 */
	invalidateRows(rows: Iterable<number>): void {
		for (const row of rows) {
			const index = Math.trunc(row) - 1;
			if (index >= 0 && index < this.previousRows.length) {
				this.previousRows[index] = undefined;
			}
		}
	}

	private emit(data: string): void {
		if (data) {
			this.output.write(data);
			this.counters.bytesWritten += Buffer.byteLength(data, "utf8");
		}
		this.output.flush();
	}
}
