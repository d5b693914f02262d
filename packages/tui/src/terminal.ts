import * as fs from "node:fs";
import {
	CLEAR_SCREEN,
	DISABLE_MOUSE_REPORTING,
	ENABLE_MOUSE_REPORTING,
	ENTER_ALT_SCREEN,
	HIDE_CURSOR,
	HOME,
	LEAVE_ALT_SCREEN,
	RESET,
	SHOW_CURSOR,
	setTitle,
} from "./ansi.js";
import type { Clock } from "./clock.js";
import { debugLog } from "./debug-log.js";
import type { InputToken } from "./input-decoder.js";
import { type ByteSource, InputReader } from "./input-reader.js";
import { isMouseReport, type MouseEvent } from "./mouse.js";
import { type OutputSink, StreamOutputSink, type WritableLike } from "./output.js";
import { type SizedStream, SizeProbe, queryStreamSize, type TerminalSize } from "./size-probe.js";

const ENABLE_BRACKETED_PASTE = "\x1b[?2004h";
const DISABLE_BRACKETED_PASTE = "\x1b[?2004l";

export type TerminalInput =
	| { type: "token"; token: InputToken }
	| { type: "mouse"; mouse: MouseEvent }
	| { type: "paste"; text: string };

/**
 * 全屏程序所需的最小终端接口
 */
export interface Terminal extends OutputSink {
	// 启动终端，设置输入和调整大小的处理程序
	start(onInput: (input: TerminalInput) => void, onResize: () => void): void;

	// 停止终端并恢复状态
	stop(): void;

	// 终端尺寸（带缓存）
	size(): TerminalSize;
	get columns(): number;
	get rows(): number;

	// 光标可见性
	hideCursor(): void;
	showCursor(): void;

	// 清除整个屏幕并将光标移动到 (1,1)
	clearScreen(): void;

	// 设置终端窗口标题
	setTitle(title: string): void;

	// 鼠标报告（按钮事件跟踪 + SGR 坐标）
	enableMouseReporting(): void;
	disableMouseReporting(): void;
	get mouseReporting(): boolean;
}

export interface TerminalInputStream extends ByteSource {
	isTTY?: boolean;
	isRaw?: boolean;
	setRawMode?(mode: boolean): unknown;
	resume(): unknown;
	pause(): unknown;
}

export interface TerminalOutputStream extends WritableLike, SizedStream {
	on(event: "resize", listener: () => void): unknown;
	removeListener(event: "resize", listener: () => void): unknown;
}

export interface ProcessTerminalOptions {
	input?: TerminalInputStream;
	output?: TerminalOutputStream;
	clock?: Clock;
	escapeTimeoutMs?: number;
	sequenceTimeoutMs?: number;
	/** 尺寸缓存的有效期（默认：500ms） */
	sizeTtlMs?: number;
	/** 在备用屏幕中运行（默认：true） */
	alternateScreen?: boolean;
	/** 启用括号粘贴模式（默认：true） */
	bracketedPaste?: boolean;
}

/**
 * 使用 process.stdin/stdout 的真实终端。测试中可以注入其他流。
 */
export class ProcessTerminal implements Terminal {
	private wasRaw = false;
	private started = false;
	private mouseEnabled = false;
	private resizeHandler?: () => void;
	private reader?: InputReader;
	private writeLogPath = process.env.FOLIO_TUI_WRITE_LOG || "";
	private readonly input: TerminalInputStream;
	private readonly output: TerminalOutputStream;
	private readonly sink: StreamOutputSink;
	private readonly sizeProbe: SizeProbe;

	constructor(private readonly options: ProcessTerminalOptions = {}) {
		this.input = options.input ?? process.stdin;
		this.output = options.output ?? process.stdout;
		this.sink = new StreamOutputSink(this.output);
		this.sizeProbe = new SizeProbe({
			query: queryStreamSize(this.output),
			ttlMs: options.sizeTtlMs,
			clock: options.clock,
		});
	}

	start(onInput: (input: TerminalInput) => void, onResize: () => void): void {
		if (this.started) return;
		this.started = true;

		// 保存之前的状态并启用原始模式
		// 不设置编码：解码器需要原始字节
		this.wasRaw = this.input.isRaw || false;
		if (this.input.setRawMode) {
			this.input.setRawMode(true);
		}
		this.input.resume();

		let setup = "";
		if (this.options.alternateScreen ?? true) setup += ENTER_ALT_SCREEN + CLEAR_SCREEN + HOME;
		// 终端会将粘贴内容包裹在 \x1b[200~ ... \x1b[201~ 中
		if (this.options.bracketedPaste ?? true) setup += ENABLE_BRACKETED_PASTE;
		setup += HIDE_CURSOR;
		this.write(setup);
		this.flush();

		this.resizeHandler = () => {
			this.sizeProbe.invalidate();
			onResize();
		};
		this.output.on("resize", this.resizeHandler);

		const reader = new InputReader({
			escapeTimeoutMs: this.options.escapeTimeoutMs,
			sequenceTimeoutMs: this.options.sequenceTimeoutMs,
			clock: this.options.clock,
		});
		reader.on("token", (token) => {
			// 鼠标报告通过 mouse 事件转发
			if (!isMouseReport(token)) onInput({ type: "token", token });
		});
		reader.on("mouse", (mouse) => onInput({ type: "mouse", mouse }));
		reader.on("paste", (text) => onInput({ type: "paste", text }));
		reader.attach(this.input);
		this.reader = reader;

		debugLog("terminal", `started (${this.columns}x${this.rows})`);
	}

	stop(): void {
		if (!this.started) return;
		this.started = false;

		if (this.mouseEnabled) {
			this.disableMouseReporting();
		}

		let teardown = RESET + SHOW_CURSOR;
		if (this.options.bracketedPaste ?? true) teardown += DISABLE_BRACKETED_PASTE;
		if (this.options.alternateScreen ?? true) teardown += LEAVE_ALT_SCREEN;
		this.write(teardown);
		this.flush();

		if (this.reader) {
			this.reader.destroy();
			this.reader = undefined;
		}
		if (this.resizeHandler) {
			this.output.removeListener("resize", this.resizeHandler);
			this.resizeHandler = undefined;
		}

		// 暂停 stdin，以防止在禁用原始模式后重新解释任何缓冲输入（例如 Ctrl+D）
		this.input.pause();

		// 恢复原始模式状态
		if (this.input.setRawMode) {
			this.input.setRawMode(this.wasRaw);
		}
		debugLog("terminal", "stopped");
	}

	write(data: string): void {
		this.sink.write(data);
		if (this.writeLogPath) {
			try {
				fs.appendFileSync(this.writeLogPath, data, { encoding: "utf8" });
			} catch (error) {
				debugLog("terminal", `write log disabled: ${error instanceof Error ? error.message : String(error)}`);
				this.writeLogPath = "";
			}
		}
	}

	flush(): void {
		this.sink.flush();
	}

	size(): TerminalSize {
		return this.sizeProbe.size();
	}

	get columns(): number {
		return this.size().columns;
	}

	get rows(): number {
		return this.size().rows;
	}

	get mouseReporting(): boolean {
		return this.mouseEnabled;
	}

	hideCursor(): void {
		this.control(HIDE_CURSOR);
	}

	showCursor(): void {
		this.control(SHOW_CURSOR);
	}

	clearScreen(): void {
		this.control(CLEAR_SCREEN + HOME);
	}

	setTitle(title: string): void {
		this.control(setTitle(title));
	}

	enableMouseReporting(): void {
		if (this.mouseEnabled) return;
		this.mouseEnabled = true;
		this.control(ENABLE_MOUSE_REPORTING);
	}

	disableMouseReporting(): void {
		if (!this.mouseEnabled) return;
		this.mouseEnabled = false;
		this.control(DISABLE_MOUSE_REPORTING);
	}

	private control(sequence: string): void {
		this.write(sequence);
		this.flush();
	}
}
