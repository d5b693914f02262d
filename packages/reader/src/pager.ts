import {
	type DifferentialRenderer,
	type KeybindingsManager,
	padToWidth,
	type Style,
	type TerminalInput,
	truncateToWidth,
	visibleWidth,
} from "@folio/tui";
import type { DisplayLine, Document } from "./document.js";
import { createPagerKeybindings, type PagerAction } from "./keybindings.js";

const HEADER_STYLE: Style = { inverse: true };
const FOOTER_STYLE: Style = { dim: true };

export interface PagerOptions {
	keybindings?: KeybindingsManager<PagerAction>;
	tabSize?: number;
	/** 切换鼠标报告，返回显示在状态栏的消息 */
	onToggleMouse?: () => string;
	onQuit?: () => void;
}

/**
 * 阅读界面：第一行是标题，最后一行是位置，中间是文档内容。
 * 高度不足三行时只显示内容。
 */
export class Pager {
	private top = 0;
	private width = 0;
	private height = 0;
	private rows: readonly DisplayLine[] = [];
	private status: string | undefined;
	private quit = false;
	private readonly keybindings: KeybindingsManager<PagerAction>;
	private readonly tabSize: number | undefined;

	constructor(
		private readonly document: Document,
		private readonly renderer: DifferentialRenderer,
		private readonly options: PagerOptions = {},
	) {
		this.keybindings = options.keybindings ?? createPagerKeybindings();
		this.tabSize = options.tabSize;
	}

	get finished(): boolean {
		return this.quit;
	}

	/** 当前顶部显示行（0 起始）和显示行总数 */
	get position(): { top: number; total: number; visible: number } {
		return { top: this.top, total: this.rows.length, visible: this.contentHeight() };
	}

	/**
	 * 设置屏幕尺寸。宽度变化时重新折行，并保持顶部的源行不变。
	 */
	resize(width: number, height: number): void {
		const relayout = width !== this.width || this.rows.length === 0;
		const anchor = this.rows[this.top]?.sourceLine ?? 0;
		this.width = width;
		this.height = height;

		if (relayout) {
			this.rows = this.document.layout(Math.max(1, width), this.tabSize);
			const index = this.rows.findIndex((row) => row.sourceLine >= anchor);
			this.top = index === -1 ? 0 : index;
		}
		this.clampTop();
	}

	setStatus(message: string | undefined): void {
		this.status = message;
	}

	/**
	 * 处理一个输入事件，返回执行的操作。
	 */
	handleInput(input: TerminalInput): PagerAction | undefined {
		const action = this.resolveAction(input);
		if (action) {
			this.status = undefined;
			this.perform(action);
		}
		return action;
	}

	private resolveAction(input: TerminalInput): PagerAction | undefined {
		switch (input.type) {
			case "mouse":
				if (input.mouse.action === "wheel-down") return "lineDown";
				if (input.mouse.action === "wheel-up") return "lineUp";
				return undefined;
			case "token":
				return this.keybindings.resolve(input.token);
			case "paste":
				return undefined;
		}
	}

	perform(action: PagerAction): void {
		const page = Math.max(1, this.contentHeight());
		switch (action) {
			case "lineDown":
				this.scrollBy(1);
				break;
			case "lineUp":
				this.scrollBy(-1);
				break;
			case "pageDown":
				this.scrollBy(page);
				break;
			case "pageUp":
				this.scrollBy(-page);
				break;
			case "halfPageDown":
				this.scrollBy(Math.max(1, Math.floor(page / 2)));
				break;
			case "halfPageUp":
				this.scrollBy(-Math.max(1, Math.floor(page / 2)));
				break;
			case "top":
				this.top = 0;
				break;
			case "bottom":
				this.top = this.maxTop();
				break;
			case "toggleMouse":
				if (this.options.onToggleMouse) {
					this.status = this.options.onToggleMouse();
				}
				break;
			case "redraw":
				this.renderer.invalidate();
				break;
			case "quit":
				this.quit = true;
				this.options.onQuit?.();
				break;
		}
	}

	/**
	 * 绘制一帧，返回写出的字节数。
	 */
	render(): number {
		this.renderer.startFrame(this.width, this.height);

		const chrome = this.height >= 3;
		const contentTop = chrome ? 2 : 1;
		const contentHeight = this.contentHeight();

		if (chrome) {
			this.renderer.write(1, 1, padToWidth(` ${this.document.title}`, this.width), HEADER_STYLE);
		}

		for (let i = 0; i < contentHeight; i++) {
			const row = this.rows[this.top + i];
			if (!row) break;
			this.renderer.write(contentTop + i, 1, row.text);
		}

		if (chrome) {
			this.renderer.write(this.height, 1, this.footer(), FOOTER_STYLE);
		}

		return this.renderer.endFrame();
	}

	private footer(): string {
		const total = this.rows.length;
		const last = Math.min(this.top + this.contentHeight(), total);
		const first = total === 0 ? 0 : this.top + 1;
		const percent = total === 0 ? 100 : Math.round((last / total) * 100);
		const right = `${first}-${last}/${total} ${percent}%`;

		const leftWidth = this.width - visibleWidth(right) - 1;
		if (leftWidth < 0) {
			return truncateToWidth(right, this.width);
		}
		return `${padToWidth(this.status ?? "", leftWidth)} ${right}`;
	}

	private contentHeight(): number {
		return this.height >= 3 ? this.height - 2 : this.height;
	}

	private maxTop(): number {
		return Math.max(0, this.rows.length - this.contentHeight());
	}

	private scrollBy(delta: number): void {
		this.top += delta;
		this.clampTop();
	}

	private clampTop(): void {
		this.top = Math.min(Math.max(0, this.top), this.maxTop());
	}
}
