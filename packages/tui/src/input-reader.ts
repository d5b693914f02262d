/**
 * InputReader 把 stdin 的数据块送入 InputDecoder，并以事件发出令牌。
 *
 * 解码器本身不设定时器；这里根据 pendingTimeout() 维护唯一一个定时器，
 * 到期后再次取令牌，让单独的 ESC 和截断的序列按时降级。
 * 括号粘贴（`ESC[200~` ... `ESC[201~`）之间的内容合并为一个 paste 事件。
 */

import { EventEmitter } from "events";
import { type Clock, systemClock } from "./clock.js";
import { InputDecoder, type InputDecoderOptions, type InputToken, tokenText } from "./input-decoder.js";
import { type MouseEvent, parseMouseEvent } from "./mouse.js";

const BRACKETED_PASTE_START = "\x1b[200~";
const BRACKETED_PASTE_END = "\x1b[201~";

export type InputReaderEventMap = {
	token: [InputToken];
	mouse: [MouseEvent];
	paste: [string];
};

/** stdin 这类数据源 */
export interface ByteSource {
	on(event: "data", listener: (chunk: Buffer | string) => void): unknown;
	removeListener(event: "data", listener: (chunk: Buffer | string) => void): unknown;
}

export class InputReader extends EventEmitter<InputReaderEventMap> {
	readonly decoder: InputDecoder;
	private readonly clock: Clock;
	private timer: ReturnType<typeof setTimeout> | null = null;
	private source: ByteSource | null = null;
	private pasteBuffer: string | null = null;
	private readonly onData = (chunk: Buffer | string) => this.push(chunk);

	constructor(options: InputDecoderOptions = {}) {
		super();
		this.clock = options.clock ?? systemClock;
		this.decoder = new InputDecoder({ ...options, clock: this.clock });
	}

	attach(source: ByteSource): void {
		this.detach();
		this.source = source;
		source.on("data", this.onData);
	}

	detach(): void {
		if (this.source) {
			this.source.removeListener("data", this.onData);
			this.source = null;
		}
	}

	push(chunk: Uint8Array | string): void {
		this.clearTimer();
		this.decoder.feed(chunk);
		this.drain();
	}

	/** 是否有不完整的序列在等待 */
	get pending(): boolean {
		return this.timer !== null;
	}

	destroy(): void {
		this.detach();
		this.clearTimer();
		this.decoder.clear();
		this.pasteBuffer = null;
		this.removeAllListeners();
	}

	private drain(): void {
		const now = this.clock.now();
		let token = this.decoder.nextToken(now);
		while (token) {
			this.dispatch(token);
			token = this.decoder.nextToken(now);
		}

		const wait = this.decoder.pendingTimeout(now);
		if (wait !== undefined) {
			this.timer = setTimeout(() => {
				this.timer = null;
				this.drain();
			}, Math.ceil(wait));
		}
	}

	private dispatch(token: InputToken): void {
		if (this.pasteBuffer !== null) {
			if (token.kind === "csi" && token.raw === BRACKETED_PASTE_END) {
				const content = this.pasteBuffer;
				this.pasteBuffer = null;
				this.emit("paste", content);
			} else {
				this.pasteBuffer += tokenText(token);
			}
			return;
		}

		if (token.kind === "csi" && token.raw === BRACKETED_PASTE_START) {
			this.pasteBuffer = "";
			return;
		}

		this.emit("token", token);
		const mouse = parseMouseEvent(token);
		if (mouse) {
			this.emit("mouse", mouse);
		}
	}

	private clearTimer(): void {
		if (this.timer) {
			clearTimeout(this.timer);
			this.timer = null;
		}
	}
}
