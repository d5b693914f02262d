/**
 * InputDecoder 把原始终端输入字节切分为离散的输入令牌。
 *
 * stdin 的数据块可能在任意位置断开，尤其是转义序列和多字节 UTF-8 字符。
 * 例如鼠标 SGR 序列 `\x1b[<35;20;5m` 可能分三次到达：
 * - 块 1：`\x1b`
 * - 块 2：`[<35`
 * - 块 3：`;20;5m`
 *
 * 解码器累积字节，直到能产出完整令牌；`nextToken()` 每次最多返回一个令牌，
 * 字节不足时返回 undefined。单独的 ESC 和其他不完整序列在超时后降级为单字节令牌，
 * 因此解码器永远不会无限期等待一个不会完成的序列。
 *
 * 解码器不做 I/O，也不设置定时器：调用方通过 `pendingTimeout()` 得知可以阻塞多久。
 */

import { type Clock, systemClock } from "./clock.js";
import { debugLog } from "./debug-log.js";

const ESC = 0x1b;
const CSI_8BIT = 0x9b;
const ST_8BIT = 0x9c;
const BEL = 0x07;
const BACKSLASH = 0x5c;

/** 缓冲区中只有一个 ESC 时的等待时间：区分 Esc 键和转义序列的开头 */
export const DEFAULT_ESCAPE_TIMEOUT_MS = 50;
/** 其他不完整序列的等待时间：应对截断或非标准的序列 */
export const DEFAULT_SEQUENCE_TIMEOUT_MS = 500;

export type StringSequenceKind = "osc" | "dcs" | "sos" | "pm" | "apc";

/**
 * 解码器输出的令牌。
 * 序列类令牌的 raw 是所消费字节的 UTF-8 文本，用于匹配按键；8 位 CSI 统一规范为 `ESC [` 形式。
 * bytes 是原样消费的字节（8 位 CSI 和 0x9C 终止符不做改写），可以逐字节回放。
 */
export type InputToken =
	/** 一个可打印字符或控制字符（ASCII 或多字节 UTF-8） */
	| { kind: "char"; text: string }
	/** ESC 前缀的字符，即 Alt+键 */
	| { kind: "alt"; text: string; raw: string }
	/** 完整的 CSI 序列（方向键、功能键、SGR 鼠标报告等） */
	| { kind: "csi"; raw: string; bytes: Uint8Array }
	/** SS3 序列：`ESC O <byte>` */
	| { kind: "ss3"; raw: string; bytes: Uint8Array }
	/** OSC/DCS/SOS/PM/APC 字符串序列，包含终止符 */
	| { kind: "string"; introducer: StringSequenceKind; raw: string; bytes: Uint8Array }
	/** 在消歧窗口内没有后续字节的单独 ESC */
	| { kind: "escape" }
	/** 非法 UTF-8，或超时的不完整序列 */
	| { kind: "replacement"; reason: "malformed" | "timeout" };

export type InputDecoderOptions = {
	/** 单独 ESC 的等待时间（默认：50ms） */
	escapeTimeoutMs?: number;
	/** 其他不完整序列的等待时间（默认：500ms） */
	sequenceTimeoutMs?: number;
	clock?: Clock;
};

/**
 * 令牌的规范文本形式，便于按字符串匹配按键。
 */
export function tokenText(token: InputToken): string {
	switch (token.kind) {
		case "char":
			return token.text;
		case "alt":
		case "csi":
		case "ss3":
		case "string":
			return token.raw;
		case "escape":
			return "\x1b";
		case "replacement":
			return "\uFFFD";
	}
}

function normalizeTimeout(value: number | undefined, fallback: number): number {
	if (value === undefined || !Number.isFinite(value) || value <= 0) {
		return fallback;
	}
	return value;
}

function utf8SequenceLength(lead: number): number | undefined {
	if (lead >= 0xc2 && lead <= 0xdf) return 2;
	if (lead >= 0xe0 && lead <= 0xef) return 3;
	if (lead >= 0xf0 && lead <= 0xf4) return 4;
	return undefined;
}

/**
 * 检查续字节是否合法，排除过长编码和代理区（E0/ED/F0/F4 的第二字节有更窄的范围）。
 */
function isValidContinuation(lead: number, index: number, byte: number): boolean {
	if (index === 1) {
		if (lead === 0xe0) return byte >= 0xa0 && byte <= 0xbf;
		if (lead === 0xed) return byte >= 0x80 && byte <= 0x9f;
		if (lead === 0xf0) return byte >= 0x90 && byte <= 0xbf;
		if (lead === 0xf4) return byte >= 0x80 && byte <= 0x8f;
	}
	return byte >= 0x80 && byte <= 0xbf;
}

type DecodedChar = { text: string; length: number } | { malformed: true };

const EMPTY = Buffer.alloc(0);

export class InputDecoder {
	private buffer: Buffer = EMPTY;
	private pendingSince: number | undefined;
	private readonly escapeTimeoutMs: number;
	private readonly sequenceTimeoutMs: number;
	private readonly clock: Clock;

	constructor(options: InputDecoderOptions = {}) {
		this.escapeTimeoutMs = normalizeTimeout(options.escapeTimeoutMs, DEFAULT_ESCAPE_TIMEOUT_MS);
		this.sequenceTimeoutMs = normalizeTimeout(options.sequenceTimeoutMs, DEFAULT_SEQUENCE_TIMEOUT_MS);
		this.clock = options.clock ?? systemClock;
	}

	/**
	 * 追加原始字节。字符串按 UTF-8 编码。
	 */
	feed(data: Uint8Array | string): void {
		if (data.length === 0) return;
		const chunk = typeof data === "string" ? Buffer.from(data, "utf8") : Buffer.from(data);
		this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
	}

	/**
	 * 尝试产出一个令牌，不阻塞。
	 * 字节不足时记录等待起点并返回 undefined；等待超过期限后降级消费第一个字节。
	 */
	nextToken(now: number = this.clock.now()): InputToken | undefined {
		if (this.buffer.length === 0) return undefined;

		const token = this.parseToken();
		if (token) return token;

		if (this.pendingSince === undefined) {
			this.pendingSince = now;
		}
		if (now < this.pendingDeadline(this.pendingSince)) {
			return undefined;
		}
		return this.degrade();
	}

	/**
	 * 立即产出一个令牌：有完整令牌时返回它，否则按超时规则降级第一个字节。
	 */
	forceNext(): InputToken | undefined {
		if (this.buffer.length === 0) return undefined;
		return this.parseToken() ?? this.degrade();
	}

	/**
	 * 取出当前能产出的所有令牌。
	 */
	drain(now: number = this.clock.now()): InputToken[] {
		const tokens: InputToken[] = [];
		let token = this.nextToken(now);
		while (token) {
			tokens.push(token);
			token = this.nextToken(now);
		}
		return tokens;
	}

	/**
	 * 有不完整序列在等待时，返回调用方最多可以阻塞多久（毫秒）。
	 * 到期后应再次调用 nextToken()，它会降级等待中的序列。
	 */
	pendingTimeout(now: number = this.clock.now()): number | undefined {
		if (this.buffer.length === 0 || this.pendingSince === undefined) {
			return undefined;
		}
		return Math.max(0, this.pendingDeadline(this.pendingSince) - now);
	}

	/** 尚未解码的字节数 */
	get bufferedBytes(): number {
		return this.buffer.length;
	}

	clear(): void {
		this.buffer = EMPTY;
		this.pendingSince = undefined;
	}

	private pendingDeadline(startedAt: number): number {
		const loneEscape = this.buffer.length === 1 && this.buffer[0] === ESC;
		return startedAt + (loneEscape ? this.escapeTimeoutMs : this.sequenceTimeoutMs);
	}

	private parseToken(): InputToken | undefined {
		const first = this.buffer[0];
		if (first === ESC) return this.parseEscapeSequence();
		if (first === CSI_8BIT) return this.parseCsiSequence(1, "\x1b[");
		return this.parseCharacter();
	}

	private parseEscapeSequence(): InputToken | undefined {
		if (this.buffer.length < 2) return undefined;

		const second = this.buffer[1];

		// 连按两次 Esc 不能合并成 Alt+Esc
		if (second === ESC) {
			this.consume(1);
			return { kind: "escape" };
		}

		switch (second) {
			case 0x5b: // '[' CSI
				return this.parseCsiSequence(2);
			case 0x4f: {
				// 'O' SS3：固定 3 字节
				if (this.buffer.length < 3) return undefined;
				const raw = this.decode(0, 3);
				const bytes = this.copy(3);
				this.consume(3);
				return { kind: "ss3", raw, bytes };
			}
			case 0x5d: // ']' OSC，允许 BEL 终止
				return this.parseStringSequence("osc", true);
			case 0x50: // 'P' DCS
				return this.parseStringSequence("dcs", false);
			case 0x58: // 'X' SOS
				return this.parseStringSequence("sos", false);
			case 0x5e: // '^' PM
				return this.parseStringSequence("pm", false);
			case 0x5f: // '_' APC
				return this.parseStringSequence("apc", false);
			default:
				return this.parseAltCharacter();
		}
	}

	/**
	 * CSI 以 0x40-0x7E 范围内的字节结束。逐字节扫描，不假设内容是 ASCII。
	 */
	private parseCsiSequence(prefixBytes: number, outputPrefix?: string): InputToken | undefined {
		let finalIndex = -1;
		for (let i = prefixBytes; i < this.buffer.length; i++) {
			const byte = this.buffer[i];
			if (byte !== undefined && byte >= 0x40 && byte <= 0x7e) {
				finalIndex = i;
				break;
			}
		}
		if (finalIndex === -1) return undefined;

		const end = finalIndex + 1;
		const raw = outputPrefix === undefined ? this.decode(0, end) : outputPrefix + this.decode(prefixBytes, end);
		const bytes = this.copy(end);
		this.consume(end);
		return { kind: "csi", raw, bytes };
	}

	/**
	 * 字符串序列以 ST（0x9C 或 ESC \）结束，OSC 还接受 BEL。
	 */
	private parseStringSequence(introducer: StringSequenceKind, allowBel: boolean): InputToken | undefined {
		let end = -1;
		for (let i = 2; i < this.buffer.length; i++) {
			const byte = this.buffer[i];
			if ((allowBel && byte === BEL) || byte === ST_8BIT) {
				end = i + 1;
				break;
			}
			if (byte === ESC && this.buffer[i + 1] === BACKSLASH) {
				end = i + 2;
				break;
			}
		}
		if (end === -1) return undefined;

		// 终止符可能是 0x9C，它不是合法 UTF-8：raw 里会变成 U+FFFD，bytes 保留原值
		const raw = this.decode(0, end);
		const bytes = this.copy(end);
		this.consume(end);
		return { kind: "string", introducer, raw, bytes };
	}

	private parseAltCharacter(): InputToken | undefined {
		const decoded = this.decodeCharAt(1);
		if (!decoded) return undefined;

		if ("malformed" in decoded) {
			this.consume(2);
			return { kind: "alt", text: "\uFFFD", raw: "\x1b\uFFFD" };
		}
		this.consume(1 + decoded.length);
		return { kind: "alt", text: decoded.text, raw: `\x1b${decoded.text}` };
	}

	private parseCharacter(): InputToken | undefined {
		const decoded = this.decodeCharAt(0);
		if (!decoded) return undefined;

		if ("malformed" in decoded) {
			// 只消费一个字节，保证在损坏的输入上也能前进
			this.consume(1);
			return { kind: "replacement", reason: "malformed" };
		}
		this.consume(decoded.length);
		return { kind: "char", text: decoded.text };
	}

	/**
	 * 在 offset 处解码一个 UTF-8 字符。
	 * 已到达的续字节一旦非法立即判为 malformed；合法但不完整时返回 undefined 等待更多字节。
	 */
	private decodeCharAt(offset: number): DecodedChar | undefined {
		const lead = this.buffer[offset];
		if (lead === undefined) return undefined;

		if (lead < 0x80) {
			return { text: String.fromCharCode(lead), length: 1 };
		}

		const length = utf8SequenceLength(lead);
		if (length === undefined) return { malformed: true };

		const available = Math.min(length, this.buffer.length - offset);
		for (let i = 1; i < available; i++) {
			const byte = this.buffer[offset + i];
			if (byte === undefined || !isValidContinuation(lead, i, byte)) {
				return { malformed: true };
			}
		}
		if (available < length) return undefined;

		return { text: this.decode(offset, offset + length), length };
	}

	/**
	 * 超时降级：只消费第一个字节，剩余字节在下次调用时从头重新解析。
	 */
	private degrade(): InputToken {
		const first = this.buffer[0];
		const pendingBytes = this.buffer.length;
		this.consume(1);
		debugLog("input", `degraded pending sequence (first=0x${(first ?? 0).toString(16)}, bytes=${pendingBytes})`);

		if (first === ESC) return { kind: "escape" };
		if (first === CSI_8BIT) return { kind: "csi", raw: "\x1b[", bytes: Uint8Array.of(CSI_8BIT) };
		return { kind: "replacement", reason: "timeout" };
	}

	private decode(start: number, end: number): string {
		return this.buffer.toString("utf8", start, end);
	}

	/** 复制前 count 个字节，不与内部缓冲区共享内存 */
	private copy(count: number): Uint8Array {
		return Uint8Array.from(this.buffer.subarray(0, count));
	}

	private consume(count: number): void {
		this.buffer = count >= this.buffer.length ? EMPTY : this.buffer.subarray(count);
		this.pendingSince = undefined;
	}
}
