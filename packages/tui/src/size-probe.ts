import { type Clock, systemClock } from "./clock.js";
import { debugLog } from "./debug-log.js";

export const DEFAULT_SIZE_TTL_MS = 500;
export const FALLBACK_SIZE = { rows: 24, columns: 80 } as const;

export interface TerminalSize {
	rows: number;
	columns: number;
	/** "fallback" 表示查询失败或没有 TTY，尺寸取自默认值 */
	source: "tty" | "fallback";
}

/** 查询终端尺寸；没有可用的终端时返回 undefined */
export type SizeQuery = () => { rows: number; columns: number } | undefined;

export interface SizeProbeOptions {
	query?: SizeQuery;
	ttlMs?: number;
	fallback?: { rows: number; columns: number };
	clock?: Clock;
}

/** stdout 这类流的尺寸字段 */
export interface SizedStream {
	isTTY?: boolean;
	rows?: number;
	columns?: number;
}

/**
 * 从输出流读取尺寸。不是 TTY，或尺寸不是正整数时视为查询失败。
 */
export function queryStreamSize(stream: SizedStream = process.stdout): SizeQuery {
	return () => {
		if (!stream.isTTY) return undefined;
		const { rows, columns } = stream;
		if (!rows || !columns || rows <= 0 || columns <= 0) return undefined;
		return { rows, columns };
	};
}

/**
 * 带缓存的终端尺寸查询。缓存在 ttlMs 内有效，resize 事件后应调用 invalidate()。
 * 查询失败时返回 fallback，且同样缓存，避免每帧重复失败的查询。
 */
export class SizeProbe {
	private cached: TerminalSize | undefined;
	private cachedAt = 0;
	private readonly query: SizeQuery;
	private readonly ttlMs: number;
	private readonly fallback: { rows: number; columns: number };
	private readonly clock: Clock;

	constructor(options: SizeProbeOptions = {}) {
		this.query = options.query ?? queryStreamSize();
		this.ttlMs = options.ttlMs !== undefined && options.ttlMs >= 0 ? options.ttlMs : DEFAULT_SIZE_TTL_MS;
		this.fallback = options.fallback ?? FALLBACK_SIZE;
		this.clock = options.clock ?? systemClock;
	}

	size(now: number = this.clock.now()): TerminalSize {
		if (this.cached && now - this.cachedAt < this.ttlMs) {
			return this.cached;
		}

		this.cached = this.probe();
		this.cachedAt = now;
		return this.cached;
	}

	invalidate(): void {
		this.cached = undefined;
	}

	private probe(): TerminalSize {
		let measured: { rows: number; columns: number } | undefined;
		try {
			measured = this.query();
		} catch (error) {
			debugLog("size", `query failed: ${error instanceof Error ? error.message : String(error)}`);
		}

		if (measured && measured.rows > 0 && measured.columns > 0) {
			return { rows: measured.rows, columns: measured.columns, source: "tty" };
		}
		return { rows: this.fallback.rows, columns: this.fallback.columns, source: "fallback" };
	}
}
