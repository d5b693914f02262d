/**
 * 超时判定所用的时钟。
 *
 * 所有与时间相关的操作都接受显式的 `now`（毫秒），否则从注入的 Clock 读取。
 * 测试中注入可手动推进的时钟，无需 sleep。
 */
export interface Clock {
	/** 当前时间（毫秒），只用于计算时间差 */
	now(): number;
	/** 为 false 时表示回退到了墙上时钟，NTP/夏令时调整可能影响超时判定 */
	readonly monotonic: boolean;
}

function createSystemClock(): Clock {
	if (typeof performance !== "undefined" && typeof performance.now === "function") {
		return { now: () => performance.now(), monotonic: true };
	}
	return { now: () => Date.now(), monotonic: false };
}

export const systemClock: Clock = createSystemClock();

/**
 * 手动推进的时钟，用于测试和回放录制的输入。
 */
export class ManualClock implements Clock {
	readonly monotonic = true;
	private current: number;

	constructor(start = 0) {
		this.current = start;
	}

	now(): number {
		return this.current;
	}

	advance(ms: number): void {
		this.current += ms;
	}

	set(ms: number): void {
		this.current = ms;
	}
}
