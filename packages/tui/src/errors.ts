import { debugLog } from "./debug-log.js";

/**
 * 内部不变量被破坏时抛出（例如给 Frame 传入负数尺寸）。
 * 来自终端的噪声或恶意输入永远不会触发它。
 */
export class InvariantError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "InvariantError";
	}
}

/** FOLIO_TUI_DEBUG=1 时开启严格检查：不变量被破坏立即抛出，否则钳制后继续 */
export function isStrictMode(): boolean {
	return process.env.FOLIO_TUI_DEBUG === "1";
}

/**
 * 把尺寸类参数规整为非负整数。
 * strict 为 true 时，非法值抛出 InvariantError。
 */
export function clampDimension(value: number, name: string, strict = isStrictMode()): number {
	if (Number.isInteger(value) && value >= 0) {
		return value;
	}
	if (strict) {
		throw new InvariantError(`${name} 必须是非负整数，收到 ${value}`);
	}
	if (!Number.isFinite(value)) return 0;
	return Math.max(0, Math.floor(value));
}

/**
 * 检查内部不变量。严格模式下失败时抛出 InvariantError，否则只写调试日志，返回检查结果。
 */
export function assertInvariant(condition: boolean, message: string, strict = isStrictMode()): boolean {
	if (condition) return true;
	if (strict) {
		throw new InvariantError(message);
	}
	debugLog("invariant", message);
	return false;
}
