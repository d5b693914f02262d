// ANSI 转义序列常量和辅助函数

export const ESC = "\x1b";
export const RESET = "\x1b[0m";

export const CLEAR_LINE = "\x1b[2K";
export const CLEAR_SCREEN = "\x1b[2J";
export const HOME = "\x1b[H";

export const HIDE_CURSOR = "\x1b[?25l";
export const SHOW_CURSOR = "\x1b[?25h";

export const ENTER_ALT_SCREEN = "\x1b[?1049h";
export const LEAVE_ALT_SCREEN = "\x1b[?1049l";

// 同步输出（DEC 模式 2026）：终端在 END 之前不重绘
export const BEGIN_SYNCHRONIZED_UPDATE = "\x1b[?2026h";
export const END_SYNCHRONIZED_UPDATE = "\x1b[?2026l";

// 按钮事件跟踪（1002）+ SGR 扩展坐标（1006）
export const ENABLE_MOUSE_REPORTING = "\x1b[?1002h\x1b[?1006h";
export const DISABLE_MOUSE_REPORTING = "\x1b[?1002l\x1b[?1006l";

/** 移动光标到绝对位置（从 1 开始计数） */
export function moveTo(row: number, col: number): string {
	return `\x1b[${row};${col}H`;
}

/** OSC 0;title BEL - 设置终端窗口标题 */
export function setTitle(title: string): string {
	return `\x1b]0;${title}\x07`;
}
