import { type KeybindingsConfig, KeybindingsManager } from "@folio/tui";

/**
 * 可绑定到按键的阅读器操作。
 */
export type PagerAction =
	// 滚动
	| "lineDown"
	| "lineUp"
	| "pageDown"
	| "pageUp"
	| "halfPageDown"
	| "halfPageUp"
	| "top"
	| "bottom"
	// 显示
	| "toggleMouse"
	| "redraw"
	// 退出
	| "quit";

export type PagerKeybindingsConfig = KeybindingsConfig<PagerAction>;

/**
 * 默认阅读器按键绑定。
 */
export const DEFAULT_PAGER_KEYBINDINGS: Required<PagerKeybindingsConfig> = {
	// 滚动
	lineDown: ["j", "down", "enter"],
	lineUp: ["k", "up"],
	pageDown: ["space", "pageDown", "l", "right", "f"],
	pageUp: ["b", "pageUp", "h", "left"],
	halfPageDown: "ctrl+d",
	halfPageUp: "ctrl+u",
	top: ["g", "home"],
	bottom: ["G", "end"],
	// 显示
	toggleMouse: "m",
	redraw: "ctrl+l",
	// 退出
	quit: ["q", "ctrl+c", "escape"],
};

export function createPagerKeybindings(config: PagerKeybindingsConfig = {}): KeybindingsManager<PagerAction> {
	return new KeybindingsManager(DEFAULT_PAGER_KEYBINDINGS, config);
}
