import type { InputToken } from "./input-decoder.js";
import { describeKey, type KeyEvent, type KeyId, matchesKey } from "./keys.js";

// 从 keys.ts 重新导出 KeyId
export type { KeyId };

/**
 * 按键绑定配置：每个操作绑定一个或多个按键。
 */
export type KeybindingsConfig<A extends string> = {
	[K in A]?: KeyId | KeyId[];
};

/**
 * 管理一组操作的按键绑定。用户配置按操作覆盖默认值。
 */
export class KeybindingsManager<A extends string> {
	private actionToKeys: Map<A, KeyId[]>;

	constructor(
		private readonly defaults: { [K in A]: KeyId | KeyId[] },
		config: KeybindingsConfig<A> = {},
	) {
		this.actionToKeys = new Map();
		this.buildMaps(config);
	}

	private buildMaps(config: KeybindingsConfig<A>): void {
		this.actionToKeys.clear();

		// 从默认值开始
		for (const action of this.actions()) {
			const keys: KeyId | KeyId[] = this.defaults[action];
			this.actionToKeys.set(action, Array.isArray(keys) ? [...keys] : [keys]);
		}

		// 使用用户配置覆盖
		for (const action of this.actions()) {
			const keys = config[action];
			if (keys === undefined) continue;
			this.actionToKeys.set(action, Array.isArray(keys) ? [...keys] : [keys]);
		}
	}

	private actions(): A[] {
		const actions: A[] = [];
		for (const key in this.defaults) {
			actions.push(key);
		}
		return actions;
	}

	/**
	 * 检查输入是否匹配特定操作。
	 */
	matches(input: InputToken | KeyEvent, action: A): boolean {
		const keys = this.actionToKeys.get(action);
		if (!keys) return false;
		const event = "kind" in input ? describeKey(input) : input;
		if (!event) return false;
		return keys.some((key) => matchesKey(event, key));
	}

	/**
	 * 查找输入对应的第一个操作（按默认值中的声明顺序）。
	 */
	resolve(input: InputToken | KeyEvent): A | undefined {
		const event = "kind" in input ? describeKey(input) : input;
		if (!event) return undefined;
		for (const [action, keys] of this.actionToKeys) {
			if (keys.some((key) => matchesKey(event, key))) return action;
		}
		return undefined;
	}

	/**
	 * 获取绑定到操作的按键。
	 */
	getKeys(action: A): KeyId[] {
		return this.actionToKeys.get(action) ?? [];
	}

	/**
	 * 更新配置。
	 */
	setConfig(config: KeybindingsConfig<A>): void {
		this.buildMaps(config);
	}
}
