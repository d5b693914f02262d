import { DEFAULT_ESCAPE_TIMEOUT_MS, DEFAULT_SEQUENCE_TIMEOUT_MS, DEFAULT_TAB_SIZE } from "@folio/tui";
import { type Static, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { dirname, join } from "path";
import { getConfigDir } from "./config.js";
import { DEFAULT_PAGER_KEYBINDINGS, type PagerAction, type PagerKeybindingsConfig } from "./keybindings.js";

const KeyBindingSchema = Type.Union([Type.String(), Type.Array(Type.String())]);

const SettingsSchema = Type.Object({
	input: Type.Optional(
		Type.Object({
			escapeTimeoutMs: Type.Optional(Type.Number({ exclusiveMinimum: 0 })), // default: 50
			sequenceTimeoutMs: Type.Optional(Type.Number({ exclusiveMinimum: 0 })), // default: 500
		}),
	),
	display: Type.Optional(
		Type.Object({
			tabSize: Type.Optional(Type.Integer({ minimum: 1, maximum: 16 })), // default: 4
			mouse: Type.Optional(Type.Boolean()), // default: true
			synchronizedOutput: Type.Optional(Type.Boolean()), // default: true
		}),
	),
	keybindings: Type.Optional(Type.Record(Type.String(), KeyBindingSchema)),
});

export type Settings = Static<typeof SettingsSchema>;
export type InputSettings = NonNullable<Settings["input"]>;
export type DisplaySettings = NonNullable<Settings["display"]>;

/** 合并两层设置：嵌套对象逐键合并，覆盖层的值优先 */
function mergeSettings(base: Settings, overrides: Settings): Settings {
	const result: Settings = { ...base };
	if (overrides.input) result.input = { ...base.input, ...overrides.input };
	if (overrides.display) result.display = { ...base.display, ...overrides.display };
	if (overrides.keybindings) result.keybindings = { ...base.keybindings, ...overrides.keybindings };
	return result;
}

function copyKey<T, K extends keyof T>(target: T, source: T, key: K): void {
	target[key] = source[key];
}

/**
 * 解析 FOLIO_MOUSE=0|1。其他值视为未设置。
 */
function mouseFromEnv(): boolean | undefined {
	const value = process.env.FOLIO_MOUSE;
	if (value === "1") return true;
	if (value === "0") return false;
	return undefined;
}

export class SettingsManager {
	private settingsPath: string | null;
	private globalSettings: Settings;
	private settings: Settings;
	private runtimeOverrides: Settings = {};
	private modifiedDisplayFields = new Set<keyof DisplaySettings>(); // 跟踪会话期间修改的字段

	private constructor(settingsPath: string | null, initialSettings: Settings) {
		this.settingsPath = settingsPath;
		this.globalSettings = initialSettings;
		this.settings = initialSettings;
		const mouse = mouseFromEnv();
		if (mouse !== undefined) {
			this.applyOverrides({ display: { mouse } });
		}
	}

	/** 创建从文件加载的 SettingsManager。文件不存在时使用默认值；内容无效时抛出 */
	static create(configDir: string = getConfigDir()): SettingsManager {
		const settingsPath = join(configDir, "settings.json");
		return new SettingsManager(settingsPath, SettingsManager.loadFromFile(settingsPath));
	}

	/** 创建内存中的 SettingsManager（无文件 I/O） */
	static inMemory(settings: Settings = {}): SettingsManager {
		return new SettingsManager(null, structuredClone(settings));
	}

	private static loadFromFile(path: string): Settings {
		if (!existsSync(path)) {
			return {};
		}
		const content = readFileSync(path, "utf-8");
		let parsed: unknown;
		try {
			parsed = JSON.parse(content);
		} catch (error) {
			throw new Error(`Invalid JSON in ${path}: ${error instanceof Error ? error.message : String(error)}`);
		}
		if (!Value.Check(SettingsSchema, parsed)) {
			const errors = [...Value.Errors(SettingsSchema, parsed)]
				.map((e) => `  - ${e.path || "root"}: ${e.message}`)
				.join("\n");
			throw new Error(`Invalid settings in ${path}:\n${errors}`);
		}
		return parsed;
	}

	getSettingsPath(): string | null {
		return this.settingsPath;
	}

	getGlobalSettings(): Settings {
		return structuredClone(this.globalSettings);
	}

	/** 在当前设置之上应用额外的覆盖（环境变量、命令行参数），不写入文件 */
	applyOverrides(overrides: Settings): void {
		this.runtimeOverrides = mergeSettings(this.runtimeOverrides, overrides);
		this.settings = mergeSettings(this.globalSettings, this.runtimeOverrides);
	}

	/**
	 * 写入修改过的字段。写入前重新读取文件，保留外部编辑。
	 */
	save(): void {
		if (this.settingsPath) {
			const dir = dirname(this.settingsPath);
			if (!existsSync(dir)) {
				mkdirSync(dir, { recursive: true });
			}

			const currentFileSettings = SettingsManager.loadFromFile(this.settingsPath);
			const mergedSettings: Settings = { ...currentFileSettings };

			// 仅覆盖在本次会话期间显式修改的字段
			if (this.modifiedDisplayFields.size > 0) {
				const display: DisplaySettings = { ...currentFileSettings.display };
				const source: DisplaySettings = this.globalSettings.display ?? {};
				for (const field of this.modifiedDisplayFields) {
					copyKey(display, source, field);
				}
				mergedSettings.display = display;
			}

			this.globalSettings = mergedSettings;
			writeFileSync(this.settingsPath, `${JSON.stringify(this.globalSettings, null, 2)}\n`, "utf-8");
			this.modifiedDisplayFields.clear();
		}

		this.settings = mergeSettings(this.globalSettings, this.runtimeOverrides);
	}

	getEscapeTimeoutMs(): number {
		return this.settings.input?.escapeTimeoutMs ?? DEFAULT_ESCAPE_TIMEOUT_MS;
	}

	getSequenceTimeoutMs(): number {
		return this.settings.input?.sequenceTimeoutMs ?? DEFAULT_SEQUENCE_TIMEOUT_MS;
	}

	getTabSize(): number {
		return this.settings.display?.tabSize ?? DEFAULT_TAB_SIZE;
	}

	getMouseEnabled(): boolean {
		return this.settings.display?.mouse ?? true;
	}

	/**
	 * 保存鼠标设置。覆盖层中的鼠标设置随之取消，让新值立即生效。
	 */
	setMouseEnabled(enabled: boolean): void {
		this.globalSettings = { ...this.globalSettings, display: { ...this.globalSettings.display, mouse: enabled } };
		if (this.runtimeOverrides.display) {
			const { mouse: _ignored, ...rest } = this.runtimeOverrides.display;
			this.runtimeOverrides = { ...this.runtimeOverrides, display: rest };
		}
		this.modifiedDisplayFields.add("mouse");
		this.save();
	}

	getSynchronizedOutput(): boolean {
		return this.settings.display?.synchronizedOutput ?? true;
	}

	/**
	 * 用户配置的按键绑定。未知的操作名被忽略。
	 */
	getKeybindings(): PagerKeybindingsConfig {
		const configured = this.settings.keybindings ?? {};
		const result: PagerKeybindingsConfig = {};
		for (const action of Object.keys(DEFAULT_PAGER_KEYBINDINGS)) {
			const keys = configured[action];
			if (keys !== undefined && isPagerAction(action)) {
				result[action] = keys;
			}
		}
		return result;
	}
}

function isPagerAction(name: string): name is PagerAction {
	return Object.hasOwn(DEFAULT_PAGER_KEYBINDINGS, name);
}
