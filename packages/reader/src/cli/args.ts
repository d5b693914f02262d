/**
 * CLI 参数解析和帮助显示
 */

import chalk from "chalk";
import { APP_NAME, CONFIG_DIR_NAME, ENV_CONFIG_DIR } from "../config.js";

export interface Args {
	path?: string;
	escapeTimeoutMs?: number;
	sequenceTimeoutMs?: number;
	tabSize?: number;
	noMouse?: boolean;
	help?: boolean;
	version?: boolean;
	/** 多余的位置参数 */
	extra: string[];
}

function parsePositive(flag: string, value: string): number | undefined {
	const n = Number(value);
	if (Number.isFinite(n) && n > 0) {
		return n;
	}
	console.error(chalk.yellow(`Warning: Invalid value for ${flag}: "${value}". Expected a positive number.`));
	return undefined;
}

function parseTabSize(value: string): number | undefined {
	const n = Number(value);
	if (Number.isInteger(n) && n >= 1 && n <= 16) {
		return n;
	}
	console.error(chalk.yellow(`Warning: Invalid tab size "${value}". Expected an integer from 1 to 16.`));
	return undefined;
}

export function parseArgs(args: string[]): Args {
	const result: Args = { extra: [] };

	for (let i = 0; i < args.length; i++) {
		const arg = args[i];
		const next = args[i + 1];

		if (arg === "--help" || arg === "-h") {
			result.help = true;
		} else if (arg === "--version" || arg === "-v") {
			result.version = true;
		} else if (arg === "--escape-timeout" && next !== undefined) {
			i++;
			result.escapeTimeoutMs = parsePositive(arg, next) ?? result.escapeTimeoutMs;
		} else if (arg === "--sequence-timeout" && next !== undefined) {
			i++;
			result.sequenceTimeoutMs = parsePositive(arg, next) ?? result.sequenceTimeoutMs;
		} else if (arg === "--tab-size" && next !== undefined) {
			i++;
			result.tabSize = parseTabSize(next) ?? result.tabSize;
		} else if (arg === "--no-mouse") {
			result.noMouse = true;
		} else if (arg === "-") {
			// 不支持从 stdin 读取：stdin 用于按键输入
			console.error(chalk.yellow("Warning: Reading from stdin is not supported"));
		} else if (arg.startsWith("-")) {
			console.error(chalk.yellow(`Warning: Unknown option "${arg}"`));
		} else if (result.path === undefined) {
			result.path = arg;
		} else {
			result.extra.push(arg);
		}
	}

	return result;
}

export function printHelp(): void {
	console.log(`${chalk.bold(APP_NAME)} - 终端纯文本阅读器

${chalk.bold("Usage:")}
  ${APP_NAME} [options] <file>

${chalk.bold("Options:")}
  --escape-timeout <ms>    单独 ESC 判定为 Escape 键的等待时间 (默认: 50)
  --sequence-timeout <ms>  不完整转义序列的等待时间 (默认: 500)
  --tab-size <n>           制表位宽度 1-16 (默认: 4)
  --no-mouse               不启用鼠标滚轮
  --help, -h               显示此帮助
  --version, -v            显示版本号

${chalk.bold("Keys:")}
  j / Down / Enter         向下一行
  k / Up                   向上一行
  Space / PageDown / f     向下一页
  b / PageUp               向上一页
  Ctrl+D / Ctrl+U          向下/向上半页
  g / Home, G / End        跳到开头/结尾
  m                        切换鼠标报告
  Ctrl+L                   重绘
  q / Ctrl+C / Esc         退出

${chalk.bold("Environment Variables:")}
  ${ENV_CONFIG_DIR.padEnd(24)} 配置目录 (默认: ~/${CONFIG_DIR_NAME})
  FOLIO_MOUSE              1 或 0，覆盖鼠标设置
  FOLIO_TUI_DEBUG          设为 1 时写调试日志并启用严格检查
  FOLIO_TUI_DEBUG_LOG      调试日志路径
  FOLIO_TUI_WRITE_LOG      把写入终端的原始输出追加到此文件
`);
}
