/**
 * 阅读器 CLI 的主入口点。
 *
 * 解析参数和设置，载入文档，然后在终端中运行 Pager 直到退出。
 */

import { DifferentialRenderer, ProcessTerminal, type Terminal } from "@folio/tui";
import chalk from "chalk";
import { type Args, parseArgs, printHelp } from "./cli/args.js";
import { APP_NAME, VERSION } from "./config.js";
import { Document } from "./document.js";
import { createPagerKeybindings } from "./keybindings.js";
import { Pager } from "./pager.js";
import { type Settings, SettingsManager } from "./settings-manager.js";

/**
 * 把命令行参数转换为设置覆盖层。只包含显式给出的值。
 */
export function argsToSettings(args: Args): Settings {
	const overrides: Settings = {};
	if (args.escapeTimeoutMs !== undefined || args.sequenceTimeoutMs !== undefined) {
		overrides.input = {};
		if (args.escapeTimeoutMs !== undefined) overrides.input.escapeTimeoutMs = args.escapeTimeoutMs;
		if (args.sequenceTimeoutMs !== undefined) overrides.input.sequenceTimeoutMs = args.sequenceTimeoutMs;
	}
	if (args.tabSize !== undefined || args.noMouse) {
		overrides.display = {};
		if (args.tabSize !== undefined) overrides.display.tabSize = args.tabSize;
		if (args.noMouse) overrides.display.mouse = false;
	}
	return overrides;
}

function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * 在终端中运行阅读器。用户退出或收到 SIGINT/SIGTERM 时 resolve；
 * 绘制出错时恢复终端后 reject。
 */
export function runPager(document: Document, settings: SettingsManager, terminal?: Terminal): Promise<void> {
	const term =
		terminal ??
		new ProcessTerminal({
			escapeTimeoutMs: settings.getEscapeTimeoutMs(),
			sequenceTimeoutMs: settings.getSequenceTimeoutMs(),
		});
	const tabSize = settings.getTabSize();
	const renderer = new DifferentialRenderer(term, {
		tabSize,
		synchronizedOutput: settings.getSynchronizedOutput(),
	});

	return new Promise<void>((resolve, reject) => {
		let done = false;

		const finish = (error?: unknown): void => {
			if (done) return;
			done = true;
			process.off("SIGINT", onSignal);
			process.off("SIGTERM", onSignal);
			term.stop();
			if (error === undefined) {
				resolve();
			} else {
				reject(error);
			}
		};
		const onSignal = (): void => finish();

		const toggleMouse = (): string => {
			const enabled = !term.mouseReporting;
			if (enabled) {
				term.enableMouseReporting();
			} else {
				term.disableMouseReporting();
			}
			const state = enabled ? "Mouse on" : "Mouse off";
			try {
				settings.setMouseEnabled(enabled);
				return state;
			} catch (error) {
				return `${state} (not saved: ${errorMessage(error)})`;
			}
		};

		const pager = new Pager(document, renderer, {
			keybindings: createPagerKeybindings(settings.getKeybindings()),
			tabSize,
			onToggleMouse: toggleMouse,
			onQuit: () => finish(),
		});

		const redraw = (): void => {
			const { columns, rows } = term.size();
			pager.resize(columns, rows);
			pager.render();
		};

		const guarded = (fn: () => void): void => {
			try {
				fn();
			} catch (error) {
				finish(error);
			}
		};

		process.on("SIGINT", onSignal);
		process.on("SIGTERM", onSignal);

		guarded(() => {
			term.start(
				(input) =>
					guarded(() => {
						pager.handleInput(input);
						if (!pager.finished) redraw();
					}),
				() => guarded(redraw),
			);
			term.setTitle(`${APP_NAME} - ${document.title}`);
			if (settings.getMouseEnabled()) {
				term.enableMouseReporting();
			}
			redraw();
		});
	});
}

export async function main(argv: string[]): Promise<void> {
	const parsed = parseArgs(argv);

	if (parsed.version) {
		console.log(VERSION);
		return;
	}

	if (parsed.help) {
		printHelp();
		return;
	}

	if (parsed.path === undefined) {
		console.error(chalk.red("Error: No file given"));
		console.error(`Usage: ${APP_NAME} [options] <file>`);
		process.exitCode = 1;
		return;
	}
	if (parsed.extra.length > 0) {
		console.error(chalk.yellow(`Warning: Ignoring extra arguments: ${parsed.extra.join(" ")}`));
	}

	if (!process.stdin.isTTY || !process.stdout.isTTY) {
		console.error(chalk.red("Error: An interactive terminal is required"));
		process.exitCode = 1;
		return;
	}

	try {
		const settings = SettingsManager.create();
		settings.applyOverrides(argsToSettings(parsed));
		const document = await Document.load(parsed.path);
		await runPager(document, settings);
	} catch (error) {
		console.error(chalk.red(`Error: ${errorMessage(error)}`));
		process.exitCode = 1;
	}
}
