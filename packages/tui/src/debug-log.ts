import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

let debugLogPath: string | undefined;
let debugLogDisabled = false;

function resolveDebugLogPath(): string | undefined {
	if (debugLogDisabled || process.env.FOLIO_TUI_DEBUG !== "1") return undefined;
	if (debugLogPath === undefined) {
		debugLogPath = process.env.FOLIO_TUI_DEBUG_LOG || path.join(os.tmpdir(), "folio-tui-debug.log");
	}
	return debugLogPath;
}

/**
 * 追加一行调试日志（仅当 FOLIO_TUI_DEBUG=1）。
 * 写入失败后本进程内不再尝试，渲染不受影响。
 */
export function debugLog(scope: string, message: string): void {
	const logPath = resolveDebugLogPath();
	if (!logPath) return;
	try {
		fs.appendFileSync(logPath, `[${new Date().toISOString()}] ${scope}: ${message}\n`, { encoding: "utf8" });
	} catch {
		// stderr 在全屏模式下不可见，只能停用
		debugLogDisabled = true;
	}
}
