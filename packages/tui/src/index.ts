// 终端 I/O 引擎：输入解码、帧缓冲、差分渲染

// ANSI 序列
export * as ansi from "./ansi.js";
// 时钟
export { type Clock, ManualClock, systemClock } from "./clock.js";
// 调试日志
export { debugLog } from "./debug-log.js";
// 错误
export { assertInvariant, clampDimension, InvariantError, isStrictMode } from "./errors.js";
// 帧缓冲
export { type Cell, CONTINUATION, Frame, type FrameOptions, type Glyph } from "./frame.js";
// 输入解码
export {
	DEFAULT_ESCAPE_TIMEOUT_MS,
	DEFAULT_SEQUENCE_TIMEOUT_MS,
	InputDecoder,
	type InputDecoderOptions,
	type InputToken,
	type StringSequenceKind,
	tokenText,
} from "./input-decoder.js";
export { type ByteSource, InputReader, type InputReaderEventMap } from "./input-reader.js";
// 按键绑定
export { type KeybindingsConfig, KeybindingsManager } from "./keybindings.js";
// 键盘输入处理
export { describeKey, formatKey, type KeyEvent, type KeyId, matchesKey, parseKeyId } from "./keys.js";
// 鼠标
export { isMouseReport, type MouseAction, type MouseButton, type MouseEvent, parseMouseEvent } from "./mouse.js";
// 输出端
export { MemoryOutputSink, type OutputSink, StreamOutputSink, type WritableLike } from "./output.js";
// 差分渲染
export { DifferentialRenderer, type DifferentialRendererOptions, type RenderStats } from "./renderer.js";
// 文本清理
export { isPrintableChar, type SanitizeOptions, sanitizeForTerminal } from "./sanitize.js";
// 终端尺寸
export {
	DEFAULT_SIZE_TTL_MS,
	FALLBACK_SIZE,
	queryStreamSize,
	type SizedStream,
	SizeProbe,
	type SizeProbeOptions,
	type SizeQuery,
	type TerminalSize,
} from "./size-probe.js";
// 样式
export {
	background,
	type ColorName,
	Colors,
	color256,
	isDefaultStyle,
	rgb,
	type Style,
	StyleTracker,
	styleKey,
	styleToSgr,
} from "./style.js";
// 终端接口和实现
export {
	ProcessTerminal,
	type ProcessTerminalOptions,
	type Terminal,
	type TerminalInput,
	type TerminalInputStream,
	type TerminalOutputStream,
} from "./terminal.js";
// 工具函数
export {
	type AnsiToken,
	DEFAULT_TAB_SIZE,
	expandTabs,
	extractAnsiCode,
	graphemeWidth,
	type PadAlign,
	padToWidth,
	stripAnsi,
	tokenizeAnsi,
	truncateToWidth,
	visibleWidth,
	wrapCells,
	wrapPlainText,
} from "./utils.js";
