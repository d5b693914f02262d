/**
 * 清理将要显示在终端上的不可信文本：删除转义序列（CSI/OSC/DCS 等，7 位和 8 位形式），
 * 并丢弃 C0/C1 控制字符，防止转义注入破坏布局。
 */

export type SanitizeOptions = {
	/** 保留 `\n`，并把 `\r` 规范为 `\n`（默认：替换为空格） */
	preserveNewlines?: boolean;
	/** 保留 `\t`（默认：替换为空格） */
	preserveTabs?: boolean;
};

function isControlCodePoint(cp: number): boolean {
	return cp < 0x20 || cp === 0x7f || (cp >= 0x80 && cp <= 0x9f);
}

function skipCsi(cps: number[], index: number): number {
	let i = index;
	while (i < cps.length) {
		const cp = cps[i] ?? 0;
		i++;
		if (cp >= 0x40 && cp <= 0x7e) break;
	}
	return i;
}

/**
 * 跳过字符串序列直到终止符。OSC 接受 BEL；8 位形式接受 0x9C；ESC \ 总是有效。
 * 没有终止符时吞掉剩余全部内容。
 */
function skipString(cps: number[], index: number, allowBel: boolean, c1: boolean): number {
	let i = index;
	while (i < cps.length) {
		const cp = cps[i];
		if (allowBel && cp === 0x07) return i + 1;
		if (c1 && cp === 0x9c) return i + 1;
		if (cp === 0x1b && cps[i + 1] === 0x5c) return i + 2;
		i++;
	}
	return i;
}

function skipEscape(cps: number[], index: number): number {
	if (index >= cps.length) return cps.length;

	switch (cps[index]) {
		case 0x5b: // '['
			return skipCsi(cps, index + 1);
		case 0x5d: // ']'
			return skipString(cps, index + 1, true, false);
		case 0x50: // 'P' DCS
		case 0x58: // 'X' SOS
		case 0x5e: // '^' PM
		case 0x5f: // '_' APC
			return skipString(cps, index + 1, false, false);
		default:
			// 两字节序列：ESC + 终止字节
			return index + 1;
	}
}

export function sanitizeForTerminal(text: string, options: SanitizeOptions = {}): string {
	if (text.length === 0) return "";

	const cps = Array.from(text, (char) => char.codePointAt(0) ?? 0);
	let out = "";
	let i = 0;

	while (i < cps.length) {
		const cp = cps[i] ?? 0;

		switch (cp) {
			case 0x1b:
				i = skipEscape(cps, i + 1);
				continue;
			case 0x9b:
				i = skipCsi(cps, i + 1);
				continue;
			case 0x9d:
				i = skipString(cps, i + 1, true, true);
				continue;
			case 0x90:
			case 0x98:
			case 0x9e:
			case 0x9f:
				i = skipString(cps, i + 1, false, true);
				continue;
			case 0x0a:
			case 0x0d:
				out += options.preserveNewlines ? "\n" : " ";
				// CRLF 算一个换行
				i += cp === 0x0d && cps[i + 1] === 0x0a ? 2 : 1;
				continue;
			case 0x09:
				out += options.preserveTabs ? "\t" : " ";
				i++;
				continue;
		}

		if (!isControlCodePoint(cp)) {
			out += String.fromCodePoint(cp);
		}
		i++;
	}

	return out;
}

/**
 * 单字符文本输入的过滤：拒绝 C0/C1 控制字符和 DEL。
 */
export function isPrintableChar(key: string): boolean {
	const cp = key.codePointAt(0);
	if (cp === undefined || String.fromCodePoint(cp).length !== key.length) return false;
	return !isControlCodePoint(cp);
}
