import { DEFAULT_TAB_SIZE, sanitizeForTerminal, wrapCells } from "@folio/tui";
import { readFile, stat } from "node:fs/promises";
import { basename, resolve } from "node:path";

/** 一个显示行：折行后的文本及其所在的源行（0 起始） */
export interface DisplayLine {
	text: string;
	sourceLine: number;
}

/** 拒绝打开的最大文件（字节） */
export const MAX_DOCUMENT_BYTES = 64 * 1024 * 1024;

/**
 * 纯文本文档。内容在载入时清理（保留换行和制表符），
 * 按显示宽度折行的结果按宽度缓存。
 */
export class Document {
	readonly title: string;
	readonly lines: readonly string[];
	private layoutCache: { width: number; tabSize: number; rows: DisplayLine[] } | undefined;

	constructor(text: string, title: string) {
		this.title = sanitizeForTerminal(title);
		const clean = sanitizeForTerminal(text.replace(/^\uFEFF/, ""), { preserveNewlines: true, preserveTabs: true });
		const lines = clean.split("\n");
		// 文件末尾的换行不算一个空行
		if (lines.length > 1 && lines[lines.length - 1] === "") {
			lines.pop();
		}
		this.lines = lines;
	}

	static async load(path: string): Promise<Document> {
		const fullPath = resolve(path);
		const info = await stat(fullPath);
		if (!info.isFile()) {
			throw new Error(`Not a file: ${path}`);
		}
		if (info.size > MAX_DOCUMENT_BYTES) {
			throw new Error(`File too large: ${path} (${info.size} bytes)`);
		}
		const content = await readFile(fullPath, "utf-8");
		return new Document(content, basename(fullPath));
	}

	/**
	 * 按宽度折行。宽度和制表位不变时返回缓存的结果。
	 */
	layout(width: number, tabSize = DEFAULT_TAB_SIZE): readonly DisplayLine[] {
		const cache = this.layoutCache;
		if (cache && cache.width === width && cache.tabSize === tabSize) {
			return cache.rows;
		}

		const rows: DisplayLine[] = [];
		this.lines.forEach((line, sourceLine) => {
			for (const text of wrapCells(line, width, 0, tabSize)) {
				rows.push({ text, sourceLine });
			}
		});
		this.layoutCache = { width, tabSize, rows };
		return rows;
	}
}
