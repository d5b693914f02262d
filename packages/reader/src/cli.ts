#!/usr/bin/env node
/**
 * 阅读器 CLI 入口点。
 */
process.title = "folio";

import { main } from "./main.js";

main(process.argv.slice(2)).catch((error: unknown) => {
	console.error(error);
	process.exitCode = 1;
});
