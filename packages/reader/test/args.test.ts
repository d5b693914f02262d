import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { parseArgs } from "../src/cli/args.js";
import { argsToSettings } from "../src/main.js";

describe("parseArgs", () => {
	const errors = vi.spyOn(console, "error");

	beforeEach(() => {
		errors.mockReset();
		errors.mockImplementation(() => {});
	});

	afterEach(() => {
		errors.mockReset();
	});

	it("parses options and the file path", () => {
		const args = parseArgs([
			"--tab-size",
			"8",
			"--escape-timeout",
			"20",
			"--sequence-timeout",
			"300",
			"--no-mouse",
			"notes.txt",
		]);
		expect(args).toEqual({
			path: "notes.txt",
			tabSize: 8,
			escapeTimeoutMs: 20,
			sequenceTimeoutMs: 300,
			noMouse: true,
			extra: [],
		});
		expect(errors).not.toHaveBeenCalled();
	});

	it("parses help and version flags", () => {
		expect(parseArgs(["-h"]).help).toBe(true);
		expect(parseArgs(["--version"]).version).toBe(true);
	});

	it("keeps extra positional arguments separately", () => {
		expect(parseArgs(["a.txt", "b.txt"])).toEqual({ path: "a.txt", extra: ["b.txt"] });
	});

	it("warns about invalid numbers and ignores them", () => {
		const args = parseArgs(["--tab-size", "0", "--escape-timeout", "-1", "file"]);
		expect(args.tabSize).toBeUndefined();
		expect(args.escapeTimeoutMs).toBeUndefined();
		expect(args.path).toBe("file");
		expect(errors).toHaveBeenCalledTimes(2);
	});

	it("warns about unknown options", () => {
		const args = parseArgs(["--color", "file"]);
		expect(args.path).toBe("file");
		expect(errors).toHaveBeenCalledTimes(1);
	});
});

describe("argsToSettings", () => {
	it("includes only the values given on the command line", () => {
		expect(argsToSettings({ extra: [] })).toEqual({});
		expect(argsToSettings({ extra: [], escapeTimeoutMs: 20, noMouse: true })).toEqual({
			input: { escapeTimeoutMs: 20 },
			display: { mouse: false },
		});
		expect(argsToSettings({ extra: [], tabSize: 2, sequenceTimeoutMs: 900 })).toEqual({
			input: { sequenceTimeoutMs: 900 },
			display: { tabSize: 2 },
		});
	});
});
