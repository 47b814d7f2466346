import { Chalk } from "chalk";
import { describe, expect, it } from "vitest";
import { createLogger, escapeControlChars, formatLogLine, isLogLevel, type LogLevel } from "../src/index.js";

function capture(level: LogLevel) {
	const lines: string[] = [];
	const logger = createLogger({ level, write: (line) => lines.push(line), color: false });
	return { logger, lines };
}

describe("createLogger", () => {
	it("should drop messages below the minimum level", () => {
		const { logger, lines } = capture("info");
		logger.trace("t");
		logger.debug("d");
		logger.info("i");
		logger.warn("w");
		logger.error("e");
		expect(lines).toEqual(["info: i", "warning: w", "error: e"]);
	});

	it("should write everything at trace", () => {
		const { logger, lines } = capture("trace");
		logger.trace("bytes copied");
		logger.debug("AllowConnect: 10.0.0.5:1234 --> 192.0.2.1:443");
		expect(lines).toEqual(["trace: bytes copied", "debug: AllowConnect: 10.0.0.5:1234 --> 192.0.2.1:443"]);
	});

	it("should keep only warnings and errors when quiet", () => {
		const { logger, lines } = capture("warning");
		logger.info("starting");
		logger.warn("ssh session lost");
		expect(lines).toEqual(["warning: ssh session lost"]);
		expect(logger.isEnabled("info")).toBe(false);
		expect(logger.isEnabled("error")).toBe(true);
	});

	it("should append data as JSON", () => {
		const { logger, lines } = capture("debug");
		logger.debug("AllowBind: 10.0.0.5:1 --> 192.0.2.1:2", { allowed: false });
		expect(lines).toEqual(['debug: AllowBind: 10.0.0.5:1 --> 192.0.2.1:2 {"allowed":false}']);
	});

	it("should escape control characters in messages", () => {
		const { logger, lines } = capture("info");
		logger.info("could not resolve evil\ninfo: forged line");
		expect(lines).toEqual(["info: could not resolve evil\\ninfo: forged line"]);
	});
});

describe("escapeControlChars", () => {
	it("should use short escapes where they exist and hex otherwise", () => {
		expect(escapeControlChars("a\tb\rc")).toBe("a\\tb\\rc");
		expect(escapeControlChars("\u001b[31mred")).toBe("\\x1b[31mred");
		expect(escapeControlChars("\u007f")).toBe("\\x7f");
	});
});

describe("formatLogLine", () => {
	it("should colour the level prefix", () => {
		const painter = new Chalk({ level: 1 });
		expect(formatLogLine("error", "boom", undefined, painter)).toBe(`${painter.red("error:")} boom`);
		expect(formatLogLine("error", "boom", undefined, painter)).not.toBe("error: boom");
	});
});

describe("isLogLevel", () => {
	it("should accept the five levels only", () => {
		expect(isLogLevel("warning")).toBe(true);
		expect(isLogLevel("warn")).toBe(false);
	});
});
