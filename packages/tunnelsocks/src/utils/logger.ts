/**
 * Severity-filtered stderr logger.
 *
 * Lines look like `<level>: <message>` followed by the JSON-encoded data, if any.
 * The minimum level is fixed when the logger is created (from -t / -v / -q or
 * the config file). Errors are always written.
 */

import type { LogSink } from "@tunnelsocks/policy";
import chalk, { Chalk, type ChalkInstance } from "chalk";

export type LogLevel = "trace" | "debug" | "info" | "warning" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warning", "error"];

const LEVEL_RANK: Record<LogLevel, number> = {
	trace: 0,
	debug: 1,
	info: 2,
	warning: 3,
	error: 4,
};

const LEVEL_COLORS: Record<LogLevel, (painter: ChalkInstance, text: string) => string> = {
	trace: (painter, text) => painter.gray(text),
	debug: (painter, text) => painter.cyan(text),
	info: (painter, text) => painter.green(text),
	warning: (painter, text) => painter.yellow(text),
	error: (painter, text) => painter.red(text),
};

export interface LoggerOptions {
	level: LogLevel;
	/** Receives one line at a time, without the newline. Defaults to stderr. */
	write?: (line: string) => void;
	/** Force colors on or off; chalk's terminal detection decides otherwise */
	color?: boolean;
}

export interface Logger extends LogSink {
	readonly level: LogLevel;
	isEnabled(level: LogLevel): boolean;
}

export function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value);
}

const CONTROL_ESCAPES: Record<string, string> = {
	"\n": "\\n",
	"\r": "\\r",
	"\t": "\\t",
};

/** Escape control characters so one call always yields one line. */
export function escapeControlChars(text: string): string {
	return text.replace(/[\u0000-\u001f\u007f]/g, (char) => {
		return CONTROL_ESCAPES[char] ?? `\\x${char.charCodeAt(0).toString(16).padStart(2, "0")}`;
	});
}

export function formatLogLine(
	level: LogLevel,
	message: string,
	data?: Record<string, unknown>,
	painter: ChalkInstance = chalk,
): string {
	const prefix = LEVEL_COLORS[level](painter, `${level}:`);
	const dataStr = data ? ` ${JSON.stringify(data)}` : "";
	return `${prefix} ${escapeControlChars(message)}${dataStr}`;
}

/**
 * Create a logger writing at or above `level`.
 */
export function createLogger(options: LoggerOptions): Logger {
	const { level } = options;
	const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));
	const painter = options.color === undefined ? chalk : new Chalk({ level: options.color ? 1 : 0 });
	const threshold = LEVEL_RANK[level];

	const isEnabled = (candidate: LogLevel) => LEVEL_RANK[candidate] >= threshold;
	const log = (candidate: LogLevel) => (message: string, data?: Record<string, unknown>) => {
		if (!isEnabled(candidate)) return;
		write(formatLogLine(candidate, message, data, painter));
	};

	return {
		level,
		isEnabled,
		trace: log("trace"),
		debug: log("debug"),
		info: log("info"),
		warn: log("warning"),
		error: log("error"),
	};
}
