import type { LogSink } from "./types.js";

const noop = (): void => {};

/** Discards everything. Default sink for library callers that pass none. */
export const silentLogSink: LogSink = {
	trace: noop,
	debug: noop,
	info: noop,
	warn: noop,
	error: noop,
};
