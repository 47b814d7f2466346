export { type CliArgs, parseCliArgs, parsePort, splitList, USAGE } from "./args.js";
export * from "./config/index.js";
export { argsToOverrides, type MainDependencies, main, processDependencies } from "./main.js";
export {
	createLogger,
	escapeControlChars,
	formatLogLine,
	isLogLevel,
	LOG_LEVELS,
	type Logger,
	type LoggerOptions,
	type LogLevel,
} from "./utils/logger.js";
