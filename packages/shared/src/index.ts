/**
 * glyphlog shared utilities
 *
 * Cross-cutting utilities used by the core library and the CLI.
 */

export const VERSION = "0.1.0";

// Logger
export {
	createLogger,
	silentLogger,
	STRUCTURED_LEVELS,
	type LogFn,
	type Logger,
	type LoggerOptions,
	type LogLevel,
} from "./logger";
