import {
	type IoError,
	type LogLevel as RenderLevel,
	Stderr,
} from "@glyphlog/core";
import { ok, type Result } from "neverthrow";

/** Structured levels, lowest first. */
export const STRUCTURED_LEVELS = [
	"trace",
	"debug",
	"info",
	"warn",
	"error",
	"fatal",
] as const;

export type LogLevel = (typeof STRUCTURED_LEVELS)[number];

export type LogFn = (
	message: string,
	metadata?: Record<string, unknown>,
) => Result<void, IoError>;

/** Leveled logger for hosts that expect structured methods. */
export type Logger = Record<LogLevel, LogFn> & {
	child(fields: Record<string, unknown>): Logger;
};

/** `fatal` has no glyph of its own. */
const RENDER_LEVEL: Record<LogLevel, RenderLevel> = {
	trace: "trace",
	debug: "debug",
	info: "info",
	warn: "warn",
	error: "error",
	fatal: "error",
};

export interface LoggerOptions {
	/** Lowest level written. Default: "info" */
	level?: LogLevel;
	/** Fields appended to every message */
	context?: Record<string, unknown>;
	/** Default: a renderer on stderr */
	renderer?: Stderr;
	silent?: boolean;
}

function rank(level: LogLevel): number {
	return STRUCTURED_LEVELS.indexOf(level);
}

function withFields(message: string, fields: Record<string, unknown>): string {
	return Object.keys(fields).length === 0
		? message
		: `${message} ${JSON.stringify(fields)}`;
}

/**
 * Create a Logger that writes through a glyphlog renderer.
 *
 * The renderer's own verbosity flags still apply on top of `level`, so
 * trace and debug lines need the matching flag switched on. `fatal` is
 * written at error level and never exits the process.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
	const level = options.level ?? "info";
	const context = options.context ?? {};
	const silent = options.silent ?? false;
	const renderer = options.renderer ?? new Stderr();
	const threshold = rank(level);

	const method =
		(at: LogLevel): LogFn =>
		(message, metadata) => {
			if (silent || rank(at) < threshold) {
				return ok(undefined);
			}
			const fields = metadata ? { ...context, ...metadata } : context;
			return renderer.log(RENDER_LEVEL[at], withFields(message, fields));
		};

	return {
		trace: method("trace"),
		debug: method("debug"),
		info: method("info"),
		warn: method("warn"),
		error: method("error"),
		fatal: method("fatal"),
		child: (fields) =>
			createLogger({
				level,
				context: { ...context, ...fields },
				renderer,
				silent,
			}),
	};
}

/** Discards everything. */
export const silentLogger: Logger = createLogger({ silent: true });
