export type LogLevel = "error" | "warn" | "info" | "debug" | "trace";

const LEVEL_ORDER: Record<LogLevel, number> = {
	error: 1,
	warn: 2,
	info: 3,
	debug: 4,
	trace: 5,
};

export type LogSink = (line: string) => void;

/**
 * Logging handle passed to every operation that reports progress.
 * There is no process-wide logger.
 */
export interface Logger {
	readonly level: LogLevel | "silent";
	error(message: string): void;
	warn(message: string): void;
	info(message: string): void;
	debug(message: string): void;
	trace(message: string): void;
}

export interface LoggerOptions {
	level: LogLevel | "silent";
	sink?: LogSink;
	now?: () => Date;
}

/**
 * Create a leveled logger writing `<ISO timestamp> [LEVEL] message` lines.
 * Defaults to stderr so command output on stdout stays clean.
 */
export function createLogger(options: LoggerOptions): Logger {
	const sink = options.sink ?? ((line: string) => process.stderr.write(`${line}\n`));
	const now = options.now ?? (() => new Date());
	const threshold = options.level === "silent" ? 0 : LEVEL_ORDER[options.level];

	const emit = (level: LogLevel, message: string) => {
		if (LEVEL_ORDER[level] > threshold) {
			return;
		}
		sink(`${now().toISOString()} [${level.toUpperCase()}] ${message}`);
	};

	return {
		level: options.level,
		error: (message) => emit("error", message),
		warn: (message) => emit("warn", message),
		info: (message) => emit("info", message),
		debug: (message) => emit("debug", message),
		trace: (message) => emit("trace", message),
	};
}

export const silentLogger: Logger = createLogger({ level: "silent", sink: () => {} });

/**
 * Map a `-v` occurrence count to a level: none is info, one debug, more trace.
 */
export function levelFromVerbosity(count: number): LogLevel {
	if (count <= 0) {
		return "info";
	}
	if (count === 1) {
		return "debug";
	}
	return "trace";
}
