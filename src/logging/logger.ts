/**
 * @title Logging Module
 * @description Level-filtered console logging.
 *
 * Messages at or below the configured level are written, one per line,
 * to the configured sink (stdout by default).
 *
 * @module logging
 */

/** Log levels, most severe first. */
export const LOG_LEVELS = ["error", "warn", "info", "debug"] as const;

/**
 * A log level.
 */
export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Logger used by every module that reports progress.
 */
export interface Logger {
	/** Active level. */
	readonly level: LogLevel;
	/**
	 * Log a message if its type is at or below the active level.
	 *
	 * @param message - The message to log
	 * @param type - The type of log message (default: "info")
	 */
	log(message: string, type?: LogLevel): void;
	error(message: string): void;
	warn(message: string): void;
	info(message: string): void;
	debug(message: string): void;
}

/**
 * Options for creating a logger.
 */
export interface LoggerOptions {
	/** Most verbose level written (default: "info"). */
	level?: LogLevel;
	/** Line sink (default: stdout). */
	write?: (line: string) => void;
}

/**
 * Check whether a string names a log level.
 */
export function isLogLevel(value: string): value is LogLevel {
	return (LOG_LEVELS as readonly string[]).includes(value);
}

function writeStdout(line: string): void {
	process.stdout.write(line + "\n");
}

/**
 * Create a logger.
 *
 * @param options - Logger options
 * @returns Logger
 */
export function createLogger(options: LoggerOptions = {}): Logger {
	const { level = "info", write = writeStdout } = options;

	const log = (message: string, type: LogLevel = "info"): void => {
		if (LOG_LEVELS.indexOf(type) <= LOG_LEVELS.indexOf(level)) {
			write(message);
		}
	};

	return {
		level,
		log,
		error: (message) => log(message, "error"),
		warn: (message) => log(message, "warn"),
		info: (message) => log(message, "info"),
		debug: (message) => log(message, "debug"),
	};
}

/**
 * Logger that discards everything.
 */
export const silentLogger: Logger = createLogger({ level: "error", write: () => undefined });
