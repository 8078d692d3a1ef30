/**
 * Logging contract used for statement debugging and diagnostics.
 *
 * Pass any object with these four methods (pino, a test spy, ...) as the
 * `logger` option. The default writes to the console.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
	debug(message: string, data?: unknown): void;
	info(message: string, data?: unknown): void;
	warn(message: string, data?: unknown): void;
	error(message: string, data?: unknown): void;
}

const levelPriority: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
	silent: 4,
};

export interface ConsoleLoggerOptions {
	/** Minimum level written (default: "debug") */
	level?: LogLevel;
	/** Prefix for every line (default: "[rowcast]") */
	prefix?: string;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
	const threshold = levelPriority[options.level ?? "debug"];
	const prefix = options.prefix ?? "[rowcast]";

	const write =
		(level: Exclude<LogLevel, "silent">) =>
		(message: string, data?: unknown): void => {
			if (levelPriority[level] < threshold) return;
			const line = `${prefix} ${level.toUpperCase()} ${message}`;
			if (data === undefined) {
				console[level](line);
			} else {
				console[level](line, data);
			}
		};

	return {
		debug: write("debug"),
		info: write("info"),
		warn: write("warn"),
		error: write("error"),
	};
}
