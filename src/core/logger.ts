export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
	debug(message: string, data?: Record<string, unknown>): void;
	info(message: string, data?: Record<string, unknown>): void;
	warn(message: string, data?: Record<string, unknown>): void;
	error(message: string, data?: Record<string, unknown>): void;
}

export interface LoggerOptions {
	level?: LogLevel;
	context?: string;
}

const levelPriority: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

/** Console logger writing one line per entry, data appended as JSON. */
export function createLogger(options: LoggerOptions = {}): Logger {
	const threshold = levelPriority[options.level ?? "info"];
	const prefix = options.context ? `[${options.context}] ` : "";

	const write =
		(level: LogLevel) =>
		(message: string, data?: Record<string, unknown>): void => {
			if (levelPriority[level] < threshold) return;
			const suffix = data ? ` ${JSON.stringify(data)}` : "";
			const line = `${prefix}${level}: ${message}${suffix}`;
			if (level === "error") {
				console.error(line);
			} else if (level === "warn") {
				console.warn(line);
			} else {
				console.log(line);
			}
		};

	return {
		debug: write("debug"),
		info: write("info"),
		warn: write("warn"),
		error: write("error"),
	};
}

export const silentLogger: Logger = {
	debug() {},
	info() {},
	warn() {},
	error() {},
};
