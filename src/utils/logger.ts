export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
	debug(message: string): void;
	info(message: string): void;
	warn(message: string): void;
	error(message: string): void;
	child(prefix: string): Logger;
}

export type LogSink = (level: Exclude<LogLevel, "silent">, line: string) => void;

export type LoggerOptions = {
	level?: LogLevel;
	prefix?: string;
	/** Defaults to stdout for debug/info and stderr for warn/error. */
	sink?: LogSink;
};

const LEVEL_PRIORITY: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
	silent: 4,
};

export function createLogger(options: LoggerOptions = {}): Logger {
	const minLevel = options.level ?? "info";
	const prefix = options.prefix ?? "trellis";
	const sink = options.sink ?? writeToProcess;

	const log = (level: Exclude<LogLevel, "silent">, message: string): void => {
		if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[minLevel]) {
			return;
		}
		sink(level, `${prefix} ${level === "info" ? "" : `${level}: `}${message}`);
	};

	return {
		debug: (message) => log("debug", message),
		info: (message) => log("info", message),
		warn: (message) => log("warn", message),
		error: (message) => log("error", message),
		child: (childPrefix) =>
			createLogger({ level: minLevel, prefix: `${prefix}:${childPrefix}`, sink }),
	};
}

export const silentLogger: Logger = createLogger({ level: "silent" });

function writeToProcess(level: Exclude<LogLevel, "silent">, line: string): void {
	if (level === "warn" || level === "error") {
		process.stderr.write(`${line}\n`);
		return;
	}
	process.stdout.write(`${line}\n`);
}
