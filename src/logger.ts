/**
 * Structured logging for the router.
 *
 * JSON lines on the console by default; pass `output` to collect entries
 * elsewhere.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
	level: LogLevel;
	message: string;
	timestamp: string;
	context?: Record<string, unknown>;
	error?: {
		name: string;
		message: string;
		stack?: string;
	};
}

export interface LoggerOptions {
	level?: LogLevel;
	context?: Record<string, unknown>;
	output?: (entry: LogEntry) => void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
	return typeof value === "string" && Object.hasOwn(LOG_LEVELS, value);
}

export class Logger {
	private readonly level: LogLevel;
	private readonly context: Record<string, unknown>;
	private readonly output: (entry: LogEntry) => void;

	constructor(options: LoggerOptions = {}) {
		this.level = options.level ?? "info";
		this.context = options.context ?? {};
		this.output = options.output ?? defaultOutput;
	}

	debug(message: string, context?: Record<string, unknown>): void {
		this.log("debug", message, context);
	}

	error(message: string, error?: Error, context?: Record<string, unknown>): void {
		this.log("error", message, context, error);
	}

	/** Logger sharing level and output, with extra bound context. */
	child(context: Record<string, unknown>): Logger {
		return new Logger({
			level: this.level,
			context: { ...this.context, ...context },
			output: this.output,
		});
	}

	isLevelEnabled(level: LogLevel): boolean {
		return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
	}

	private log(
		level: LogLevel,
		message: string,
		context?: Record<string, unknown>,
		error?: Error,
	): void {
		if (!this.isLevelEnabled(level)) return;

		const entry: LogEntry = {
			level,
			message,
			timestamp: new Date().toISOString(),
			context: { ...this.context, ...context },
		};

		if (error) {
			entry.error = {
				name: error.name,
				message: error.message,
				stack: error.stack,
			};
		}

		this.output(entry);
	}
}

function defaultOutput(entry: LogEntry): void {
	const line = JSON.stringify(entry);
	if (entry.level === "error") console.error(line);
	else console.log(line);
}
