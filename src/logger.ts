/**
 * @file Logger used across the data-access core, with configurable log levels.
 * Command execution, metadata discovery and binder compilation report through here.
 */

/**
 * Available log levels in order of priority (from lowest to highest).
 */
export enum LogLevel {
	/** Log all messages (debug, info, warn, error) */
	ALL = 0,
	/** Log debug, info, warn and error messages */
	DEBUG = 10,
	/** Log info, warn and error messages */
	INFO = 20,
	/** Log warn and error messages only */
	WARN = 30,
	/** Log error messages only */
	ERROR = 40,
	/** Disable all logging */
	OFF = 50
}

/**
 * Structured payload attached to a log entry.
 */
export type LogData = Record<string, unknown>;

/**
 * Log entry structure.
 */
export interface LogEntry {
	timestamp: Date;
	level: LogLevel;
	message: string;
	context?: string;
	data?: LogData;
}

/**
 * Logger configuration options.
 */
export interface LoggerConfig {
	/** The minimum log level to output (default: INFO) */
	level?: LogLevel;
	/** Whether to output logs to console (default: true) */
	console?: boolean;
	/** Custom log formatter function */
	formatter?: (entry: LogEntry) => string;
	/** Custom log handler function */
	handler?: (entry: LogEntry) => void;
}

/**
 * Serializes log data. Bigints and buffers show up in parameter lists, which JSON.stringify rejects.
 */
function stringifyData(data: LogData): string {
	// the holder's raw value, since Buffer.toJSON runs before the replacer
	return JSON.stringify(data, function (this: object, key: string, value: unknown) {
		const raw: unknown = Reflect.get(this, key);
		if (Buffer.isBuffer(raw)) return `<Buffer ${raw.length} bytes>`;
		if (typeof value === 'bigint') return value.toString();
		return value;
	});
}

const defaultFormatter = (entry: LogEntry): string => {
	const timestamp = entry.timestamp.toISOString();
	const level = LogLevel[entry.level].padEnd(5);
	const context = entry.context ? `[${entry.context}] ` : '';
	const data = entry.data ? ` ${stringifyData(entry.data)}` : '';
	return `${timestamp} ${level} ${context}${entry.message}${data}`;
};

/**
 * Logger with configurable log levels and output options.
 */
export class Logger {
	private config: Required<LoggerConfig>;

	constructor(config: LoggerConfig = {}) {
		this.config = {
			level: config.level ?? LogLevel.INFO,
			console: config.console ?? true,
			formatter: config.formatter ?? defaultFormatter,
			handler: config.handler ?? this.defaultHandler.bind(this)
		};
	}

	/**
	 * Updates the logger configuration.
	 */
	configure(config: Partial<LoggerConfig>): void {
		this.config = {
			level: config.level ?? this.config.level,
			console: config.console ?? this.config.console,
			formatter: config.formatter ?? this.config.formatter,
			handler: config.handler ?? this.config.handler
		};
	}

	getLevel(): LogLevel {
		return this.config.level;
	}

	setLevel(level: LogLevel): void {
		this.config.level = level;
	}

	/**
	 * Checks whether a message at the given level would be emitted.
	 * Callers use this to skip building large payloads such as command text.
	 */
	isEnabled(level: LogLevel): boolean {
		return this.config.level !== LogLevel.OFF && level >= this.config.level;
	}

	private defaultHandler(entry: LogEntry): void {
		if (!this.config.console) return;

		const formatted = this.config.formatter(entry);

		switch (entry.level) {
			case LogLevel.ERROR:
				console.error(formatted);
				break;
			case LogLevel.WARN:
				console.warn(formatted);
				break;
			case LogLevel.DEBUG:
				console.debug(formatted);
				break;
			default:
				console.log(formatted);
				break;
		}
	}

	private log(level: LogLevel, message: string, context?: string, data?: LogData): void {
		if (!this.isEnabled(level)) return;

		this.config.handler({
			timestamp: new Date(),
			level,
			message,
			context,
			data
		});
	}

	debug(message: string, context?: string, data?: LogData): void {
		this.log(LogLevel.DEBUG, message, context, data);
	}

	info(message: string, context?: string, data?: LogData): void {
		this.log(LogLevel.INFO, message, context, data);
	}

	warn(message: string, context?: string, data?: LogData): void {
		this.log(LogLevel.WARN, message, context, data);
	}

	error(message: string, context?: string, data?: LogData): void {
		this.log(LogLevel.ERROR, message, context, data);
	}
}

/**
 * Global logger instance. Data sources adjust its level from their settings.
 */
export const globalLogger = new Logger();

/**
 * A logger bound to one context label.
 */
export interface ContextLogger {
	readonly context?: string;
	isDebugEnabled(): boolean;
	debug(message: string, data?: LogData): void;
	info(message: string, data?: LogData): void;
	warn(message: string, data?: LogData): void;
	error(message: string, data?: LogData): void;
}

/**
 * Convenience function to get a logger with a specific context.
 */
export function getLogger(context?: string): ContextLogger {
	return {
		context,
		isDebugEnabled: () => globalLogger.isEnabled(LogLevel.DEBUG),
		debug: (message: string, data?: LogData) => globalLogger.debug(message, context, data),
		info: (message: string, data?: LogData) => globalLogger.info(message, context, data),
		warn: (message: string, data?: LogData) => globalLogger.warn(message, context, data),
		error: (message: string, data?: LogData) => globalLogger.error(message, context, data)
	};
}
