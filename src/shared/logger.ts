/**
 * Structured logger
 *
 * TTY: colored human-readable lines with the data object appended as JSON
 * Non-TTY (CI, piped output): JSON Lines
 */

export enum LogLevel {
	DEBUG = 0,
	INFO = 1,
	WARN = 2,
	ERROR = 3,
}

/** Minimal sink so tests can capture output */
export interface LogStream {
	write(chunk: string): unknown;
	isTTY?: boolean;
}

export interface LoggerOptions {
	level?: LogLevel;
	prefix?: string;
	/** Overrides stdout/stderr for every level */
	stream?: LogStream;
}

const LEVEL_NAMES: Record<LogLevel, string> = {
	[LogLevel.DEBUG]: 'DEBUG',
	[LogLevel.INFO]: 'INFO',
	[LogLevel.WARN]: 'WARN',
	[LogLevel.ERROR]: 'ERROR',
};

const LEVEL_COLORS: Record<LogLevel, number> = {
	[LogLevel.DEBUG]: 90,  // gray
	[LogLevel.INFO]:  36,  // cyan
	[LogLevel.WARN]:  33,  // yellow
	[LogLevel.ERROR]: 31,  // red
};

function colorize(text: string, colorCode: number): string {
	return `\x1b[${colorCode}m${text}\x1b[0m`;
}

export class Logger {
	private level: LogLevel;
	private readonly prefix: string;
	private readonly stream: LogStream | undefined;

	constructor(options: LoggerOptions = {}) {
		this.level = options.level ?? LogLevel.INFO;
		this.prefix = options.prefix ?? '';
		this.stream = options.stream;
	}

	/** Child logger, prefixes are joined with ':' */
	withPrefix(prefix: string): Logger {
		return new Logger({
			level: this.level,
			prefix: this.prefix ? `${this.prefix}:${prefix}` : prefix,
			stream: this.stream,
		});
	}

	setLevel(level: LogLevel): void {
		this.level = level;
	}

	isEnabled(level: LogLevel): boolean {
		return level >= this.level;
	}

	private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
		if (level < this.level) return;

		const ts = new Date().toISOString();
		const levelName = LEVEL_NAMES[level];
		// stdout carries the chunk JSONL in the CLI, so logs never go there by default
		const stream = this.stream ?? process.stderr;

		if (stream.isTTY === true) {
			const prefix = this.prefix ? `[${this.prefix}] ` : '';
			const colored = colorize(levelName.padEnd(5), LEVEL_COLORS[level]);
			const extra = data && Object.keys(data).length > 0
				? ' ' + JSON.stringify(data)
				: '';
			stream.write(`${ts} ${colored} ${prefix}${message}${extra}\n`);
		} else {
			const entry: Record<string, unknown> = {
				ts,
				level: levelName,
				...(this.prefix ? { module: this.prefix } : {}),
				msg: message,
				...data,
			};
			stream.write(JSON.stringify(entry) + '\n');
		}
	}

	debug(message: string, data?: Record<string, unknown>): void {
		this.log(LogLevel.DEBUG, message, data);
	}

	info(message: string, data?: Record<string, unknown>): void {
		this.log(LogLevel.INFO, message, data);
	}

	warn(message: string, data?: Record<string, unknown>): void {
		this.log(LogLevel.WARN, message, data);
	}

	error(message: string, data?: Record<string, unknown>): void {
		this.log(LogLevel.ERROR, message, data);
	}
}

/** Parse a level name (case-insensitive), INFO when unknown */
export function parseLogLevel(value: string | undefined): LogLevel {
	switch (value?.toUpperCase()) {
		case 'DEBUG': return LogLevel.DEBUG;
		case 'INFO':  return LogLevel.INFO;
		case 'WARN':  return LogLevel.WARN;
		case 'ERROR': return LogLevel.ERROR;
		default:      return LogLevel.INFO;
	}
}

export function getLogLevelFromEnv(): LogLevel {
	return parseLogLevel(process.env.LOG_LEVEL);
}

/** Default logger, level from LOG_LEVEL */
export function createDefaultLogger(prefix?: string): Logger {
	return new Logger({
		level: getLogLevelFromEnv(),
		prefix,
	});
}
