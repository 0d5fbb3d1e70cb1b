/**
 * Logger
 *
 * Console and file sinks behind the Logger interface. Line format:
 * "YYYY-MM-DD HH:mm:ss,SSS - <name> - <LEVEL> - <message>".
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { formatTimestamp } from "./log-path";
import type { LogEntry, Logger, LogLevel, LogSink } from "./logger.types";
import { LOG_LEVELS } from "./logger.types";

const RESET = "\x1b[0m";
const GREEN = "\x1b[32m";

const LEVEL_COLORS: Record<LogLevel, string> = {
	debug: "\x1b[36m",
	info: "\x1b[1m",
	warn: "\x1b[33m",
	error: "\x1b[31m",
};

/**
 * Check whether an entry level passes a sink threshold
 */
export function isLevelEnabled(threshold: LogLevel, level: LogLevel): boolean {
	return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}

/**
 * Format a log entry as a plain text line (no trailing newline)
 */
export function formatEntry(entry: LogEntry): string {
	return `${formatTimestamp(entry.timestamp)} - ${entry.name} - ${entry.level.toUpperCase()} - ${entry.message}`;
}

/**
 * Console sink: coloured lines on stdout
 */
export class ConsoleSink implements LogSink {
	readonly level: LogLevel;
	private readonly colors: boolean;
	private readonly stream: NodeJS.WritableStream;

	constructor(options?: { level?: LogLevel; colors?: boolean; stream?: NodeJS.WritableStream }) {
		this.level = options?.level ?? "info";
		this.colors = options?.colors ?? true;
		this.stream = options?.stream ?? process.stdout;
	}

	write(entry: LogEntry): void {
		if (!this.colors) {
			this.stream.write(`${formatEntry(entry)}\n`);
			return;
		}
		const time = `${GREEN}${formatTimestamp(entry.timestamp)}${RESET}`;
		const level = `${LEVEL_COLORS[entry.level]}${entry.level.toUpperCase()}${RESET}`;
		this.stream.write(`${time} - ${entry.name} - ${level} - ${entry.message}\n`);
	}
}

/**
 * File sink: appends plain lines to one file per run
 */
export class FileSink implements LogSink {
	readonly level: LogLevel;
	readonly filePath: string;
	private fd: number | undefined;

	constructor(filePath: string, options?: { level?: LogLevel }) {
		this.level = options?.level ?? "debug";
		this.filePath = filePath;
		fs.mkdirSync(path.dirname(filePath), { recursive: true });
		this.fd = fs.openSync(filePath, "a");
	}

	write(entry: LogEntry): void {
		if (this.fd === undefined) {
			return;
		}
		fs.writeSync(this.fd, `${formatEntry(entry)}\n`, null, "utf-8");
	}

	close(): void {
		if (this.fd !== undefined) {
			fs.closeSync(this.fd);
			this.fd = undefined;
		}
	}
}

/**
 * Memory sink: keeps entries for inspection
 */
export class MemorySink implements LogSink {
	readonly level: LogLevel;
	readonly entries: LogEntry[] = [];

	constructor(options?: { level?: LogLevel }) {
		this.level = options?.level ?? "debug";
	}

	write(entry: LogEntry): void {
		this.entries.push(entry);
	}

	/**
	 * Messages logged at the given level
	 */
	messages(level?: LogLevel): string[] {
		return this.entries.filter((e) => level === undefined || e.level === level).map((e) => e.message);
	}
}

/**
 * Logger fanning entries out to a set of sinks
 */
export class SinkLogger implements Logger {
	readonly name: string;
	private readonly sinks: LogSink[];

	constructor(name: string, sinks: LogSink[]) {
		this.name = name;
		this.sinks = sinks;
	}

	debug(message: string): void {
		this.log("debug", message);
	}

	info(message: string): void {
		this.log("info", message);
	}

	warn(message: string): void {
		this.log("warn", message);
	}

	error(message: string): void {
		this.log("error", message);
	}

	child(name: string): Logger {
		return new SinkLogger(name, this.sinks);
	}

	/**
	 * Close every sink that holds a resource
	 */
	close(): void {
		for (const sink of this.sinks) {
			sink.close?.();
		}
	}

	private log(level: LogLevel, message: string): void {
		const entry: LogEntry = { timestamp: new Date(), level, name: this.name, message };
		for (const sink of this.sinks) {
			if (isLevelEnabled(sink.level, level)) {
				sink.write(entry);
			}
		}
	}
}

/**
 * Logger factory options
 */
export interface LoggerOptions {
	/** Logger name (default: "restprobe") */
	name?: string;
	/** Console threshold, or false to disable console output (default: "info") */
	console?: LogLevel | false;
	/** Disable ANSI colours on the console */
	colors?: boolean;
	/** Append lines to this file */
	file?: { path: string; level?: LogLevel };
	/** Extra sinks */
	sinks?: LogSink[];
}

/**
 * Create a logger with console and optional file output.
 * The caller owns the returned logger and closes it when the run ends.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ file: { path: resolveRunLogPath(process.cwd()) } });
 * const transport = new HttpTransport({ baseUrl, logger: logger.child("transport") });
 * // ...
 * logger.close();
 * ```
 */
export function createLogger(options: LoggerOptions = {}): SinkLogger {
	const sinks: LogSink[] = [];
	const consoleLevel = options.console ?? "info";
	if (consoleLevel !== false) {
		sinks.push(new ConsoleSink({ level: consoleLevel, colors: options.colors }));
	}
	if (options.file) {
		sinks.push(new FileSink(options.file.path, { level: options.file.level }));
	}
	if (options.sinks) {
		sinks.push(...options.sinks);
	}
	const logger = new SinkLogger(options.name ?? "restprobe", sinks);
	if (options.file) {
		logger.info(`Logger initialized. Log file: ${options.file.path}`);
	}
	return logger;
}

/**
 * Logger that discards everything
 */
export const noopLogger: Logger = {
	name: "noop",
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
	child: () => noopLogger,
};

/**
 * Write a visual separator between test executions
 */
export function logSeparator(logger: Logger, title = "NEW TEST EXECUTION"): void {
	const separator = "=".repeat(80);
	logger.info(`\n${separator}\n${title}\n${separator}\n`);
}
