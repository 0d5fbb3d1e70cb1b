/**
 * Logger Types
 *
 * The transport and the validator only depend on the Logger interface.
 * Sinks, levels and file placement are decided by whoever creates the logger.
 */

/**
 * Log levels in increasing severity
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/**
 * Leveled logging capability injected into harness components
 */
export interface Logger {
	/** Name printed with every line */
	readonly name: string;

	debug(message: string): void;
	info(message: string): void;
	warn(message: string): void;
	error(message: string): void;

	/** Create a logger writing to the same sinks under another name */
	child(name: string): Logger;
}

/**
 * Single log line before formatting
 */
export interface LogEntry {
	timestamp: Date;
	level: LogLevel;
	name: string;
	message: string;
}

/**
 * Log destination
 */
export interface LogSink {
	/** Lowest level this sink accepts */
	readonly level: LogLevel;
	write(entry: LogEntry): void;
	close?(): void;
}
