/**
 * Run log placement: <root>/Logs/YYYY-MM-DD/run_HHMMSS.log
 */

import * as path from "node:path";

function pad(value: number, width = 2): string {
	return String(value).padStart(width, "0");
}

/**
 * Build the per-run log file path for the given moment (local time)
 */
export function resolveRunLogPath(root: string, now: Date = new Date()): string {
	const day = `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
	const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
	return path.join(root, "Logs", day, `run_${time}.log`);
}

/**
 * Format a timestamp as "YYYY-MM-DD HH:mm:ss,SSS" (local time)
 */
export function formatTimestamp(date: Date): string {
	const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
	const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
	return `${day} ${time},${pad(date.getMilliseconds(), 3)}`;
}
