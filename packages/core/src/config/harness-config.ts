/**
 * Harness Configuration
 *
 * Resolves run settings from environment variables, with explicit
 * overrides (e.g. a --base-url command-line flag) taking precedence.
 */

import { ConfigError } from "../errors";
import { LOG_LEVELS, type LogLevel } from "../logging";

export const DEFAULT_BASE_URL = "https://jsonplaceholder.typicode.com";

/**
 * Environment variable names
 */
export const ENV = {
	baseUrl: "RESTPROBE_BASE_URL",
	timeout: "RESTPROBE_TIMEOUT",
	maxRetries: "RESTPROBE_MAX_RETRIES",
	backoffFactor: "RESTPROBE_BACKOFF_FACTOR",
	logLevel: "RESTPROBE_LOG_LEVEL",
	logDir: "RESTPROBE_LOG_DIR",
} as const;

export interface HarnessConfig {
	baseUrl: string;
	/** Per-attempt timeout in seconds */
	timeout: number;
	maxRetries: number;
	backoffFactor: number;
	/** Console log level */
	logLevel: LogLevel;
	/** Root directory for run log files; no file logging when unset */
	logDir?: string;
}

type Env = Record<string, string | undefined>;

function readNumber(env: Env, name: string, fallback: number, integer: boolean): number {
	const raw = env[name];
	if (raw === undefined || raw.trim() === "") {
		return fallback;
	}
	const value = Number(raw);
	if (!Number.isFinite(value) || value < 0 || (integer && !Number.isInteger(value))) {
		const expected = integer ? "a non-negative integer" : "a non-negative number";
		throw new ConfigError(`${name} must be ${expected}, got "${raw}"`);
	}
	return value;
}

function readLogLevel(env: Env, name: string, fallback: LogLevel): LogLevel {
	const raw = env[name];
	if (raw === undefined || raw.trim() === "") {
		return fallback;
	}
	const level = LOG_LEVELS.find((l) => l === raw.trim().toLowerCase());
	if (!level) {
		throw new ConfigError(`${name} must be one of ${LOG_LEVELS.join(", ")}, got "${raw}"`);
	}
	return level;
}

/**
 * Load the harness configuration.
 *
 * @param env - Environment to read (default: process.env)
 * @param overrides - Values that win over the environment
 */
export function loadHarnessConfig(env: Env = process.env, overrides: Partial<HarnessConfig> = {}): HarnessConfig {
	const config: HarnessConfig = {
		baseUrl: overrides.baseUrl ?? (env[ENV.baseUrl]?.trim() || DEFAULT_BASE_URL),
		timeout: overrides.timeout ?? readNumber(env, ENV.timeout, 10, false),
		maxRetries: overrides.maxRetries ?? readNumber(env, ENV.maxRetries, 3, true),
		backoffFactor: overrides.backoffFactor ?? readNumber(env, ENV.backoffFactor, 0.3, false),
		logLevel: overrides.logLevel ?? readLogLevel(env, ENV.logLevel, "info"),
		logDir: overrides.logDir ?? (env[ENV.logDir]?.trim() || undefined),
	};

	if (config.timeout <= 0) {
		throw new ConfigError(`timeout must be greater than 0, got ${config.timeout}`);
	}
	return config;
}

/**
 * Read a "--name=value" or "--name value" flag from command-line arguments
 */
export function readFlag(argv: readonly string[], name: string): string | undefined {
	const flag = `--${name}`;
	for (let i = 0; i < argv.length; i++) {
		const arg = argv[i];
		if (arg === flag) {
			const next = argv[i + 1];
			return next !== undefined && !next.startsWith("--") ? next : undefined;
		}
		if (arg.startsWith(`${flag}=`)) {
			return arg.slice(flag.length + 1);
		}
	}
	return undefined;
}
