/**
 * Retry Policy
 *
 * Immutable description of when and how long the transport retries.
 */

import { ConfigError } from "../errors";
import { HTTP_METHODS, type HttpMethod } from "./transport.types";

/**
 * Default HTTP status codes that trigger a retry.
 */
export const DEFAULT_RETRYABLE_STATUSES: readonly number[] = [
	429, // Too Many Requests
	500, // Internal Server Error
	502, // Bad Gateway
	503, // Service Unavailable
	504, // Gateway Timeout
];

export interface RetryPolicy {
	readonly maxRetries: number;
	/** Seconds; the n-th retry waits backoffFactor * 2^(n-1) */
	readonly backoffFactor: number;
	readonly retryableStatuses: ReadonlySet<number>;
	readonly retryableMethods: ReadonlySet<HttpMethod>;
}

export interface RetryPolicyOptions {
	maxRetries?: number;
	backoffFactor?: number;
	retryableStatuses?: Iterable<number>;
	retryableMethods?: Iterable<HttpMethod>;
}

/**
 * Create a frozen retry policy, filling in defaults
 */
export function createRetryPolicy(options: RetryPolicyOptions = {}): RetryPolicy {
	const maxRetries = options.maxRetries ?? 3;
	const backoffFactor = options.backoffFactor ?? 0.3;

	if (!Number.isInteger(maxRetries) || maxRetries < 0) {
		throw new ConfigError(`maxRetries must be a non-negative integer, got ${maxRetries}`);
	}
	if (!Number.isFinite(backoffFactor) || backoffFactor < 0) {
		throw new ConfigError(`backoffFactor must be a non-negative number, got ${backoffFactor}`);
	}

	return Object.freeze({
		maxRetries,
		backoffFactor,
		retryableStatuses: new Set(options.retryableStatuses ?? DEFAULT_RETRYABLE_STATUSES),
		retryableMethods: new Set(options.retryableMethods ?? HTTP_METHODS),
	});
}

/**
 * Backoff delay before the given retry, in seconds.
 * retryIndex starts at 1 for the first retry.
 */
export function backoffDelay(policy: RetryPolicy, retryIndex: number): number {
	if (retryIndex < 1 || policy.backoffFactor === 0) {
		return 0;
	}
	return policy.backoffFactor * 2 ** (retryIndex - 1);
}

/**
 * Whether a received status should be retried for the method
 */
export function isRetryableResponse(policy: RetryPolicy, method: HttpMethod, statusCode: number): boolean {
	return policy.retryableStatuses.has(statusCode) && policy.retryableMethods.has(method);
}

/**
 * Whether another attempt is allowed after `retriesUsed` retries
 */
export function hasRetriesLeft(policy: RetryPolicy, retriesUsed: number): boolean {
	return retriesUsed < policy.maxRetries;
}
