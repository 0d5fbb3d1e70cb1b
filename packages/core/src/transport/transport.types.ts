/**
 * Transport Types
 */

import type { Dispatcher } from "undici";
import type { Logger } from "../logging";
import type { InteractionRecorder } from "../recording";

/**
 * Supported HTTP methods
 */
export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE" | "HEAD" | "OPTIONS";

export const HTTP_METHODS: readonly HttpMethod[] = ["GET", "POST", "PUT", "DELETE", "HEAD", "OPTIONS"];

/**
 * JSON value accepted as a request body
 */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/**
 * Query parameter values (stringified on the wire)
 */
export type QueryParams = Record<string, string | number | boolean>;

/**
 * Raw form payload: a pre-encoded string or fields to urlencode
 */
export type FormPayload = string | Record<string, string>;

/**
 * Full description of a single request
 */
export interface RequestSpec {
	method: HttpMethod;
	/** Path relative to the base URL; leading slashes are ignored */
	endpoint: string;
	query?: QueryParams;
	/** JSON body (sent as application/json) */
	body?: JsonValue;
	/** Form body, mutually exclusive with body */
	form?: FormPayload;
	headers?: Record<string, string>;
}

/**
 * Options for GET/HEAD/OPTIONS
 */
export interface QueryRequestOptions {
	query?: QueryParams;
	headers?: Record<string, string>;
}

/**
 * Options for POST/PUT
 */
export interface BodyRequestOptions {
	query?: QueryParams;
	body?: JsonValue;
	form?: FormPayload;
	headers?: Record<string, string>;
}

/**
 * Options for DELETE
 */
export interface DeleteRequestOptions {
	query?: QueryParams;
	headers?: Record<string, string>;
}

/**
 * Response returned to the caller. Frozen; the transport keeps no reference.
 */
export interface TransportResponse {
	readonly statusCode: number;
	/** Header names are lower-case */
	readonly headers: Readonly<Record<string, string>>;
	readonly bodyText: string;
	/** Duration of the final attempt */
	readonly elapsedSeconds: number;
	/** URL of the final response (after redirects) */
	readonly finalUrl: string;
	/** Number of attempts made, 1 when no retry happened */
	readonly attempts: number;
}

/**
 * Delay function used between retries
 */
export type SleepFunction = (ms: number) => Promise<void>;

/**
 * HTTP transport options
 */
export interface HttpTransportOptions {
	/** Base URL every endpoint is joined to */
	baseUrl: string;
	/** Per-attempt timeout in seconds (default: 10) */
	timeout?: number;
	/** Retries after the first attempt (default: 3) */
	maxRetries?: number;
	/** Exponential backoff factor in seconds (default: 0.3) */
	backoffFactor?: number;
	/** Statuses worth retrying (default: 429, 500, 502, 503, 504) */
	retryableStatuses?: Iterable<number>;
	/** Methods whose retryable statuses are retried (default: all) */
	retryableMethods?: Iterable<HttpMethod>;
	/** Maximum pooled connections per origin (default: 10) */
	poolSize?: number;
	/** Headers sent with every request (request headers win) */
	defaultHeaders?: Record<string, string>;
	logger?: Logger;
	/** Records every exchange */
	recorder?: InteractionRecorder;
	/** Backoff delay implementation (default: timer based) */
	sleep?: SleepFunction;
	/** Connection pool to use instead of a private one; closed with the transport */
	dispatcher?: Dispatcher;
}
