/**
 * HTTP Transport
 *
 * Retrying HTTP client bound to one base URL. Owns a private undici
 * connection pool for its whole lifetime; call close() to release it.
 */

import { Agent, type Dispatcher, fetch, type Response } from "undici";
import { ConfigError, TransportError } from "../errors";
import { type Logger, noopLogger } from "../logging";
import type { InteractionRecorder } from "../recording";
import { backoffDelay, createRetryPolicy, hasRetriesLeft, isRetryableResponse, type RetryPolicy } from "./retry-policy";
import type {
	BodyRequestOptions,
	DeleteRequestOptions,
	FormPayload,
	HttpMethod,
	HttpTransportOptions,
	QueryRequestOptions,
	RequestSpec,
	SleepFunction,
	TransportResponse,
} from "./transport.types";
import { buildUrl, normalizeBaseUrl } from "./url";

/**
 * Outcome of a single attempt. A failure is retryable when it happened on
 * the connection; a request undici refuses to build is not.
 */
type AttemptOutcome =
	| { ok: true; response: Omit<TransportResponse, "attempts"> }
	| { ok: false; error: unknown; retryable: boolean };

interface PreparedRequest {
	method: HttpMethod;
	url: string;
	headers: Record<string, string>;
	body?: string;
}

const defaultSleep: SleepFunction = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

function hasHeader(headers: Record<string, string> | undefined, name: string): boolean {
	if (!headers) {
		return false;
	}
	const lower = name.toLowerCase();
	return Object.keys(headers).some((key) => key.toLowerCase() === lower);
}

function encodeForm(form: FormPayload): string {
	return typeof form === "string" ? form : new URLSearchParams(form).toString();
}

/**
 * undici rejects a network failure with TypeError("fetch failed") carrying
 * the socket error as cause; the per-attempt signal rejects with its reason.
 */
function isConnectionFailure(error: unknown): boolean {
	if (!(error instanceof Error)) {
		return false;
	}
	if (error.name === "TimeoutError" || error.name === "AbortError") {
		return true;
	}
	return error instanceof TypeError && error.message === "fetch failed" && error.cause !== undefined;
}

function describeError(error: unknown): string {
	if (error instanceof Error) {
		const cause = error.cause instanceof Error ? ` (${error.cause.message})` : "";
		return `${error.message}${cause}`;
	}
	return String(error);
}

/**
 * HTTP Transport
 *
 * @example
 * ```typescript
 * const transport = new HttpTransport({ baseUrl: "https://jsonplaceholder.typicode.com" });
 * const response = await transport.get("/posts", { query: { userId: 1 } });
 * await transport.close();
 * ```
 */
export class HttpTransport {
	readonly baseUrl: string;
	/** Per-attempt timeout in seconds */
	readonly timeout: number;
	readonly retryPolicy: RetryPolicy;

	private readonly dispatcher: Dispatcher;
	private readonly defaultHeaders: Record<string, string>;
	private readonly logger: Logger;
	private readonly recorder?: InteractionRecorder;
	private readonly sleep: SleepFunction;
	private closed = false;

	constructor(options: HttpTransportOptions) {
		if (typeof options.baseUrl !== "string" || options.baseUrl.trim() === "") {
			throw new ConfigError("baseUrl must be a non-empty string");
		}
		const timeout = options.timeout ?? 10;
		if (!Number.isFinite(timeout) || timeout <= 0) {
			throw new ConfigError(`timeout must be a positive number of seconds, got ${timeout}`);
		}

		this.baseUrl = normalizeBaseUrl(options.baseUrl);
		this.timeout = timeout;
		this.retryPolicy = createRetryPolicy({
			maxRetries: options.maxRetries,
			backoffFactor: options.backoffFactor,
			retryableStatuses: options.retryableStatuses,
			retryableMethods: options.retryableMethods,
		});
		this.dispatcher = options.dispatcher ?? new Agent({ connections: options.poolSize ?? 10 });
		this.defaultHeaders = { ...options.defaultHeaders };
		this.logger = options.logger ?? noopLogger;
		this.recorder = options.recorder;
		this.sleep = options.sleep ?? defaultSleep;

		this.logger.info(`HttpTransport initialized with base URL: ${this.baseUrl}`);
	}

	/**
	 * Whether close() has been called
	 */
	get isClosed(): boolean {
		return this.closed;
	}

	async get(endpoint: string, options: QueryRequestOptions = {}): Promise<TransportResponse> {
		return this.request({ method: "GET", endpoint, ...options });
	}

	async post(endpoint: string, options: BodyRequestOptions = {}): Promise<TransportResponse> {
		return this.request({ method: "POST", endpoint, ...options });
	}

	async put(endpoint: string, options: BodyRequestOptions = {}): Promise<TransportResponse> {
		return this.request({ method: "PUT", endpoint, ...options });
	}

	async delete(endpoint: string, options: DeleteRequestOptions = {}): Promise<TransportResponse> {
		return this.request({ method: "DELETE", endpoint, ...options });
	}

	async head(endpoint: string, options: QueryRequestOptions = {}): Promise<TransportResponse> {
		return this.request({ method: "HEAD", endpoint, ...options });
	}

	async options(endpoint: string, options: QueryRequestOptions = {}): Promise<TransportResponse> {
		return this.request({ method: "OPTIONS", endpoint, ...options });
	}

	/**
	 * Send a request, retrying per the retry policy.
	 *
	 * Resolves with the first non-retryable response, or with the last
	 * response once retries are exhausted. Rejects with TransportError when
	 * no attempt ever produced a response, and at once when the request
	 * itself is malformed (unparseable URL, invalid header).
	 */
	async request(spec: RequestSpec): Promise<TransportResponse> {
		const prepared = this.prepare(spec);
		const { method, url } = prepared;

		if (this.closed) {
			throw new TransportError("Transport is closed", { method, url });
		}

		const params = spec.query ? ` | Params: ${JSON.stringify(spec.query)}` : "";
		this.logger.debug(`Request: ${method} ${url}${params}`);
		const interactionId = this.recorder?.startInteraction({ method, url });

		let attempts = 0;
		while (true) {
			attempts++;
			const retriesUsed = attempts - 1;
			const outcome = await this.attempt(prepared);

			let reason: string;
			if (outcome.ok) {
				const { statusCode } = outcome.response;
				const retryable = isRetryableResponse(this.retryPolicy, method, statusCode);
				if (!retryable || !hasRetriesLeft(this.retryPolicy, retriesUsed)) {
					const response: TransportResponse = Object.freeze({ ...outcome.response, attempts });
					this.logger.debug(
						`Response: ${response.statusCode} | URL: ${response.finalUrl} | Time: ${response.elapsedSeconds.toFixed(2)}s`,
					);
					if (interactionId) {
						this.recorder?.completeInteraction(interactionId, {
							statusCode: response.statusCode,
							attempts,
							elapsedSeconds: response.elapsedSeconds,
						});
					}
					return response;
				}
				reason = `status ${statusCode}`;
			} else {
				if (!outcome.retryable || !hasRetriesLeft(this.retryPolicy, retriesUsed)) {
					const error = TransportError.exhausted(method, url, attempts, outcome.error);
					this.logger.error(error.message);
					if (interactionId) {
						this.recorder?.failInteraction(interactionId, { error: error.message, attempts });
					}
					throw error;
				}
				reason = describeError(outcome.error);
			}

			const delay = backoffDelay(this.retryPolicy, attempts);
			this.logger.warn(
				`Retry ${attempts}/${this.retryPolicy.maxRetries} for ${method} ${url} after ${reason}, waiting ${delay}s`,
			);
			if (delay > 0) {
				await this.sleep(delay * 1000);
			}
		}
	}

	/**
	 * Release pooled connections. Safe to call more than once.
	 */
	async close(): Promise<void> {
		if (this.closed) {
			return;
		}
		this.closed = true;
		await this.dispatcher.close();
		this.logger.info("HttpTransport session closed");
	}

	private prepare(spec: RequestSpec): PreparedRequest {
		const url = buildUrl(this.baseUrl, spec.endpoint, spec.query);
		if (spec.body !== undefined && spec.form !== undefined) {
			throw new TransportError("A request cannot carry both a JSON body and a form payload", {
				method: spec.method,
				url,
			});
		}

		const headers: Record<string, string> = { ...this.defaultHeaders };
		const explicitType = hasHeader(this.defaultHeaders, "content-type") || hasHeader(spec.headers, "content-type");
		let body: string | undefined;

		if (spec.body !== undefined) {
			body = JSON.stringify(spec.body);
			if (!explicitType) {
				headers["content-type"] = "application/json";
			}
		} else if (spec.form !== undefined) {
			body = encodeForm(spec.form);
			if (!explicitType) {
				headers["content-type"] = "application/x-www-form-urlencoded";
			}
		}

		return { method: spec.method, url, headers: { ...headers, ...spec.headers }, body };
	}

	private async attempt(request: PreparedRequest): Promise<AttemptOutcome> {
		const start = performance.now();
		let response: Response;
		try {
			response = await fetch(request.url, {
				method: request.method,
				headers: request.headers,
				body: request.body,
				signal: AbortSignal.timeout(this.timeout * 1000),
				dispatcher: this.dispatcher,
			});
		} catch (error) {
			return { ok: false, error, retryable: isConnectionFailure(error) };
		}

		let bodyText: string;
		try {
			bodyText = await response.text();
		} catch (error) {
			// connection dropped or timed out mid-body
			return { ok: false, error, retryable: true };
		}
		const elapsedSeconds = (performance.now() - start) / 1000;

		const headers: Record<string, string> = {};
		response.headers.forEach((value, key) => {
			headers[key.toLowerCase()] = value;
		});

		return {
			ok: true,
			response: {
				statusCode: response.status,
				headers: Object.freeze(headers),
				bodyText,
				elapsedSeconds,
				finalUrl: response.url || request.url,
			},
		};
	}
}
