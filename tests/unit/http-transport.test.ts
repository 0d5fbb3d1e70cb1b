/**
 * HTTP Transport Tests
 *
 * Runs against in-process servers; sleep is injected so backoff is observed
 * without waiting.
 */

import {
	ConfigError,
	createLogger,
	HttpTransport,
	type HttpTransportOptions,
	InteractionRecorder,
	MemorySink,
	type SleepFunction,
	TransportError,
} from "restprobe";
import { afterEach, describe, expect, it, vi } from "vitest";
import {
	sendJson,
	startScriptedServer,
	startSilentServer,
	startTestServer,
	type TestServer,
	unusedBaseUrl,
} from "../helpers/test-server";

describe("HttpTransport", () => {
	let server: TestServer | undefined;
	let transport: HttpTransport | undefined;

	const createSleep = () => vi.fn<SleepFunction>(async () => {});

	const connect = (baseUrl: string, options: Omit<HttpTransportOptions, "baseUrl"> = {}): HttpTransport => {
		transport = new HttpTransport({ baseUrl, ...options });
		return transport;
	};

	afterEach(async () => {
		await transport?.close();
		await server?.close();
		transport = undefined;
		server = undefined;
	});

	describe("constructor", () => {
		it("should strip trailing slashes from the base URL", () => {
			expect(connect("http://127.0.0.1:1/api/").baseUrl).toBe("http://127.0.0.1:1/api");
		});

		it("should default to a 10 second timeout", () => {
			const t = connect("http://127.0.0.1:1");
			expect(t.timeout).toBe(10);
			expect(t.retryPolicy.maxRetries).toBe(3);
			expect(t.retryPolicy.backoffFactor).toBe(0.3);
		});

		it("should reject an empty base URL", () => {
			expect(() => new HttpTransport({ baseUrl: " " })).toThrow(ConfigError);
		});

		it("should reject a non-positive timeout", () => {
			expect(() => new HttpTransport({ baseUrl: "http://127.0.0.1:1", timeout: 0 })).toThrow(
				"timeout must be a positive number of seconds, got 0",
			);
		});

		it("should reject a negative retry count", () => {
			expect(() => new HttpTransport({ baseUrl: "http://127.0.0.1:1", maxRetries: -1 })).toThrow(ConfigError);
		});
	});

	describe("requests", () => {
		it("should return a frozen response", async () => {
			server = await startTestServer((_request, res) => {
				sendJson(res, 200, { id: 1 }, { "X-Request-Id": "req-7" });
			});
			const response = await connect(server.baseUrl).get("/posts/1");

			expect(response.statusCode).toBe(200);
			expect(response.bodyText).toBe('{"id":1}');
			expect(response.headers["x-request-id"]).toBe("req-7");
			expect(response.headers["content-type"]).toBe("application/json; charset=utf-8");
			expect(response.finalUrl).toBe(`${server.baseUrl}/posts/1`);
			expect(response.attempts).toBe(1);
			expect(response.elapsedSeconds).toBeGreaterThanOrEqual(0);
			expect(Object.isFrozen(response)).toBe(true);
		});

		it("should send query parameters", async () => {
			server = await startScriptedServer([200]);
			await connect(server.baseUrl).get("posts", { query: { userId: 1, _sort: "id" } });

			expect(server.requests[0].method).toBe("GET");
			expect(server.requests[0].url).toBe("/posts?userId=1&_sort=id");
		});

		it("should send query parameters on POST and DELETE", async () => {
			server = await startScriptedServer([200]);
			const t = connect(server.baseUrl);

			await t.post("/posts", { query: { dryRun: true }, body: { title: "hello" } });
			await t.delete("/posts/1", { query: { force: 1 } });

			expect(server.requests.map((r) => `${r.method} ${r.url}`)).toEqual([
				"POST /posts?dryRun=true",
				"DELETE /posts/1?force=1",
			]);
		});

		it("should send a JSON body", async () => {
			server = await startScriptedServer([201]);
			await connect(server.baseUrl).post("/posts", { body: { title: "hello", userId: 1 } });

			expect(server.requests[0].headers["content-type"]).toBe("application/json");
			expect(server.requests[0].body).toBe('{"title":"hello","userId":1}');
		});

		it("should send a form body", async () => {
			server = await startScriptedServer([200]);
			await connect(server.baseUrl).put("/posts/1", { form: { title: "two words", userId: "1" } });

			expect(server.requests[0].method).toBe("PUT");
			expect(server.requests[0].headers["content-type"]).toBe("application/x-www-form-urlencoded");
			expect(server.requests[0].body).toBe("title=two+words&userId=1");
		});

		it("should keep an explicit content type", async () => {
			server = await startScriptedServer([200]);
			await connect(server.baseUrl).post("/posts", {
				body: { a: 1 },
				headers: { "Content-Type": "application/vnd.api+json" },
			});

			expect(server.requests[0].headers["content-type"]).toBe("application/vnd.api+json");
		});

		it("should reject a body together with a form", async () => {
			const sleep = createSleep();
			server = await startScriptedServer([200]);
			const request = connect(server.baseUrl, { sleep }).post("/posts", { body: { a: 1 }, form: "a=1" });

			await expect(request).rejects.toThrow(TransportError);
			expect(server.requests).toHaveLength(0);
		});

		it("should merge default headers under request headers", async () => {
			server = await startScriptedServer([200]);
			await connect(server.baseUrl, {
				defaultHeaders: { "x-api-key": "test-key", accept: "application/json" },
			}).get("/posts", { headers: { accept: "text/plain" } });

			expect(server.requests[0].headers["x-api-key"]).toBe("test-key");
			expect(server.requests[0].headers.accept).toBe("text/plain");
		});

		it("should send DELETE, HEAD and OPTIONS", async () => {
			server = await startScriptedServer([200]);
			const t = connect(server.baseUrl);

			await t.delete("/posts/1");
			const head = await t.head("/posts");
			await t.options("/posts");

			expect(server.requests.map((r) => r.method)).toEqual(["DELETE", "HEAD", "OPTIONS"]);
			expect(head.bodyText).toBe("");
		});
	});

	describe("retries", () => {
		it("should retry retryable statuses with exponential backoff", async () => {
			const sleep = createSleep();
			server = await startScriptedServer([503, 503, 200]);
			const response = await connect(server.baseUrl, { backoffFactor: 0.25, sleep }).get("/posts");

			expect(response.statusCode).toBe(200);
			expect(response.attempts).toBe(3);
			expect(server.requests).toHaveLength(3);
			expect(sleep.mock.calls).toEqual([[250], [500]]);
		});

		it("should make maxRetries + 1 attempts when the last one succeeds", async () => {
			server = await startScriptedServer([503, 503, 200]);
			const response = await connect(server.baseUrl, { maxRetries: 2, sleep: createSleep() }).get("/posts");

			expect(response.statusCode).toBe(200);
			expect(response.attempts).toBe(3);
			expect(server.requests).toHaveLength(3);
		});

		it("should return the last response once retries are exhausted", async () => {
			const sleep = createSleep();
			server = await startScriptedServer([500]);
			const response = await connect(server.baseUrl, { maxRetries: 2, backoffFactor: 0.25, sleep }).get("/posts");

			expect(response.statusCode).toBe(500);
			expect(response.attempts).toBe(3);
			expect(response.bodyText).toBe('{"attempt":3,"method":"GET"}');
			expect(sleep.mock.calls).toEqual([[250], [500]]);
		});

		it("should wait 0.3, 0.6 and 1.2 seconds with the default factor", async () => {
			const sleep = createSleep();
			server = await startScriptedServer([503]);
			const response = await connect(server.baseUrl, { sleep }).get("/posts");

			expect(response.attempts).toBe(4);
			const waits = sleep.mock.calls.map(([ms]) => ms);
			expect(waits).toHaveLength(3);
			expect(waits[0]).toBeCloseTo(300);
			expect(waits[1]).toBeCloseTo(600);
			expect(waits[2]).toBeCloseTo(1200);
		});

		it("should not retry a client error", async () => {
			const sleep = createSleep();
			server = await startScriptedServer([404]);
			const response = await connect(server.baseUrl, { sleep }).get("/posts/9999");

			expect(response.statusCode).toBe(404);
			expect(response.attempts).toBe(1);
			expect(sleep).not.toHaveBeenCalled();
		});

		it("should return a 400 on POST after one attempt", async () => {
			server = await startScriptedServer([400]);
			const response = await connect(server.baseUrl, { sleep: createSleep() }).post("/posts", { body: {} });

			expect(response.statusCode).toBe(400);
			expect(server.requests).toHaveLength(1);
		});

		it("should retry POST by default", async () => {
			server = await startScriptedServer([503, 201]);
			const response = await connect(server.baseUrl, { sleep: createSleep() }).post("/posts", { body: {} });

			expect(response.statusCode).toBe(201);
			expect(response.attempts).toBe(2);
		});

		it("should not retry statuses for methods outside the method set", async () => {
			server = await startScriptedServer([503, 201]);
			const response = await connect(server.baseUrl, {
				retryableMethods: ["GET"],
				sleep: createSleep(),
			}).post("/posts", { body: {} });

			expect(response.statusCode).toBe(503);
			expect(response.attempts).toBe(1);
		});

		it("should make a single attempt when retries are disabled", async () => {
			server = await startScriptedServer([502, 200]);
			const response = await connect(server.baseUrl, { maxRetries: 0 }).get("/posts");

			expect(response.statusCode).toBe(502);
			expect(server.requests).toHaveLength(1);
		});

		it("should not sleep when the backoff factor is zero", async () => {
			const sleep = createSleep();
			server = await startScriptedServer([429, 200]);
			const response = await connect(server.baseUrl, { backoffFactor: 0, sleep }).get("/posts");

			expect(response.attempts).toBe(2);
			expect(sleep).not.toHaveBeenCalled();
		});

		it("should throw after repeated connection failures", async () => {
			const sleep = createSleep();
			const baseUrl = await unusedBaseUrl();
			const error = await connect(baseUrl, { maxRetries: 2, backoffFactor: 0.25, sleep })
				.get("/posts")
				.catch((e: unknown) => e);

			expect(error).toBeInstanceOf(TransportError);
			if (error instanceof TransportError) {
				expect(error.attempts).toBe(3);
				expect(error.method).toBe("GET");
				expect(error.url).toBe(`${baseUrl}/posts`);
				expect(error.code).toBe("TRANSPORT");
				expect(error.message).toContain(`GET ${baseUrl}/posts failed after 3 attempt(s): `);
				expect(error.cause).toBeInstanceOf(Error);
			}
			expect(sleep.mock.calls).toEqual([[250], [500]]);
		});

		it("should not retry a request with an unparseable URL", async () => {
			const sleep = createSleep();
			const error = await connect("not a url", { sleep })
				.get("/posts")
				.catch((e: unknown) => e);

			expect(error).toBeInstanceOf(TransportError);
			if (error instanceof TransportError) {
				expect(error.attempts).toBe(1);
				expect(error.url).toBe("not a url/posts");
				expect(error.message).toContain("GET not a url/posts failed after 1 attempt(s): ");
			}
			expect(sleep).not.toHaveBeenCalled();
		});

		it("should not retry a request with an invalid header value", async () => {
			const sleep = createSleep();
			server = await startScriptedServer([200]);
			const error = await connect(server.baseUrl, { sleep })
				.get("/posts", { headers: { "x-trace": "a\nb" } })
				.catch((e: unknown) => e);

			expect(error).toBeInstanceOf(TransportError);
			if (error instanceof TransportError) {
				expect(error.attempts).toBe(1);
				expect(error.cause).toBeInstanceOf(TypeError);
			}
			expect(sleep).not.toHaveBeenCalled();
			expect(server.requests).toHaveLength(0);
		});

		it("should retry connection failures for methods outside the method set", async () => {
			const baseUrl = await unusedBaseUrl();
			const error = await connect(baseUrl, { maxRetries: 1, retryableMethods: ["GET"], sleep: createSleep() })
				.post("/posts", { body: {} })
				.catch((e: unknown) => e);

			expect(error).toBeInstanceOf(TransportError);
			if (error instanceof TransportError) {
				expect(error.attempts).toBe(2);
			}
		});

		it("should treat a timeout as a connection failure", async () => {
			server = await startSilentServer();
			const error = await connect(server.baseUrl, { timeout: 0.2, maxRetries: 1, backoffFactor: 0 })
				.get("/slow")
				.catch((e: unknown) => e);

			expect(error).toBeInstanceOf(TransportError);
			if (error instanceof TransportError) {
				expect(error.attempts).toBe(2);
			}
			expect(server.requests).toHaveLength(2);
		});
	});

	describe("close", () => {
		it("should reject requests after close", async () => {
			server = await startScriptedServer([200]);
			const t = connect(server.baseUrl);
			await t.get("/posts");
			await t.close();

			expect(t.isClosed).toBe(true);
			await expect(t.get("/posts")).rejects.toThrow("Transport is closed");
			expect(server.requests).toHaveLength(1);
		});

		it("should allow close to be called twice", async () => {
			const t = connect("http://127.0.0.1:1");
			await t.close();
			await expect(t.close()).resolves.toBeUndefined();
		});
	});

	describe("logging", () => {
		it("should log initialization, requests, retries and responses", async () => {
			const sink = new MemorySink();
			const logger = createLogger({ console: false, sinks: [sink] });
			server = await startScriptedServer([503, 200]);
			const url = `${server.baseUrl}/posts?userId=1`;

			await connect(server.baseUrl, { logger, backoffFactor: 0.25, sleep: createSleep() }).get("/posts", {
				query: { userId: 1 },
			});

			expect(sink.messages("info")).toEqual([`HttpTransport initialized with base URL: ${server.baseUrl}`]);
			expect(sink.messages("warn")).toEqual([`Retry 1/3 for GET ${url} after status 503, waiting 0.25s`]);
			const debug = sink.messages("debug");
			expect(debug[0]).toBe(`Request: GET ${url} | Params: {"userId":1}`);
			expect(debug[1]).toMatch(/^Response: 200 \| URL: .+\/posts\?userId=1 \| Time: \d+\.\d{2}s$/);
		});

		it("should log exhaustion as an error", async () => {
			const sink = new MemorySink();
			const baseUrl = await unusedBaseUrl();
			const t = connect(baseUrl, { logger: createLogger({ console: false, sinks: [sink] }), maxRetries: 0 });

			await expect(t.get("/posts")).rejects.toThrow(TransportError);
			expect(sink.messages("error")).toHaveLength(1);
			expect(sink.messages("error")[0]).toContain(`GET ${baseUrl}/posts failed after 1 attempt(s)`);
		});

		it("should log the session close", async () => {
			const sink = new MemorySink();
			const t = connect("http://127.0.0.1:1", { logger: createLogger({ console: false, sinks: [sink] }) });
			await t.close();

			expect(sink.messages("info")).toContain("HttpTransport session closed");
		});
	});

	describe("recording", () => {
		it("should record a completed interaction with its attempts", async () => {
			const recorder = new InteractionRecorder();
			server = await startScriptedServer([502, 200]);
			await connect(server.baseUrl, { recorder, sleep: createSleep() }).get("/posts/1");

			const [interaction] = recorder.getInteractions();
			expect(interaction).toMatchObject({
				id: "interaction-1",
				method: "GET",
				url: `${server.baseUrl}/posts/1`,
				status: "completed",
				statusCode: 200,
				attempts: 2,
			});
			expect(interaction.finishedAt).toBeGreaterThanOrEqual(interaction.startedAt);
		});

		it("should record a failed interaction", async () => {
			const recorder = new InteractionRecorder();
			const baseUrl = await unusedBaseUrl();
			const error = await connect(baseUrl, { recorder, maxRetries: 1, sleep: createSleep() })
				.delete("/posts/1")
				.catch((e: unknown) => e);

			const [interaction] = recorder.getInteractions();
			expect(interaction.status).toBe("failed");
			expect(interaction.attempts).toBe(2);
			expect(error).toBeInstanceOf(TransportError);
			if (error instanceof TransportError) {
				expect(interaction.error).toBe(error.message);
			}
		});

		it("should record a malformed request as failed after one attempt", async () => {
			const recorder = new InteractionRecorder();
			const error = await connect("not a url", { recorder, sleep: createSleep() })
				.post("/posts", { body: {} })
				.catch((e: unknown) => e);

			const [interaction] = recorder.getInteractions();
			expect(interaction.status).toBe("failed");
			expect(interaction.attempts).toBe(1);
			expect(error).toBeInstanceOf(TransportError);
			if (error instanceof TransportError) {
				expect(interaction.error).toBe(error.message);
			}
		});
	});
});
