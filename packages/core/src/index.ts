/**
 * restprobe
 *
 * Test harness core for JSON HTTP APIs: a retrying transport, a response
 * validator, and recording of what happened during each test case.
 *
 * For reporters:
 * - @restprobe/reporter-allure - Allure result files
 *
 * @example
 * ```typescript
 * import { HttpTransport, ResponseValidator, loadSchema } from "restprobe";
 *
 * const transport = new HttpTransport({ baseUrl: "https://jsonplaceholder.typicode.com" });
 * const validator = new ResponseValidator();
 *
 * const response = await transport.get("/posts/1");
 * validator.assertStatus(response, 200);
 * const post = validator.parseJson(response);
 * validator.validateSchema(post, loadSchema("schemas/post.schema.json"));
 * validator.assertFieldEquals(post, "id", 1);
 *
 * await transport.close();
 * ```
 */

// Configuration (HarnessConfig, loadHarnessConfig)
export * from "./config";
// Errors (TransportError, ValidationError and its kinds, ...)
export * from "./errors";
// Logging (Logger, createLogger, resolveRunLogPath)
export * from "./logging";
// Recording (InteractionRecorder, AssertionCollector, TestCaseRecorder, reporters)
export * from "./recording";
// Transport (HttpTransport, RetryPolicy, buildUrl)
export * from "./transport";
// Validation (ResponseValidator, SchemaEngine, ValueKind)
export * from "./validation";
