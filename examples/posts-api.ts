/**
 * Posts API Example
 *
 * Runs a few checks against a JSON posts service and writes Allure results.
 *
 *   npm run example -- --base-url=http://localhost:3000
 *
 * Settings come from RESTPROBE_* environment variables; --base-url wins.
 */

import { fileURLToPath } from "node:url";
import { AllureReporter } from "@restprobe/reporter-allure";
import {
	CompositeReporter,
	ConsoleReporter,
	createLogger,
	HttpTransport,
	loadHarnessConfig,
	loadSchema,
	logSeparator,
	readFlag,
	ResponseValidator,
	resolveRunLogPath,
	summarize,
	type TestCaseMetadata,
	type TestCaseRecord,
	TestCaseRecorder,
} from "restprobe";

const config = loadHarnessConfig(process.env, { baseUrl: readFlag(process.argv.slice(2), "base-url") });
const logger = createLogger({
	console: config.logLevel,
	file: config.logDir ? { path: resolveRunLogPath(config.logDir) } : undefined,
});
const postSchema = loadSchema(fileURLToPath(new URL("../schemas/post.schema.json", import.meta.url)));

type CaseBody = (transport: HttpTransport, validator: ResponseValidator) => Promise<void>;

async function runCase(name: string, metadata: TestCaseMetadata, body: CaseBody): Promise<TestCaseRecord> {
	logSeparator(logger, name);
	const recorder = new TestCaseRecorder(name, metadata);
	const transport = new HttpTransport({
		baseUrl: config.baseUrl,
		timeout: config.timeout,
		maxRetries: config.maxRetries,
		backoffFactor: config.backoffFactor,
		logger: logger.child("transport"),
		recorder: recorder.interactions,
	});
	const validator = new ResponseValidator({ logger: logger.child("validator"), assertions: recorder.assertions });

	try {
		await body(transport, validator);
		return recorder.finish();
	} catch (error) {
		return recorder.finish(error);
	} finally {
		await transport.close();
	}
}

async function main(): Promise<void> {
	const reporter = new CompositeReporter([
		new ConsoleReporter({ verbose: true }),
		new AllureReporter({ defaultEpic: "Posts API", environmentInfo: { baseUrl: config.baseUrl } }),
	]);

	const records = [
		await runCase("List posts", { feature: "Posts", severity: "critical" }, async (transport, validator) => {
			const response = await transport.get("/posts");
			validator.assertStatus(response, 200);
			validator.assertMinArrayLength(validator.parseJson(response), 1);
		}),
		await runCase("Read one post", { feature: "Posts", tags: ["smoke"] }, async (transport, validator) => {
			const response = await transport.get("/posts/1");
			validator.assertStatus(response, 200);
			const post = validator.parseJson(response);
			validator.validateSchema(post, postSchema);
			validator.assertFieldEquals(post, "id", 1);
			validator.assertFieldType(post, "title", "string");
		}),
		await runCase("Create a post", { feature: "Posts" }, async (transport, validator) => {
			const response = await transport.post("/posts", { body: { title: "hello", body: "first post", userId: 1 } });
			validator.assertStatus(response, 201);
			validator.assertFieldEquals(validator.parseJson(response), "title", "hello");
		}),
	];

	for (const record of records) {
		reporter.onTestCaseComplete(record);
	}
	const summary = summarize(records, "Posts API");
	reporter.onComplete(summary);
	process.exitCode = summary.passed ? 0 : 1;
}

main()
	.catch((error: unknown) => {
		logger.error(error instanceof Error ? (error.stack ?? error.message) : String(error));
		process.exitCode = 1;
	})
	.finally(() => logger.close());
