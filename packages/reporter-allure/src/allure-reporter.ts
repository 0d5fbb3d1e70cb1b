/**
 * Allure Reporter
 *
 * Writes recorded test cases as Allure results.
 */

import type { TestResult } from "allure-js-commons";
import type { RunSummary, TestCaseRecord, TestReporter } from "restprobe";
import { convertTestCase, convertToContainer } from "./result-converter";
import type { AllureReporterOptions } from "./types";
import { FileSystemWriter } from "./writers/file-writer";
import type { AllureWriter } from "./writers/writer";

export class AllureReporter implements TestReporter {
	readonly name = "allure";
	private readonly options: AllureReporterOptions;
	private readonly writer: AllureWriter;
	private results: TestResult[] = [];

	constructor(options: AllureReporterOptions = {}) {
		this.options = {
			resultsDir: "allure-results",
			...options,
		};
		this.writer = options.writer ?? new FileSystemWriter(this.options.resultsDir ?? "allure-results");
	}

	getOptions(): AllureReporterOptions {
		return this.options;
	}

	/**
	 * Convert and write one test case, returning the Allure result
	 */
	report(record: TestCaseRecord): TestResult {
		const result = convertTestCase(record, this.options, this.writer);
		this.writer.writeTestResult(result);
		this.results.push(result);
		return result;
	}

	onTestCaseComplete(record: TestCaseRecord): void {
		this.report(record);
	}

	/**
	 * Write the container for everything reported so far and the environment info
	 */
	onComplete(summary: RunSummary): void {
		const uuids = this.results.map((r) => r.uuid);
		this.writer.writeContainer(convertToContainer(summary.name ?? "restprobe", uuids));
		if (this.options.environmentInfo) {
			this.writer.writeEnvironment(this.options.environmentInfo);
		}
		this.results = [];
	}

	/**
	 * Results reported since the last onComplete
	 */
	getResults(): TestResult[] {
		return [...this.results];
	}
}
