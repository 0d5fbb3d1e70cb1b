/**
 * Test Reporter
 *
 * Interface and implementations for reporting recorded test cases.
 */

import type { TestCaseRecord } from "./recording.types";

/**
 * Totals for a finished run
 */
export interface RunSummary {
	name?: string;
	totalTests: number;
	passedTests: number;
	failedTests: number;
	/** Milliseconds between the first start and the last end */
	duration: number;
	passed: boolean;
}

/**
 * Summarize a set of test case records
 */
export function summarize(records: readonly TestCaseRecord[], name?: string): RunSummary {
	const passedTests = records.filter((r) => r.passed).length;
	const start = records.length > 0 ? Math.min(...records.map((r) => r.startTime)) : 0;
	const end = records.length > 0 ? Math.max(...records.map((r) => r.endTime)) : 0;
	return {
		name,
		totalTests: records.length,
		passedTests,
		failedTests: records.length - passedTests,
		duration: end - start,
		passed: passedTests === records.length,
	};
}

/**
 * Test Reporter Interface
 */
export interface TestReporter {
	/** Reporter name */
	readonly name: string;

	/** Called when a test case completes */
	onTestCaseComplete(record: TestCaseRecord): void;

	/** Called when the run completes */
	onComplete?(summary: RunSummary): void;
}

/**
 * Console Reporter
 *
 * Outputs test results to console with formatting.
 */
export class ConsoleReporter implements TestReporter {
	readonly name = "console";
	private verbose: boolean;
	private write: (line: string) => void;

	constructor(options?: { verbose?: boolean; write?: (line: string) => void }) {
		this.verbose = options?.verbose ?? false;
		this.write = options?.write ?? ((line) => console.log(line));
	}

	onTestCaseComplete(record: TestCaseRecord): void {
		const icon = record.passed ? "✅" : "❌";
		const status = record.passed ? "PASSED" : "FAILED";
		this.write(`${icon} ${record.name} - ${status} (${record.endTime - record.startTime}ms)`);

		if (this.verbose) {
			for (const interaction of record.interactions) {
				const outcome = interaction.statusCode ?? interaction.error ?? interaction.status;
				const retries = interaction.attempts > 1 ? `, ${interaction.attempts} attempts` : "";
				this.write(`    → ${interaction.method} ${interaction.url} ${outcome}${retries}`);
			}
			for (const assertion of record.assertions) {
				const mark = assertion.passed ? "\x1b[32m✓\x1b[0m" : "\x1b[31m✗\x1b[0m";
				this.write(`    ${mark} ${assertion.description}`);
			}
		}

		if (!record.passed && record.error) {
			this.write(`   Error: ${record.error}`);
		}
	}

	onComplete(summary: RunSummary): void {
		this.write(`\n${"-".repeat(60)}`);
		this.write(`📊 Summary${summary.name ? `: ${summary.name}` : ""}`);
		this.write("-".repeat(60));
		this.write(`Total:    ${summary.totalTests} test(s)`);
		this.write(`Passed:   ${summary.passedTests}`);
		this.write(`Failed:   ${summary.failedTests}`);
		this.write(`Duration: ${summary.duration}ms`);
		this.write("-".repeat(60));
	}
}

/**
 * Silent Reporter
 *
 * Collects records without output.
 */
export class SilentReporter implements TestReporter {
	readonly name = "silent";
	private records: TestCaseRecord[] = [];
	private summaries: RunSummary[] = [];

	onTestCaseComplete(record: TestCaseRecord): void {
		this.records.push(record);
	}

	onComplete(summary: RunSummary): void {
		this.summaries.push(summary);
	}

	getRecords(): TestCaseRecord[] {
		return [...this.records];
	}

	getLastSummary(): RunSummary | undefined {
		return this.summaries[this.summaries.length - 1];
	}
}

/**
 * Composite Reporter
 *
 * Combines multiple reporters.
 */
export class CompositeReporter implements TestReporter {
	readonly name = "composite";
	private reporters: TestReporter[];

	constructor(reporters: TestReporter[]) {
		this.reporters = reporters;
	}

	onTestCaseComplete(record: TestCaseRecord): void {
		for (const reporter of this.reporters) {
			reporter.onTestCaseComplete(record);
		}
	}

	onComplete(summary: RunSummary): void {
		for (const reporter of this.reporters) {
			reporter.onComplete?.(summary);
		}
	}

	addReporter(reporter: TestReporter): void {
		this.reporters.push(reporter);
	}

	removeReporter(name: string): void {
		this.reporters = this.reporters.filter((r) => r.name !== name);
	}
}
