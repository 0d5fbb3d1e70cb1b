/**
 * Assertion Collector
 *
 * Collects check outcomes reported by the validator.
 */

import type { AssertionResult } from "./recording.types";

/**
 * Assertion Collector
 */
export class AssertionCollector {
	private assertions: AssertionResult[] = [];

	/**
	 * Record a successful check
	 */
	pass(description: string, expected?: unknown, actual?: unknown): void {
		this.assertions.push({ passed: true, description, expected, actual, timestamp: Date.now() });
	}

	/**
	 * Record a failed check
	 */
	fail(description: string, error: string, expected?: unknown, actual?: unknown): void {
		this.assertions.push({ passed: false, description, expected, actual, error, timestamp: Date.now() });
	}

	getAssertions(): AssertionResult[] {
		return [...this.assertions];
	}

	getPassedAssertions(): AssertionResult[] {
		return this.assertions.filter((a) => a.passed);
	}

	getFailedAssertions(): AssertionResult[] {
		return this.assertions.filter((a) => !a.passed);
	}

	allPassed(): boolean {
		return this.assertions.every((a) => a.passed);
	}

	hasFailed(): boolean {
		return this.assertions.some((a) => !a.passed);
	}

	getSummary(): {
		total: number;
		passed: number;
		failed: number;
		passRate: number;
	} {
		const passed = this.getPassedAssertions().length;
		const total = this.assertions.length;

		return {
			total,
			passed,
			failed: total - passed,
			passRate: total > 0 ? passed / total : 1,
		};
	}

	clear(): void {
		this.assertions = [];
	}

	get count(): number {
		return this.assertions.length;
	}
}
