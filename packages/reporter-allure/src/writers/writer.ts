/**
 * Allure Writer Interface
 */

import type { TestResult, TestResultContainer } from "allure-js-commons";

/**
 * Destination for Allure result files
 */
export interface AllureWriter {
	/** Write one test result */
	writeTestResult(result: TestResult): void;

	/** Write the container grouping a run's results */
	writeContainer(container: TestResultContainer): void;

	/** Write environment.properties */
	writeEnvironment(info: Record<string, string>): void;

	/**
	 * Store an attachment
	 * @returns file name to reference from the result
	 */
	writeAttachment(name: string, content: Buffer, mimeType: string): string;
}
