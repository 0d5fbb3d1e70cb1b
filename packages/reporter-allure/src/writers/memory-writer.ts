/**
 * In-Memory Writer
 *
 * Keeps Allure results in memory instead of writing files.
 */

import type { TestResult, TestResultContainer } from "allure-js-commons";
import type { AllureWriter } from "./writer";

export class InMemoryWriter implements AllureWriter {
	readonly results: TestResult[] = [];
	readonly containers: TestResultContainer[] = [];
	readonly attachments = new Map<string, { content: Buffer; mimeType: string }>();
	environment?: Record<string, string>;
	private attachmentCounter = 0;

	writeTestResult(result: TestResult): void {
		this.results.push(result);
	}

	writeContainer(container: TestResultContainer): void {
		this.containers.push(container);
	}

	writeEnvironment(info: Record<string, string>): void {
		this.environment = { ...info };
	}

	writeAttachment(name: string, content: Buffer, mimeType: string): string {
		const filename = `${++this.attachmentCounter}-${name}`;
		this.attachments.set(filename, { content, mimeType });
		return filename;
	}
}
