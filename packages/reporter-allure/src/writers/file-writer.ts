/**
 * FileSystem Writer
 *
 * Writes Allure result files into a results directory.
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs";
import * as path from "node:path";
import type { TestResult, TestResultContainer } from "allure-js-commons";
import type { AllureWriter } from "./writer";

const MIME_TO_EXTENSION: Record<string, string> = {
	"application/json": "json",
	"text/plain": "txt",
	"text/html": "html",
	"text/csv": "csv",
	"application/xml": "xml",
	"text/xml": "xml",
};

export interface FileSystemWriterOptions {
	/** Remove files left in the results directory by earlier runs */
	clean?: boolean;
}

/**
 * FileSystemWriter - writes Allure result files to disk
 */
export class FileSystemWriter implements AllureWriter {
	private readonly resultsDir: string;
	private prepared = false;
	private readonly clean: boolean;

	constructor(resultsDir: string, options: FileSystemWriterOptions = {}) {
		this.resultsDir = resultsDir;
		this.clean = options.clean ?? false;
	}

	writeTestResult(result: TestResult): void {
		this.writeFile(`${result.uuid}-result.json`, JSON.stringify(result, null, 2));
	}

	writeContainer(container: TestResultContainer): void {
		this.writeFile(`${container.uuid}-container.json`, JSON.stringify(container, null, 2));
	}

	/**
	 * Write environment.properties file
	 */
	writeEnvironment(info: Record<string, string>): void {
		const content = Object.entries(info)
			.map(([key, value]) => `${key}=${value}`)
			.join("\n");
		this.writeFile("environment.properties", content);
	}

	writeAttachment(_name: string, content: Buffer, mimeType: string): string {
		const extension = MIME_TO_EXTENSION[mimeType] ?? "bin";
		const filename = `${randomUUID()}-attachment.${extension}`;
		this.writeFile(filename, content);
		return filename;
	}

	getResultsDir(): string {
		return this.resultsDir;
	}

	/**
	 * Create the directory on first write, emptying it first when asked to
	 */
	private ensureDirectory(): void {
		if (this.prepared) {
			return;
		}
		if (this.clean) {
			fs.rmSync(this.resultsDir, { recursive: true, force: true });
		}
		fs.mkdirSync(this.resultsDir, { recursive: true });
		this.prepared = true;
	}

	private writeFile(filename: string, content: string | Buffer): void {
		this.ensureDirectory();
		fs.writeFileSync(path.join(this.resultsDir, filename), content);
	}
}
