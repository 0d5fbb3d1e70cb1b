/**
 * Result Converter
 *
 * Pure functions to convert recorded test cases to Allure format.
 */

import { createHash, randomUUID } from "node:crypto";
import {
	type StepResult as AllureStepResult,
	type TestResult as AllureTestResult,
	type Attachment,
	ContentType,
	type Label,
	LabelName,
	type Link,
	LinkType,
	type Parameter,
	Stage,
	Status,
	type StatusDetails,
	type TestResultContainer,
} from "allure-js-commons";
import type { AssertionResult, Interaction, TestCaseMetadata, TestCaseRecord } from "restprobe";
import type { AllureReporterOptions } from "./types";
import type { AllureWriter } from "./writers/writer";

/**
 * Error names reported as failed checks rather than broken tests
 */
const FAILURE_ERROR_NAMES = new Set([
	"ValidationError",
	"AssertionFailedError",
	"FieldMissingError",
	"FieldMismatchError",
	"TypeMismatchError",
	"NotAListError",
	"EmptyListError",
	"LengthMismatchError",
	"SchemaViolationError",
	"AssertionError",
]);

/**
 * Generate MD5 hash for historyId/testCaseId
 */
function md5(input: string): string {
	return createHash("md5").update(input).digest("hex");
}

/**
 * Truncate string to max length with ellipsis
 */
function truncate(str: string, maxLength: number): string {
	if (str.length <= maxLength) {
		return str;
	}
	return `${str.slice(0, maxLength - 3)}...`;
}

function stringify(value: unknown): string {
	if (typeof value === "string") {
		return value;
	}
	return JSON.stringify(value) ?? String(value);
}

/**
 * Convert pass/fail to Allure Status.
 * Failed checks are FAILED; transport and unexpected errors are BROKEN.
 * A failure without an error name comes from a recorded check.
 */
export function convertStatus(passed: boolean, errorName?: string): Status {
	if (passed) {
		return Status.PASSED;
	}
	if (errorName === undefined || FAILURE_ERROR_NAMES.has(errorName)) {
		return Status.FAILED;
	}
	return Status.BROKEN;
}

/**
 * Convert error information to StatusDetails
 */
export function convertStatusDetails(error?: string, stackTrace?: string): StatusDetails | undefined {
	if (!error && !stackTrace) {
		return undefined;
	}
	return {
		message: error,
		trace: stackTrace,
	};
}

/**
 * Convert TestCaseMetadata to Allure labels
 */
export function convertMetadataToLabels(
	metadata: TestCaseMetadata | undefined,
	options: AllureReporterOptions,
): Label[] {
	const labels: Label[] = [];

	labels.push({ name: LabelName.FRAMEWORK, value: "restprobe" });
	labels.push({ name: LabelName.LANGUAGE, value: "typescript" });

	if (options.labels) {
		labels.push(...options.labels);
	}

	if (metadata?.id) {
		labels.push({ name: LabelName.ALLURE_ID, value: metadata.id });
	}

	const epic = metadata?.epic ?? options.defaultEpic;
	if (epic) {
		labels.push({ name: LabelName.EPIC, value: epic });
	}

	const feature = metadata?.feature ?? options.defaultFeature;
	if (feature) {
		labels.push({ name: LabelName.FEATURE, value: feature });
	}

	if (metadata?.story) {
		labels.push({ name: LabelName.STORY, value: metadata.story });
	}

	if (metadata?.severity) {
		labels.push({ name: LabelName.SEVERITY, value: metadata.severity });
	}

	for (const tag of metadata?.tags ?? []) {
		labels.push({ name: LabelName.TAG, value: tag });
	}

	for (const [name, value] of Object.entries(metadata?.labels ?? {})) {
		labels.push({ name, value });
	}

	return labels;
}

/**
 * Convert TestCaseMetadata to Allure links
 */
export function convertMetadataToLinks(metadata: TestCaseMetadata | undefined, options: AllureReporterOptions): Link[] {
	const links: Link[] = [];

	if (!metadata) {
		return links;
	}

	if (metadata.id && options.tmsUrlPattern) {
		links.push({
			name: metadata.id,
			url: options.tmsUrlPattern.replace("{id}", metadata.id),
			type: LinkType.TMS,
		});
	}

	if (metadata.issues && options.issueUrlPattern) {
		for (const issue of metadata.issues) {
			links.push({
				name: issue,
				url: options.issueUrlPattern.replace("{id}", issue),
				type: LinkType.ISSUE,
			});
		}
	}

	return links;
}

/**
 * Convert a recorded request to an Allure step
 */
export function convertInteraction(interaction: Interaction): AllureStepResult {
	const parameters: Parameter[] = [];

	if (interaction.statusCode !== undefined) {
		parameters.push({ name: "status", value: String(interaction.statusCode) });
	}
	parameters.push({ name: "attempts", value: String(interaction.attempts) });
	if (interaction.elapsedSeconds !== undefined) {
		parameters.push({ name: "elapsed", value: `${interaction.elapsedSeconds.toFixed(2)}s` });
	}

	const failed = interaction.status === "failed";
	return {
		name: `${interaction.method} ${interaction.url}`,
		status: failed ? Status.BROKEN : Status.PASSED,
		statusDetails: failed ? { message: interaction.error } : { message: undefined },
		stage: Stage.FINISHED,
		start: interaction.startedAt,
		stop: interaction.finishedAt,
		steps: [],
		attachments: [],
		parameters,
	};
}

/**
 * Convert a recorded check to an Allure step
 */
export function convertAssertion(assertion: AssertionResult, options: AllureReporterOptions): AllureStepResult {
	const parameters: Parameter[] = [];
	const maxLength = options.maxParameterLength ?? 1000;

	if (assertion.expected !== undefined) {
		parameters.push({ name: "expected", value: truncate(stringify(assertion.expected), maxLength) });
	}
	if (assertion.actual !== undefined) {
		parameters.push({ name: "actual", value: truncate(stringify(assertion.actual), maxLength) });
	}

	return {
		name: assertion.description,
		status: assertion.passed ? Status.PASSED : Status.FAILED,
		statusDetails: { message: assertion.error },
		stage: Stage.FINISHED,
		start: assertion.timestamp,
		stop: assertion.timestamp,
		steps: [],
		attachments: [],
		parameters,
	};
}

/**
 * Convert requests and checks to steps in the order they happened
 */
export function convertSteps(record: TestCaseRecord, options: AllureReporterOptions): AllureStepResult[] {
	const timed: Array<{ at: number; step: AllureStepResult }> = [
		...record.interactions.map((i) => ({ at: i.startedAt, step: convertInteraction(i) })),
		...record.assertions.map((a) => ({ at: a.timestamp, step: convertAssertion(a, options) })),
	];
	// stable: a request stays ahead of checks recorded in the same millisecond
	return timed.sort((a, b) => a.at - b.at).map((t) => t.step);
}

/**
 * Convert TestCaseRecord to Allure TestResult
 */
export function convertTestCase(
	record: TestCaseRecord,
	options: AllureReporterOptions,
	writer?: AllureWriter,
): AllureTestResult {
	const metadata = record.metadata;
	const attachments: Attachment[] = [];

	if (writer && record.assertions.length > 0) {
		const content = Buffer.from(JSON.stringify(record.assertions, null, 2), "utf-8");
		const source = writer.writeAttachment("checks.json", content, ContentType.JSON);
		attachments.push({ name: "Checks", source, type: ContentType.JSON });
	}

	return {
		uuid: randomUUID(),
		historyId: md5(record.name),
		testCaseId: md5(record.name),
		name: metadata?.title ?? record.name,
		fullName: record.name,
		description: metadata?.description,
		status: convertStatus(record.passed, record.errorName),
		statusDetails: convertStatusDetails(record.error, record.stackTrace) ?? { message: undefined },
		stage: Stage.FINISHED,
		start: record.startTime,
		stop: record.endTime,
		steps: convertSteps(record, options),
		labels: convertMetadataToLabels(metadata, options),
		links: convertMetadataToLinks(metadata, options),
		attachments,
		parameters: [],
	};
}

/**
 * Build the Allure container grouping a run's test results
 */
export function convertToContainer(name: string, testCaseUuids: string[]): TestResultContainer {
	return {
		uuid: randomUUID(),
		name,
		children: testCaseUuids,
		befores: [],
		afters: [],
	};
}
