/**
 * Test Case Recorder
 *
 * Pairs an interaction recorder with an assertion collector for the
 * duration of one test case and produces the final TestCaseRecord.
 */

import { AssertionCollector } from "./assertion-collector";
import { InteractionRecorder } from "./interaction-recorder";
import type { TestCaseMetadata, TestCaseRecord } from "./recording.types";

export class TestCaseRecorder {
	readonly name: string;
	readonly metadata?: TestCaseMetadata;
	readonly interactions = new InteractionRecorder();
	readonly assertions = new AssertionCollector();
	readonly startTime: number;

	constructor(name: string, metadata?: TestCaseMetadata) {
		this.name = name;
		this.metadata = metadata;
		this.startTime = Date.now();
	}

	/**
	 * Close the case. It passes when no error is given and no check failed.
	 */
	finish(error?: unknown): TestCaseRecord {
		const record: TestCaseRecord = {
			name: this.name,
			metadata: this.metadata,
			startTime: this.startTime,
			endTime: Date.now(),
			passed: error === undefined && !this.assertions.hasFailed(),
			interactions: this.interactions.getInteractions(),
			assertions: this.assertions.getAssertions(),
		};

		if (error instanceof Error) {
			record.error = error.message;
			record.errorName = error.name;
			record.stackTrace = error.stack;
		} else if (error !== undefined) {
			record.error = String(error);
		} else {
			const failed = this.assertions.getFailedAssertions()[0];
			if (failed) {
				record.error = failed.error;
			}
		}

		return record;
	}
}
