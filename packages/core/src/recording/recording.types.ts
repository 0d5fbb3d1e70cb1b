/**
 * Recording Types
 *
 * Types for recording what happened during a test case.
 */

/**
 * Interaction status
 */
export type InteractionStatus = "pending" | "completed" | "failed";

/**
 * One request issued through the transport, across all of its attempts
 */
export interface Interaction {
	id: string;
	method: string;
	url: string;
	status: InteractionStatus;
	startedAt: number;
	finishedAt?: number;
	statusCode?: number;
	attempts: number;
	/** Duration of the final attempt */
	elapsedSeconds?: number;
	error?: string;
}

/**
 * Filter for querying interactions
 */
export interface InteractionFilter {
	method?: string;
	status?: InteractionStatus;
	statusCode?: number;
	filter?: (interaction: Interaction) => boolean;
}

/**
 * Outcome of a single check
 */
export interface AssertionResult {
	passed: boolean;
	description: string;
	expected?: unknown;
	actual?: unknown;
	error?: string;
	timestamp: number;
}

/**
 * Descriptive metadata for a test case (mapped to report labels)
 */
export interface TestCaseMetadata {
	/** Test management system id */
	id?: string;
	title?: string;
	description?: string;
	epic?: string;
	feature?: string;
	story?: string;
	severity?: "blocker" | "critical" | "normal" | "minor" | "trivial";
	tags?: string[];
	labels?: Record<string, string>;
	issues?: string[];
}

/**
 * Everything recorded for one finished test case
 */
export interface TestCaseRecord {
	name: string;
	metadata?: TestCaseMetadata;
	startTime: number;
	endTime: number;
	passed: boolean;
	error?: string;
	stackTrace?: string;
	/** Name of the error class, when the case ended with an error */
	errorName?: string;
	interactions: Interaction[];
	assertions: AssertionResult[];
}
