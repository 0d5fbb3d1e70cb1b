/**
 * Allure Reporter Types
 */

import type { Label } from "allure-js-commons";
import type { AllureWriter } from "./writers/writer";

/**
 * Allure reporter options
 */
export interface AllureReporterOptions {
	/** Output directory (default: "allure-results") */
	resultsDir?: string;

	/** Environment info written to environment.properties */
	environmentInfo?: Record<string, string>;

	/** Default labels for all tests */
	labels?: Label[];

	/** URL pattern for TMS links (use {id} placeholder) */
	tmsUrlPattern?: string;

	/** URL pattern for issue links (use {id} placeholder) */
	issueUrlPattern?: string;

	/** Default epic for all tests */
	defaultEpic?: string;

	/** Default feature for all tests */
	defaultFeature?: string;

	/**
	 * Maximum length of expected/actual step parameters (default: 1000 characters)
	 * Longer values are truncated with "..." suffix
	 */
	maxParameterLength?: number;

	/** Destination for result files (default: FileSystemWriter on resultsDir) */
	writer?: AllureWriter;
}
