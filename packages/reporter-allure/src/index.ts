/**
 * Allure Reporter for restprobe
 *
 * Writes recorded test cases as Allure result files.
 *
 * @example
 * ```typescript
 * import { TestCaseRecorder } from "restprobe";
 * import { AllureReporter } from "@restprobe/reporter-allure";
 *
 * const reporter = new AllureReporter({ resultsDir: "allure-results", defaultEpic: "Posts API" });
 * const recorder = new TestCaseRecorder("GET /posts", { feature: "Posts", severity: "critical" });
 * // ... run the case with recorder.interactions / recorder.assertions attached
 * reporter.onTestCaseComplete(recorder.finish());
 * reporter.onComplete({ name: "Posts API", totalTests: 1, passedTests: 1, failedTests: 0, duration: 0, passed: true });
 * ```
 */

export { ContentType, LabelName, LinkType, Stage, Status } from "allure-js-commons";
export { AllureReporter } from "./allure-reporter";
export * from "./result-converter";
export type { AllureReporterOptions } from "./types";
export { FileSystemWriter, type FileSystemWriterOptions } from "./writers/file-writer";
export { InMemoryWriter } from "./writers/memory-writer";
export type { AllureWriter } from "./writers/writer";
