/**
 * Response Validator
 *
 * Stateless checks over a transport response or a parsed JSON value.
 * Every check throws on failure; nothing is caught or retried here.
 */

import {
	AssertionFailedError,
	EmptyListError,
	FieldMismatchError,
	FieldMissingError,
	LengthMismatchError,
	MalformedBodyError,
	NotAListError,
	render,
	SchemaViolationError,
	TypeMismatchError,
	type ValidationError,
} from "../errors";
import { type Logger, noopLogger } from "../logging";
import type { AssertionCollector } from "../recording";
import type { TransportResponse } from "../transport";
import { AjvSchemaEngine, formatViolations, type SchemaDocument, type SchemaEngine } from "./schema-engine";
import { isJsonObject, type JsonObject, jsonEquals, kindOf, matchesKind, type ValueKind } from "./value-kind";

/**
 * Part of a response the status and body checks read
 */
export type ResponseLike = Pick<TransportResponse, "statusCode" | "bodyText">;

export interface ResponseValidatorOptions {
	logger?: Logger;
	/** JSON Schema engine (default: AjvSchemaEngine) */
	engine?: SchemaEngine;
	/** Receives the outcome of every check */
	assertions?: AssertionCollector;
}

/**
 * Response Validator
 *
 * @example
 * ```typescript
 * const validator = new ResponseValidator();
 * validator.assertStatus(response, 200);
 * const post = validator.parseJson(response);
 * validator.validateSchema(post, postSchema);
 * validator.assertFieldEquals(post, "id", 1);
 * ```
 */
export class ResponseValidator {
	readonly engine: SchemaEngine;
	private readonly logger: Logger;
	private readonly assertions?: AssertionCollector;

	constructor(options: ResponseValidatorOptions = {}) {
		this.engine = options.engine ?? new AjvSchemaEngine();
		this.logger = options.logger ?? noopLogger;
		this.assertions = options.assertions;
	}

	/**
	 * Fail unless the status code equals the expected one
	 */
	assertStatus(response: ResponseLike, expected: number): void {
		const description = `status is ${expected}`;
		if (response.statusCode !== expected) {
			this.fail(
				description,
				new AssertionFailedError(
					`Expected status ${expected}, but got ${response.statusCode}. Response: ${response.bodyText}`,
					{ expected, actual: response.statusCode },
				),
			);
		}
		this.pass(description, `Status code validation passed: ${expected}`, "info", expected, response.statusCode);
	}

	/**
	 * Fail unless the status code is one of the expected ones
	 */
	assertStatusIn(response: ResponseLike, expected: readonly number[]): void {
		const list = `[${expected.join(", ")}]`;
		const description = `status in ${list}`;
		if (!expected.includes(response.statusCode)) {
			this.fail(
				description,
				new AssertionFailedError(
					`Expected status in ${list}, but got ${response.statusCode}. Response: ${response.bodyText}`,
					{ expected, actual: response.statusCode },
				),
			);
		}
		this.pass(description, `Status code validation passed: ${response.statusCode}`, "info", expected, response.statusCode);
	}

	/**
	 * Parse the response body as JSON
	 */
	parseJson(response: ResponseLike): unknown {
		const description = "body is valid JSON";
		let parsed: unknown;
		try {
			parsed = JSON.parse(response.bodyText);
		} catch (error) {
			const reason = error instanceof Error ? error.message : String(error);
			this.logger.error(`Failed to parse JSON: ${reason}`);
			const malformed = new MalformedBodyError(response.bodyText, { cause: error });
			this.assertions?.fail(description, malformed.message);
			throw malformed;
		}
		this.pass(description, "Successfully parsed JSON response", "debug");
		return parsed;
	}

	/**
	 * Fail unless the value conforms to the schema
	 */
	validateSchema(value: unknown, schema: SchemaDocument): void {
		const description = "value matches schema";
		const result = this.engine.validate(value, schema);
		if (!result.valid) {
			const message = formatViolations(result.violations);
			this.fail(description, new SchemaViolationError(message, result.violations), `Schema validation failed: ${message}`);
		}
		this.pass(description, "Schema validation passed", "info");
	}

	/**
	 * Fail unless the object has the field (a null value counts as present)
	 */
	assertFieldExists(obj: unknown, field: string): void {
		const description = `field '${field}' exists`;
		const target = this.requireObject(description, obj);
		if (!Object.hasOwn(target, field)) {
			this.fail(description, new FieldMissingError(field));
		}
		this.pass(description, `Field '${field}' exists in response`, "debug");
	}

	/**
	 * Fail unless the field exists and equals the expected value (see jsonEquals)
	 */
	assertFieldEquals(obj: unknown, field: string, expected: unknown): void {
		this.assertFieldExists(obj, field);
		const description = `field '${field}' equals ${render(expected)}`;
		const actual = this.fieldValue(obj, field);
		if (!jsonEquals(actual, expected)) {
			this.fail(description, new FieldMismatchError(field, expected, actual));
		}
		this.pass(description, `Field '${field}' has expected value: ${render(expected)}`, "info", expected, actual);
	}

	/**
	 * Fail unless the field exists and its value is of the expected kind
	 */
	assertFieldType(obj: unknown, field: string, expected: ValueKind): void {
		this.assertFieldExists(obj, field);
		const description = `field '${field}' is ${expected}`;
		const actual = this.fieldValue(obj, field);
		if (!matchesKind(actual, expected)) {
			this.fail(description, new TypeMismatchError(field, expected, kindOf(actual)));
		}
		this.pass(description, `Field '${field}' has expected type: ${expected}`, "debug", expected, kindOf(actual));
	}

	/**
	 * Fail unless the value is an array with at least one element
	 */
	assertNonEmptyArray(value: unknown): unknown[] {
		const description = "value is a non-empty array";
		const items = this.requireArray(description, value);
		if (items.length === 0) {
			this.fail(description, new EmptyListError());
		}
		this.pass(description, `Response is a non-empty array with ${items.length} items`, "info");
		return items;
	}

	/**
	 * Fail unless the value is an array with exactly the expected length
	 */
	assertArrayLength(value: unknown, expectedLength: number): unknown[] {
		const description = `array has length ${expectedLength}`;
		const items = this.requireArray(description, value);
		if (items.length !== expectedLength) {
			this.fail(
				description,
				new LengthMismatchError(
					`Expected array length ${expectedLength}, but got ${items.length}`,
					expectedLength,
					items.length,
				),
			);
		}
		this.pass(description, `Array has expected length: ${expectedLength}`, "info", expectedLength, items.length);
		return items;
	}

	/**
	 * Fail unless the value is an array with at least the given length
	 */
	assertMinArrayLength(value: unknown, minLength: number): unknown[] {
		const description = `array has at least ${minLength} items`;
		const items = this.requireArray(description, value);
		if (items.length < minLength) {
			this.fail(
				description,
				new LengthMismatchError(`Expected at least ${minLength} items, but got ${items.length}`, minLength, items.length),
			);
		}
		this.pass(description, `Array has ${items.length} items (minimum ${minLength})`, "info", minLength, items.length);
		return items;
	}

	private requireObject(description: string, value: unknown): JsonObject {
		if (!isJsonObject(value)) {
			this.fail(description, new TypeMismatchError("<root>", "object", kindOf(value)));
		}
		return value;
	}

	private requireArray(description: string, value: unknown): unknown[] {
		if (!Array.isArray(value)) {
			this.fail(description, new NotAListError(kindOf(value)));
		}
		return value;
	}

	private fieldValue(obj: unknown, field: string): unknown {
		return isJsonObject(obj) ? obj[field] : undefined;
	}

	private pass(
		description: string,
		message: string,
		level: "debug" | "info",
		expected?: unknown,
		actual?: unknown,
	): void {
		this.logger[level](message);
		this.assertions?.pass(description, expected, actual);
	}

	private fail(description: string, error: ValidationError, logMessage: string = error.message): never {
		this.logger.error(logMessage);
		this.assertions?.fail(description, error.message, error.expected, error.actual);
		throw error;
	}
}
