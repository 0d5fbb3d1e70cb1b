/**
 * Harness Errors
 *
 * Every failure raised by the transport, the validator or the configuration
 * layer is a RestprobeError. Validation failures share the ValidationError
 * base so a test runner can tell a failed check from a broken request.
 */

/**
 * Error codes carried by every RestprobeError
 */
export type ErrorCode = "TRANSPORT" | "CONFIG" | "MALFORMED_BODY" | "VALIDATION";

/**
 * Kinds of validation failure
 */
export type ValidationKind =
	| "AssertionFailed"
	| "FieldMissing"
	| "FieldMismatch"
	| "TypeMismatch"
	| "NotAList"
	| "EmptyList"
	| "LengthMismatch"
	| "SchemaViolation";

/**
 * Base class for all harness errors
 */
export class RestprobeError extends Error {
	readonly code: ErrorCode;

	constructor(message: string, code: ErrorCode, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "RestprobeError";
		this.code = code;
	}
}

/**
 * Raised when no response was ever received: every attempt failed below the
 * HTTP layer (refused, reset, DNS, timeout), or the transport was closed.
 */
export class TransportError extends RestprobeError {
	readonly method?: string;
	readonly url?: string;
	readonly attempts: number;

	constructor(
		message: string,
		options?: {
			method?: string;
			url?: string;
			attempts?: number;
			cause?: unknown;
		},
	) {
		super(message, "TRANSPORT", { cause: options?.cause });
		this.name = "TransportError";
		this.method = options?.method;
		this.url = options?.url;
		this.attempts = options?.attempts ?? 0;
	}

	/**
	 * Create a TransportError for a request whose retries were exhausted
	 */
	static exhausted(method: string, url: string, attempts: number, cause: unknown): TransportError {
		const reason = cause instanceof Error ? cause.message : String(cause);
		return new TransportError(`${method} ${url} failed after ${attempts} attempt(s): ${reason}`, {
			method,
			url,
			attempts,
			cause,
		});
	}
}

/**
 * Invalid harness configuration (bad option, bad environment variable,
 * unreadable schema file)
 */
export class ConfigError extends RestprobeError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, "CONFIG", options);
		this.name = "ConfigError";
	}
}

/**
 * Response body could not be parsed as JSON
 */
export class MalformedBodyError extends RestprobeError {
	/** Raw body text that failed to parse */
	readonly bodyText: string;

	constructor(bodyText: string, options?: { cause?: unknown }) {
		super(`Response is not valid JSON: ${bodyText}`, "MALFORMED_BODY", options);
		this.name = "MalformedBodyError";
		this.bodyText = bodyText;
	}
}

/**
 * Base class for failed checks
 */
export class ValidationError extends RestprobeError {
	readonly kind: ValidationKind;
	readonly expected?: unknown;
	readonly actual?: unknown;

	constructor(kind: ValidationKind, message: string, details?: { expected?: unknown; actual?: unknown }) {
		super(message, "VALIDATION");
		this.name = "ValidationError";
		this.kind = kind;
		this.expected = details?.expected;
		this.actual = details?.actual;
	}
}

export class AssertionFailedError extends ValidationError {
	constructor(message: string, details?: { expected?: unknown; actual?: unknown }) {
		super("AssertionFailed", message, details);
		this.name = "AssertionFailedError";
	}
}

export class FieldMissingError extends ValidationError {
	readonly field: string;

	constructor(field: string) {
		super("FieldMissing", `Field '${field}' not found in response`, { expected: field });
		this.name = "FieldMissingError";
		this.field = field;
	}
}

export class FieldMismatchError extends ValidationError {
	readonly field: string;

	constructor(field: string, expected: unknown, actual: unknown) {
		super("FieldMismatch", `Field '${field}': expected ${render(expected)}, but got ${render(actual)}`, {
			expected,
			actual,
		});
		this.name = "FieldMismatchError";
		this.field = field;
	}
}

export class TypeMismatchError extends ValidationError {
	readonly field: string;

	constructor(field: string, expected: string, actual: string) {
		super("TypeMismatch", `Field '${field}': expected type ${expected}, but got ${actual}`, { expected, actual });
		this.name = "TypeMismatchError";
		this.field = field;
	}
}

export class NotAListError extends ValidationError {
	constructor(actualKind: string) {
		super("NotAList", `Expected array, but got ${actualKind}`, { expected: "array", actual: actualKind });
		this.name = "NotAListError";
	}
}

export class EmptyListError extends ValidationError {
	constructor() {
		super("EmptyList", "Expected non-empty array, but got empty array", { expected: "non-empty", actual: 0 });
		this.name = "EmptyListError";
	}
}

export class LengthMismatchError extends ValidationError {
	constructor(message: string, expected: number, actual: number) {
		super("LengthMismatch", message, { expected, actual });
		this.name = "LengthMismatchError";
	}
}

/**
 * Single violation reported by a schema engine
 */
export interface SchemaViolation {
	/** JSON pointer to the offending value ("" for the root) */
	instancePath: string;
	/** Engine's description of the violation */
	message: string;
	/** Schema keyword that failed (required, type, ...) */
	keyword?: string;
}

export class SchemaViolationError extends ValidationError {
	readonly violations: SchemaViolation[];

	constructor(message: string, violations: SchemaViolation[]) {
		super("SchemaViolation", message);
		this.name = "SchemaViolationError";
		this.violations = violations;
	}
}

/**
 * Render a value for an error message
 */
export function render(value: unknown): string {
	if (value === undefined) {
		return "undefined";
	}
	try {
		return JSON.stringify(value);
	} catch {
		return String(value);
	}
}
