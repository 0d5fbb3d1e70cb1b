/**
 * Schema Engines
 *
 * The validator delegates JSON Schema evaluation to a SchemaEngine.
 * AjvSchemaEngine is the default; any other engine can be plugged in.
 */

import type { Options, SchemaObject, ValidateFunction } from "ajv";
import Ajv from "ajv";
import Ajv2019 from "ajv/dist/2019";
import Ajv2020 from "ajv/dist/2020";
import type AjvCore from "ajv/dist/core";
import draft06MetaSchema from "ajv/dist/refs/json-schema-draft-06.json";
import Ajv04 from "ajv-draft-04";
import addFormats from "ajv-formats";
import { ConfigError, type SchemaViolation } from "../errors";

/**
 * JSON Schema document, treated as opaque data
 */
export type SchemaDocument = SchemaObject;

/**
 * Result of evaluating a value against a schema
 */
export interface SchemaCheckResult {
	valid: boolean;
	violations: SchemaViolation[];
}

/**
 * Pluggable JSON Schema evaluator
 */
export interface SchemaEngine {
	readonly name: string;
	validate(value: unknown, schema: SchemaDocument): SchemaCheckResult;
}

/**
 * JSON Schema drafts the ajv engine evaluates
 */
export type SchemaDraft = "draft-04" | "draft-06" | "draft-07" | "2019-09" | "2020-12";

/** Canonical meta-schema URI per draft, as each ajv instance registers it */
const META_SCHEMAS: Record<SchemaDraft, string> = {
	"draft-04": "http://json-schema.org/draft-04/schema#",
	"draft-06": "http://json-schema.org/draft-06/schema#",
	"draft-07": "http://json-schema.org/draft-07/schema#",
	"2019-09": "https://json-schema.org/draft/2019-09/schema",
	"2020-12": "https://json-schema.org/draft/2020-12/schema",
};

const DRAFTS: readonly SchemaDraft[] = ["draft-04", "draft-06", "draft-07", "2019-09", "2020-12"];

const DRAFTS_BY_KEY = new Map(DRAFTS.map((draft) => [metaSchemaKey(META_SCHEMAS[draft]), draft] as const));

/**
 * Meta-schema URI without scheme or trailing "#"
 */
function metaSchemaKey(uri: string): string {
	return uri.replace(/^https?:\/\//, "").replace(/#$/, "");
}

/**
 * Draft a schema declares through $schema. Schemas without $schema are draft-07.
 */
export function detectDraft(schema: SchemaDocument): SchemaDraft {
	const declared: unknown = schema.$schema;
	if (declared === undefined) {
		return "draft-07";
	}
	const draft = typeof declared === "string" ? DRAFTS_BY_KEY.get(metaSchemaKey(declared)) : undefined;
	if (!draft) {
		throw new ConfigError(`Unsupported $schema ${JSON.stringify(declared)}`);
	}
	return draft;
}

function createInstance(draft: SchemaDraft, options: Options): AjvCore {
	switch (draft) {
		case "draft-04":
			return new Ajv04(options);
		case "draft-06": {
			const ajv = new Ajv(options);
			ajv.addMetaSchema(draft06MetaSchema);
			return ajv;
		}
		case "draft-07":
			return new Ajv(options);
		case "2019-09":
			return new Ajv2019(options);
		case "2020-12":
			return new Ajv2020(options);
	}
}

/**
 * Options for the ajv-backed engine
 */
export interface AjvSchemaEngineOptions {
	/** Report every violation instead of stopping at the first (default: false) */
	allErrors?: boolean;
	/** Validate "format" keywords with ajv-formats (default: true) */
	formats?: boolean;
}

/**
 * Schema engine backed by ajv.
 *
 * Each draft (04, 06, 07, 2019-09, 2020-12) gets its own lazily created
 * ajv instance, picked from the schema's $schema. Schemas without $schema
 * are evaluated as draft-07. Compiled validators are cached per schema
 * object; schemas are never registered on an ajv instance.
 *
 * A schema that cannot be compiled raises ConfigError, on every call.
 */
export class AjvSchemaEngine implements SchemaEngine {
	readonly name = "ajv";

	private readonly allErrors: boolean;
	private readonly formats: boolean;
	private readonly instances = new Map<SchemaDraft, AjvCore>();
	private readonly compiled = new WeakMap<SchemaDocument, ValidateFunction>();
	private readonly rejected = new WeakMap<SchemaDocument, ConfigError>();

	constructor(options: AjvSchemaEngineOptions = {}) {
		this.allErrors = options.allErrors ?? false;
		this.formats = options.formats ?? true;
	}

	validate(value: unknown, schema: SchemaDocument): SchemaCheckResult {
		const validateFn = this.compile(schema);
		if (validateFn(value)) {
			return { valid: true, violations: [] };
		}

		const violations: SchemaViolation[] = (validateFn.errors ?? []).map((error) => ({
			instancePath: error.instancePath,
			message: error.message ?? `failed "${error.keyword}" keyword`,
			keyword: error.keyword,
		}));
		return { valid: false, violations };
	}

	private compile(schema: SchemaDocument): ValidateFunction {
		const cached = this.compiled.get(schema);
		if (cached) {
			return cached;
		}
		// ajv keeps a failed schema in its own cache, so the failure is kept here too
		const rejected = this.rejected.get(schema);
		if (rejected) {
			throw rejected;
		}

		const draft = detectDraft(schema);
		const canonical = META_SCHEMAS[draft];
		const source =
			schema.$schema === undefined || schema.$schema === canonical ? schema : { ...schema, $schema: canonical };

		let validateFn: ValidateFunction;
		try {
			validateFn = this.instanceFor(draft).compile(source);
		} catch (error) {
			const reason = error instanceof Error ? error.message : String(error);
			const failure = new ConfigError(`Invalid ${draft} JSON Schema: ${reason}`, { cause: error });
			this.rejected.set(schema, failure);
			throw failure;
		}
		this.compiled.set(schema, validateFn);
		return validateFn;
	}

	private instanceFor(draft: SchemaDraft): AjvCore {
		let ajv = this.instances.get(draft);
		if (!ajv) {
			ajv = createInstance(draft, { allErrors: this.allErrors, strict: false, addUsedSchema: false });
			if (this.formats) {
				addFormats(ajv);
			}
			this.instances.set(draft, ajv);
		}
		return ajv;
	}
}

/**
 * Render violations as one message, "<path> <message>" per violation
 */
export function formatViolations(violations: SchemaViolation[]): string {
	if (violations.length === 0) {
		return "Schema validation failed";
	}
	return violations.map((v) => `${v.instancePath || "<root>"} ${v.message}`).join("; ");
}
