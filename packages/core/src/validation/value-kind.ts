/**
 * Value Kinds
 *
 * Closed set of JSON value kinds used by field type checks.
 */

import { isDeepStrictEqual } from "node:util";

export type ValueKind = "integer" | "float" | "string" | "boolean" | "object" | "array" | "null";

export const VALUE_KINDS: readonly ValueKind[] = ["integer", "float", "string", "boolean", "object", "array", "null"];

/**
 * Plain JSON object (not an array, not null)
 */
export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
	if (typeof value !== "object" || value === null || Array.isArray(value)) {
		return false;
	}
	const proto = Object.getPrototypeOf(value);
	return proto === Object.prototype || proto === null;
}

/**
 * Kind of a value, or a description of the foreign type for values JSON
 * cannot carry (undefined, functions, non-finite numbers, class instances)
 */
export function kindOf(value: unknown): ValueKind | string {
	if (value === null) {
		return "null";
	}
	if (Array.isArray(value)) {
		return "array";
	}
	switch (typeof value) {
		case "boolean":
			return "boolean";
		case "string":
			return "string";
		case "number":
			if (!Number.isFinite(value)) {
				return String(value);
			}
			return Number.isInteger(value) ? "integer" : "float";
		case "object":
			return isJsonObject(value) ? "object" : (value.constructor?.name ?? "object");
		default:
			return typeof value;
	}
}

/**
 * Whether a value belongs to a kind. "float" accepts every finite number
 * because JSON does not tell 1.0 from 1.
 */
export function matchesKind(value: unknown, kind: ValueKind): boolean {
	const actual = kindOf(value);
	if (kind === "float") {
		return actual === "float" || actual === "integer";
	}
	return actual === kind;
}

/**
 * Value equality over JSON data: primitives compare with ===, so -0 equals 0
 * and nothing is coerced; arrays compare element-wise; plain objects need the
 * same keys with equal values, in any order. Other objects fall back to
 * isDeepStrictEqual.
 */
export function jsonEquals(a: unknown, b: unknown): boolean {
	if (a === b) {
		return true;
	}
	if (Array.isArray(a) || Array.isArray(b)) {
		return (
			Array.isArray(a) &&
			Array.isArray(b) &&
			a.length === b.length &&
			a.every((item, index) => jsonEquals(item, b[index]))
		);
	}
	if (isJsonObject(a) && isJsonObject(b)) {
		const keys = Object.keys(a);
		return (
			keys.length === Object.keys(b).length &&
			keys.every((key) => Object.hasOwn(b, key) && jsonEquals(a[key], b[key]))
		);
	}
	if (typeof a !== "object" || typeof b !== "object" || a === null || b === null) {
		return false;
	}
	if (isJsonObject(a) || isJsonObject(b)) {
		return false;
	}
	return isDeepStrictEqual(a, b);
}
