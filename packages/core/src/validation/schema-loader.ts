/**
 * Schema Loader
 */

import * as fs from "node:fs";
import { ConfigError } from "../errors";
import type { SchemaDocument } from "./schema-engine";
import { isJsonObject } from "./value-kind";

/**
 * Read a JSON Schema document from disk
 */
export function loadSchema(filePath: string): SchemaDocument {
	let text: string;
	try {
		text = fs.readFileSync(filePath, "utf-8");
	} catch (error) {
		throw new ConfigError(`Cannot read schema file ${filePath}`, { cause: error });
	}

	let parsed: SchemaDocument;
	try {
		parsed = JSON.parse(text);
	} catch (error) {
		throw new ConfigError(`Schema file ${filePath} is not valid JSON`, { cause: error });
	}

	if (!isJsonObject(parsed)) {
		throw new ConfigError(`Schema file ${filePath} must contain a JSON object`);
	}
	return parsed;
}
