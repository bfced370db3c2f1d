/**
 * Utilities for turning the result schema into the JSON Schema the hosted agent accepts
 */

import type { ZodTypeAny } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";

const SKIP_FIELDS = new Set(["$schema", "title", "additionalProperties", "$defs", "definitions"]);

/**
 * Strip keys that only add noise to the agent prompt. Descriptions are kept in full.
 */
function optimizeSchema(value: unknown): unknown {
	if (Array.isArray(value)) {
		return value.map((item) => optimizeSchema(item));
	}
	if (typeof value !== "object" || value === null) {
		return value;
	}

	const optimized: Record<string, unknown> = {};
	for (const [key, child] of Object.entries(value)) {
		if (SKIP_FIELDS.has(key)) {
			continue;
		}
		optimized[key] = optimizeSchema(child);
	}
	return optimized;
}

/**
 * Create a flattened JSON Schema object for a zod schema, with every reference inlined.
 */
export function createOptimizedJsonSchema(schema: ZodTypeAny): Record<string, unknown> {
	const original = zodToJsonSchema(schema, {
		$refStrategy: "none",
		target: "jsonSchema7",
	});
	const optimized = optimizeSchema(original);
	if (typeof optimized !== "object" || optimized === null || Array.isArray(optimized)) {
		throw new Error("Result schema did not produce a JSON Schema object");
	}
	return Object.fromEntries(Object.entries(optimized));
}

/**
 * Serialized form sent as `structured_output_json` on a hosted task.
 */
export function createStructuredOutputJson(schema: ZodTypeAny): string {
	return JSON.stringify(createOptimizedJsonSchema(schema));
}
