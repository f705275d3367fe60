/**
 * JSON text and node helpers.
 *
 * Text is parsed with `JSON.parse` and written with `JSON.stringify`; the
 * codec itself only ever sees the node tree.
 *
 * @module
 */

import type { JsonObject, JsonValue } from "@geocodec/shared/types"
import { GeoJSONError, ROOT_PATH } from "./errors"

/**
 * Parse JSON text into a node tree.
 *
 * @throws GeoJSONError `MalformedJSON` wrapping the parser's error.
 */
export function parseJson(text: string): JsonValue {
	try {
		return JSON.parse(text)
	} catch (error) {
		throw new GeoJSONError(
			"MalformedJSON",
			ROOT_PATH,
			error instanceof Error ? error.message : String(error),
			{ cause: error },
		)
	}
}

/**
 * Write a node tree as JSON text. Object members are written in insertion
 * order.
 */
export function stringifyJson(node: unknown, indent?: number): string {
	return JSON.stringify(node, null, indent)
}

/** Type guard: check if a node is a JSON object (not an array or null). */
export function isJsonObject(value: unknown): value is JsonObject {
	return typeof value === "object" && value !== null && !Array.isArray(value)
}

/** Check if `key` is an own member of a JSON object. */
export function hasMember(node: JsonObject, key: string): boolean {
	return Object.hasOwn(node, key)
}
