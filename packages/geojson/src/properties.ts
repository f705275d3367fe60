import type { JsonObject, JsonValue } from "@geocodec/shared/types"
import { describeValue } from "./errors"
import { isJsonObject } from "./json"
import type { PropertyCodec } from "./types"

/**
 * Build a property codec from an encode/decode pair.
 *
 * @example
 * ```ts
 * type Animal = { name: string; age: number }
 *
 * const animals = propertyCodec<Animal>(
 * 	(animal) => ({ name: animal.name, age: animal.age }),
 * 	(node) => {
 * 		if (!isJsonObject(node)) throw Error("expected an object")
 * 		const { name, age } = node
 * 		if (typeof name !== "string" || typeof age !== "number")
 * 			throw Error("expected a name and an age")
 * 		return { name, age }
 * 	},
 * )
 * ```
 */
export function propertyCodec<P>(
	encode: (properties: P) => JsonObject,
	decode: (node: JsonValue) => P,
): PropertyCodec<P> {
	return { encode, decode }
}

/**
 * Pass plain JSON objects through unchanged. Decoding anything but an object
 * fails.
 */
export const jsonProperties: PropertyCodec<JsonObject> = propertyCodec(
	(properties) => properties,
	(node) => {
		if (!isJsonObject(node)) {
			throw Error(`expected an object, got ${describeValue(node)}`)
		}
		return node
	},
)
