/**
 * Tag-driven decode dispatch.
 *
 * A `TypeDispatcher` reads the `type` member of a JSON object and hands the
 * whole object to the routine registered for that tag. The routine table is
 * fixed when the dispatcher is created.
 *
 * @module
 */

import type { JsonObject } from "@geocodec/shared/types"
import {
	describeValue,
	GeoJSONError,
	type GeoJSONErrorCode,
	memberPath,
} from "./errors"
import { isJsonObject } from "./json"

/** Decode routine for one tag. Receives the full object, `type` included. */
export type DecodeRoutine<T> = (node: JsonObject, path: string) => T

export class TypeDispatcher<T, Tag extends string = string> {
	private readonly routines: ReadonlyMap<string, DecodeRoutine<T>>
	private readonly unknownCode: GeoJSONErrorCode
	private readonly label: string

	/**
	 * @param routines - Decode routine per tag.
	 * @param unknownCode - Error code raised for a missing or unrecognized tag.
	 * @param label - What the tags name, for error messages.
	 */
	constructor(
		routines: { readonly [K in Tag]: DecodeRoutine<T> },
		unknownCode: GeoJSONErrorCode,
		label: string,
	) {
		this.routines = new Map(Object.entries<DecodeRoutine<T>>(routines))
		this.unknownCode = unknownCode
		this.label = label
	}

	/** Registered tags, in registration order. */
	get tags(): string[] {
		return [...this.routines.keys()]
	}

	has(tag: unknown): tag is Tag {
		return typeof tag === "string" && this.routines.has(tag)
	}

	/**
	 * Select the routine for the node's `type` member and run it.
	 *
	 * @throws GeoJSONError with the dispatcher's unknown-tag code when the node
	 * is not an object or its tag is missing or unrecognized.
	 */
	decode(node: unknown, path: string): T {
		if (!isJsonObject(node)) {
			throw new GeoJSONError(
				this.unknownCode,
				path,
				`expected a ${this.label} object, got ${describeValue(node)}`,
			)
		}
		const tag = node["type"]
		const routine = typeof tag === "string" ? this.routines.get(tag) : undefined
		if (routine === undefined) {
			throw new GeoJSONError(
				this.unknownCode,
				memberPath(path, "type"),
				tag === undefined
					? `missing ${this.label} type`
					: `unknown ${this.label} type ${describeValue(tag)}, expected one of ${this.tags.join(", ")}`,
			)
		}
		return routine(node, path)
	}
}
