/**
 * Feature and FeatureCollection envelopes.
 *
 * Both are generic over the geometry type `G` and the property payload `P`.
 * The codec never looks inside `P`; a `PropertyCodec<P>` supplied by the
 * caller turns it into JSON and back.
 *
 * @module
 */

import type { Geometry } from "@geocodec/geometry"
import type { BBox, JsonObject, JsonValue } from "@geocodec/shared/types"

export type FeatureId = string | number

export interface Feature<G extends Geometry = Geometry, P = JsonObject> {
	readonly type: "Feature"
	readonly id?: FeatureId
	readonly bbox?: BBox
	/** Null when the feature has no location. */
	readonly geometry: G | null
	readonly properties: P | null
}

export interface FeatureCollection<G extends Geometry = Geometry, P = JsonObject> {
	readonly type: "FeatureCollection"
	readonly bbox?: BBox
	readonly features: readonly Feature<G, P>[]
}

/** Top-level GeoJSON envelope tags. */
export type EnvelopeType = "Feature" | "FeatureCollection"

/**
 * Caller-supplied conversion between a property payload and JSON.
 *
 * `decode` may throw; the envelope reports the failure as a
 * `PropertyDecodeError` at the `properties` member.
 */
export interface PropertyCodec<P> {
	encode(properties: P): JsonObject
	decode(node: JsonValue): P
}
