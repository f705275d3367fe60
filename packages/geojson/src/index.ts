/**
 * @geocodec/geojson - GeoJSON codec for geometry values and feature envelopes.
 *
 * - **Geometries**: all seven GeoJSON geometry types, shaped per kind through
 *   one coordinate shape table and dispatched on their `type` tag.
 * - **Features**: `Feature<G, P>` and `FeatureCollection<G, P>` envelopes
 *   whose property payload is encoded and decoded by a caller-supplied
 *   `PropertyCodec<P>`.
 * - **Errors**: every decode failure is a `GeoJSONError` with a `code` and the
 *   JSON path of the offending member.
 *
 * @example
 * ```ts
 * import { point } from "@geocodec/geometry"
 * import { decodeFeature, encodeFeature, feature, jsonProperties } from "@geocodec/geojson"
 *
 * const text = encodeFeature(feature(point([32.6, 12.3]), { name: "Brutus" }), jsonProperties)
 * const dog = decodeFeature(text, jsonProperties)
 * ```
 *
 * @module @geocodec/geojson
 */

export * from "./bbox"
export * from "./codec"
export * from "./dispatch"
export * from "./envelope"
export * from "./equals"
export * from "./errors"
export * from "./feature"
export * from "./feature-collection"
export * from "./geometry-codec"
export * from "./json"
export * from "./options"
export * from "./properties"
export * from "./read"
export * from "./shapes"
export * from "./types"
