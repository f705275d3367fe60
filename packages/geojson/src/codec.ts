/**
 * GeoJSON text encode/decode.
 *
 * Each function is a `JSON.stringify` / `JSON.parse` wrapper around the node
 * codecs. Decoding either returns a complete value or throws a
 * `GeoJSONError`.
 *
 * @module
 */

import type { Geometry } from "@geocodec/geometry"
import { decodeEnvelopeNode, type Envelope } from "./envelope"
import {
	decodeFeatureNode,
	encodeFeatureNode,
} from "./feature"
import {
	decodeFeatureCollectionNode,
	encodeFeatureCollectionNode,
} from "./feature-collection"
import { decodeGeometry, encodeGeometry } from "./geometry-codec"
import { parseJson, stringifyJson } from "./json"
import { type GeoJSONEncodeOptions, resolveEncodeOptions } from "./options"
import type { Feature, FeatureCollection, PropertyCodec } from "./types"

/**
 * Write a geometry as GeoJSON text.
 *
 * @example
 * ```ts
 * encode(point([15, 20])) // '{"type":"Point","coordinates":[15,20]}'
 * ```
 */
export function encode(
	geometry: Geometry,
	options: Partial<GeoJSONEncodeOptions> = {},
): string {
	return stringifyJson(encodeGeometry(geometry), resolveEncodeOptions(options).indent)
}

/**
 * Read a geometry from GeoJSON text.
 *
 * @throws GeoJSONError `MalformedJSON`, `UnknownGeometryType` or
 * `MalformedCoordinates`.
 */
export function decode(text: string): Geometry {
	return decodeGeometry(parseJson(text))
}

/**
 * Write a feature as GeoJSON text.
 *
 * @example
 * ```ts
 * encodeFeature(feature(point([32.6, 12.3]), { name: "Brutus" }), jsonProperties)
 * // '{"type":"Feature","geometry":{"type":"Point","coordinates":[32.6,12.3]},"properties":{"name":"Brutus"}}'
 * ```
 */
export function encodeFeature<G extends Geometry, P>(
	feature: Feature<G, P>,
	properties: PropertyCodec<P>,
	options: Partial<GeoJSONEncodeOptions> = {},
): string {
	const resolved = resolveEncodeOptions(options)
	return stringifyJson(
		encodeFeatureNode(feature, properties, resolved),
		resolved.indent,
	)
}

/** Read a feature from GeoJSON text. */
export function decodeFeature<P>(
	text: string,
	properties: PropertyCodec<P>,
): Feature<Geometry, P> {
	return decodeFeatureNode(parseJson(text), properties)
}

/** Write a feature collection as GeoJSON text. */
export function encodeFeatureCollection<G extends Geometry, P>(
	collection: FeatureCollection<G, P>,
	properties: PropertyCodec<P>,
	options: Partial<GeoJSONEncodeOptions> = {},
): string {
	const resolved = resolveEncodeOptions(options)
	return stringifyJson(
		encodeFeatureCollectionNode(collection, properties, resolved),
		resolved.indent,
	)
}

/** Read a feature collection from GeoJSON text. */
export function decodeFeatureCollection<P>(
	text: string,
	properties: PropertyCodec<P>,
): FeatureCollection<Geometry, P> {
	return decodeFeatureCollectionNode(parseJson(text), properties)
}

/**
 * Read a Feature or a FeatureCollection, whichever the text holds.
 */
export function decodeGeoJSON<P>(
	text: string,
	properties: PropertyCodec<P>,
): Envelope<P> {
	return decodeEnvelopeNode(parseJson(text), properties)
}
