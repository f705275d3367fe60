/**
 * Feature envelope.
 *
 * Members are written in the order `type`, `id`, `geometry`, `properties`,
 * `bbox`. A missing `geometry` or `properties` is written as `null`; a missing
 * `id` or `bbox` is left out.
 *
 * @module
 */

import { type Geometry, geometryBBox } from "@geocodec/geometry"
import type { BBox, JsonObject } from "@geocodec/shared/types"
import type {
	Feature as GeoJSONFeature,
	Geometry as GeoJSONGeometry,
} from "geojson"
import { readBBox } from "./bbox"
import {
	describeValue,
	GeoJSONError,
	memberPath,
	ROOT_PATH,
} from "./errors"
import { decodeGeometry, encodeGeometry } from "./geometry-codec"
import { hasMember, isJsonObject } from "./json"
import { type GeoJSONEncodeOptions, resolveEncodeOptions } from "./options"
import type { EnvelopeType, Feature, FeatureId, PropertyCodec } from "./types"

export type FeatureNode = GeoJSONFeature<GeoJSONGeometry | null>

/**
 * Create a feature.
 *
 * @example
 * ```ts
 * const dog = feature(point([32.6, 12.3]), { name: "Brutus", age: 4 }, { id: "dog-1" })
 * ```
 */
export function feature<G extends Geometry, P>(
	geometry: G | null,
	properties: P | null,
	options: { id?: FeatureId; bbox?: BBox } = {},
): Feature<G, P> {
	return {
		type: "Feature",
		...(options.id === undefined ? {} : { id: options.id }),
		...(options.bbox === undefined ? {} : { bbox: options.bbox }),
		geometry,
		properties,
	}
}

/**
 * Encode a feature as a GeoJSON Feature object, encoding the payload with
 * `properties`.
 */
export function encodeFeatureNode<G extends Geometry, P>(
	value: Feature<G, P>,
	properties: PropertyCodec<P>,
	options: Partial<GeoJSONEncodeOptions> = {},
): FeatureNode {
	const { bbox: computeBBox } = resolveEncodeOptions(options)
	const bbox =
		value.bbox ??
		(computeBBox && value.geometry ? geometryBBox(value.geometry) : undefined)
	return {
		type: "Feature",
		...(value.id === undefined ? {} : { id: value.id }),
		geometry: value.geometry === null ? null : encodeGeometry(value.geometry),
		properties:
			value.properties === null ? null : properties.encode(value.properties),
		...(bbox === undefined ? {} : { bbox }),
	}
}

/**
 * Check that `node` is an object tagged `type`.
 *
 * @throws GeoJSONError `UnknownEnvelopeType`
 */
export function expectEnvelope(
	node: unknown,
	type: EnvelopeType,
	path: string,
): JsonObject {
	if (!isJsonObject(node)) {
		throw new GeoJSONError(
			"UnknownEnvelopeType",
			path,
			`expected a ${type} object, got ${describeValue(node)}`,
		)
	}
	if (node["type"] !== type) {
		throw new GeoJSONError(
			"UnknownEnvelopeType",
			memberPath(path, "type"),
			`expected ${type}, got ${node["type"] === undefined ? "no type" : describeValue(node["type"])}`,
		)
	}
	return node
}

function readId(node: JsonObject, path: string): FeatureId | undefined {
	const id = node["id"]
	if (id === undefined || id === null) return undefined
	if (typeof id === "string" || typeof id === "number") return id
	throw new GeoJSONError(
		"MalformedFeature",
		memberPath(path, "id"),
		`expected a string or number id, got ${describeValue(id)}`,
	)
}

/**
 * Decode a GeoJSON Feature object, decoding its payload with `properties`.
 *
 * A null or missing `geometry` or `properties` member decodes to `null`.
 *
 * @throws GeoJSONError `UnknownEnvelopeType`, `MalformedFeature`,
 * `MalformedBBox`, `PropertyDecodeError` or any geometry decode error.
 */
export function decodeFeatureNode<P>(
	node: unknown,
	properties: PropertyCodec<P>,
	path: string = ROOT_PATH,
): Feature<Geometry, P> {
	const object = expectEnvelope(node, "Feature", path)
	const id = readId(object, path)

	const geometryNode = object["geometry"]
	const geometry =
		geometryNode === undefined || geometryNode === null
			? null
			: decodeGeometry(geometryNode, memberPath(path, "geometry"))

	const propertiesNode = object["properties"]
	let payload: P | null = null
	if (propertiesNode !== undefined && propertiesNode !== null) {
		try {
			payload = properties.decode(propertiesNode)
		} catch (error) {
			throw new GeoJSONError(
				"PropertyDecodeError",
				memberPath(path, "properties"),
				error instanceof Error ? error.message : String(error),
				{ cause: error },
			)
		}
	}

	const bbox =
		hasMember(object, "bbox") && object["bbox"] !== null
			? readBBox(object["bbox"], memberPath(path, "bbox"))
			: undefined

	return feature(geometry, payload, { id, bbox })
}
