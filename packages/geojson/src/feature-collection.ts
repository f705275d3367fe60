/**
 * FeatureCollection envelope.
 *
 * Features keep their order in both directions; nothing is sorted or
 * de-duplicated.
 *
 * @module
 */

import { type Geometry, mergeBBoxes } from "@geocodec/geometry"
import type { BBox } from "@geocodec/shared/types"
import type {
	FeatureCollection as GeoJSONFeatureCollection,
	Geometry as GeoJSONGeometry,
} from "geojson"
import { readBBox } from "./bbox"
import {
	describeValue,
	elementPath,
	GeoJSONError,
	memberPath,
	ROOT_PATH,
} from "./errors"
import {
	decodeFeatureNode,
	encodeFeatureNode,
	expectEnvelope,
	type FeatureNode,
} from "./feature"
import { hasMember } from "./json"
import { type GeoJSONEncodeOptions, resolveEncodeOptions } from "./options"
import type { Feature, FeatureCollection, PropertyCodec } from "./types"

export type FeatureCollectionNode = GeoJSONFeatureCollection<
	GeoJSONGeometry | null
>

export function featureCollection<G extends Geometry, P>(
	features: readonly Feature<G, P>[],
	options: { bbox?: BBox } = {},
): FeatureCollection<G, P> {
	return {
		type: "FeatureCollection",
		...(options.bbox === undefined ? {} : { bbox: options.bbox }),
		features,
	}
}

/**
 * Encode a collection as a GeoJSON FeatureCollection object. With the `bbox`
 * option, the collection's box covers the boxes of its features.
 */
export function encodeFeatureCollectionNode<G extends Geometry, P>(
	collection: FeatureCollection<G, P>,
	properties: PropertyCodec<P>,
	options: Partial<GeoJSONEncodeOptions> = {},
): FeatureCollectionNode {
	const resolved = resolveEncodeOptions(options)
	const features: FeatureNode[] = collection.features.map((f) =>
		encodeFeatureNode(f, properties, resolved),
	)
	const bbox =
		collection.bbox ??
		(resolved.bbox
			? mergeBBoxes(features.flatMap((f) => (f.bbox ? [f.bbox] : [])))
			: undefined)
	return {
		type: "FeatureCollection",
		features,
		...(bbox === undefined ? {} : { bbox }),
	}
}

/**
 * Decode a GeoJSON FeatureCollection object. Every feature is decoded with
 * the same property codec.
 *
 * @throws GeoJSONError `MissingFeaturesArray` when `features` is missing or
 * not an array, or any error of `decodeFeatureNode` for its elements.
 */
export function decodeFeatureCollectionNode<P>(
	node: unknown,
	properties: PropertyCodec<P>,
	path: string = ROOT_PATH,
): FeatureCollection<Geometry, P> {
	const object = expectEnvelope(node, "FeatureCollection", path)
	const featuresPath = memberPath(path, "features")
	const features = object["features"]
	if (!Array.isArray(features)) {
		throw new GeoJSONError(
			"MissingFeaturesArray",
			featuresPath,
			features === undefined
				? "missing features array"
				: `expected an array of features, got ${describeValue(features)}`,
		)
	}
	const decoded = features.map((f, i) =>
		decodeFeatureNode(f, properties, elementPath(featuresPath, i)),
	)
	const bbox =
		hasMember(object, "bbox") && object["bbox"] !== null
			? readBBox(object["bbox"], memberPath(path, "bbox"))
			: undefined
	return featureCollection(decoded, { bbox })
}
