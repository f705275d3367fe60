/**
 * Read FeatureCollections from text, bytes or streams.
 *
 * @module
 */

import type { Geometry } from "@geocodec/geometry"
import {
	logProgress,
	type OnProgress,
	progressEvent,
} from "@geocodec/shared/progress"
import { streamToText } from "@geocodec/shared/stream-to-text"
import type { JsonValue } from "@geocodec/shared/types"
import { decodeFeatureCollectionNode } from "./feature-collection"
import { parseJson } from "./json"
import type { FeatureCollection, PropertyCodec } from "./types"

/**
 * Inputs accepted by `readFeatureCollection`:
 * - `string` - GeoJSON text
 * - `ReadableStream` - UTF-8 bytes of GeoJSON text
 * - `ArrayBufferLike` - UTF-8 bytes of GeoJSON text
 * - `JsonValue` - an already parsed document
 */
export type ReadGeoJSONDataTypes =
	| string
	| ReadableStream<Uint8Array>
	| ArrayBufferLike
	| JsonValue

async function readDataAsJson(
	data: ReadGeoJSONDataTypes,
	onProgress: OnProgress,
): Promise<JsonValue> {
	if (typeof data === "string") return parseJson(data)
	if (data instanceof ReadableStream) {
		const text = await streamToText(data, (bytes) =>
			onProgress(progressEvent(`Read ${bytes} bytes`, bytes)),
		)
		return parseJson(text)
	}
	if (data instanceof ArrayBuffer || data instanceof SharedArrayBuffer) {
		return parseJson(new TextDecoder().decode(new Uint8Array(data)))
	}
	return data
}

/**
 * Read a GeoJSON FeatureCollection, decoding every feature's properties with
 * `properties`.
 *
 * @param data - GeoJSON in any supported form.
 * @param properties - Codec for the property payload.
 * @param onProgress - Progress callback, logs to the console by default.
 *
 * @example
 * ```ts
 * const response = await fetch("/animals.geojson")
 * const animals = await readFeatureCollection(response.body, animalProperties)
 * ```
 */
export async function readFeatureCollection<P>(
	data: ReadGeoJSONDataTypes,
	properties: PropertyCodec<P>,
	onProgress: OnProgress = logProgress,
): Promise<FeatureCollection<Geometry, P>> {
	onProgress(progressEvent("Reading GeoJSON..."))
	const node = await readDataAsJson(data, onProgress)
	const collection = decodeFeatureCollectionNode(node, properties)
	onProgress(
		progressEvent(
			`Decoded ${collection.features.length} features`,
			collection.features.length,
		),
	)
	return collection
}
