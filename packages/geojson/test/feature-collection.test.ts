import { type Geometry, point } from "@geocodec/geometry"
import type { JsonObject } from "@geocodec/shared/types"
import { Animal, animalProperties } from "@geocodec/test-utils/fixtures"
import { describe, expect, it } from "vitest"
import {
	decodeFeatureCollection,
	decodeGeoJSON,
	encodeFeatureCollection,
} from "../src/codec"
import { isFeatureCollection } from "../src/envelope"
import { featureCollectionEquals, featureEquals } from "../src/equals"
import { feature } from "../src/feature"
import {
	encodeFeatureCollectionNode,
	featureCollection,
} from "../src/feature-collection"
import { jsonProperties } from "../src/properties"
import { catchGeoJSONError } from "./helpers"

describe("feature collection", () => {
	const animals = featureCollection([
		feature(point([32.6, 12.3]), new Animal("Brutus", 4)),
		feature(point([45.1, 19.8]), new Animal("Tweety", 2)),
	])

	it("writes features in order", () => {
		const text = encodeFeatureCollection(animals, animalProperties)
		expect(text).toBe(
			'{"type":"FeatureCollection","features":[' +
				'{"type":"Feature","geometry":{"type":"Point","coordinates":[32.6,12.3]},"properties":{"name":"Brutus","age":4}},' +
				'{"type":"Feature","geometry":{"type":"Point","coordinates":[45.1,19.8]},"properties":{"name":"Tweety","age":2}}]}',
		)
		expect(text).toContain('"type":"Feature"')
		expect(text).toContain('"type":"FeatureCollection"')
	})

	it("reads features back pairwise equal", () => {
		const decoded = decodeFeatureCollection(
			encodeFeatureCollection(animals, animalProperties),
			animalProperties,
		)
		expect(decoded.features).toHaveLength(2)
		decoded.features.forEach((f, i) => {
			const original = animals.features[i]
			expect(original !== undefined && featureEquals(f, original)).toBe(true)
		})
		expect(decoded.features[1]?.properties?.name).toBe("Tweety")
		expect(featureCollectionEquals(decoded, animals)).toBe(true)
	})

	it("keeps an empty collection", () => {
		const text = encodeFeatureCollection(featureCollection<Geometry, JsonObject>([]), jsonProperties)
		expect(text).toBe('{"type":"FeatureCollection","features":[]}')
		expect(decodeFeatureCollection(text, jsonProperties).features).toEqual([])
	})

	it("computes boxes for features and the collection", () => {
		const node = encodeFeatureCollectionNode(animals, animalProperties, {
			bbox: true,
		})
		expect(node.features[0]?.bbox).toEqual([32.6, 12.3, 32.6, 12.3])
		expect(node.features[1]?.bbox).toEqual([45.1, 19.8, 45.1, 19.8])
		expect(node.bbox).toEqual([32.6, 12.3, 45.1, 19.8])
	})

	it("keeps a bbox it was given", () => {
		const text = encodeFeatureCollection(
			featureCollection<Geometry, JsonObject>([], { bbox: [0, 0, 1, 1] }),
			jsonProperties,
		)
		expect(text).toBe('{"type":"FeatureCollection","features":[],"bbox":[0,0,1,1]}')
		expect(decodeFeatureCollection(text, jsonProperties).bbox).toEqual([0, 0, 1, 1])
	})

	it("rejects a missing features array", () => {
		const missing = catchGeoJSONError(() =>
			decodeFeatureCollection('{"type":"FeatureCollection"}', jsonProperties),
		)
		expect(missing.code).toBe("MissingFeaturesArray")
		expect(missing.message).toBe(
			"MissingFeaturesArray at $.features: missing features array",
		)

		const object = catchGeoJSONError(() =>
			decodeFeatureCollection(
				'{"type":"FeatureCollection","features":{}}',
				jsonProperties,
			),
		)
		expect(object.message).toBe(
			"MissingFeaturesArray at $.features: expected an array of features, got an object",
		)
	})

	it("reports the path of a failing feature", () => {
		const error = catchGeoJSONError(() =>
			decodeFeatureCollection(
				'{"type":"FeatureCollection","features":[' +
					'{"type":"Feature","geometry":null,"properties":null},' +
					'{"type":"Feature","geometry":{"type":"LineString","coordinates":[5,[1,2]]},"properties":null}]}',
				jsonProperties,
			),
		)
		expect(error.code).toBe("MalformedCoordinates")
		expect(error.path).toBe("$.features[1].geometry.coordinates[0]")
		expect(error.message).toBe(
			"MalformedCoordinates at $.features[1].geometry.coordinates[0]: expected an array, got number 5 (nested too shallow)",
		)
	})
})

describe("decodeGeoJSON", () => {
	it("reads whichever envelope the text holds", () => {
		const single = decodeGeoJSON(
			'{"type":"Feature","geometry":{"type":"Point","coordinates":[1,2]},"properties":{"name":"Rex","age":9}}',
			animalProperties,
		)
		expect(isFeatureCollection(single)).toBe(false)
		if (single.type === "Feature") expect(single.properties?.name).toBe("Rex")

		const many = decodeGeoJSON(
			'{"type":"FeatureCollection","features":[{"type":"Feature","geometry":null,"properties":null}]}',
			animalProperties,
		)
		expect(isFeatureCollection(many)).toBe(true)
		if (isFeatureCollection(many)) expect(many.features).toHaveLength(1)
	})

	it("rejects other top-level types", () => {
		const error = catchGeoJSONError(() =>
			decodeGeoJSON('{"type":"Point","coordinates":[1,2]}', jsonProperties),
		)
		expect(error.code).toBe("UnknownEnvelopeType")
		expect(error.message).toBe(
			'UnknownEnvelopeType at $.type: unknown envelope type the string "Point", expected one of Feature, FeatureCollection',
		)
	})
})
