import {
	type Geometry,
	geometryEquals,
	lineString,
	point,
} from "@geocodec/geometry"
import type { JsonObject } from "@geocodec/shared/types"
import { Animal, animalProperties } from "@geocodec/test-utils/fixtures"
import { describe, expect, it } from "vitest"
import { decodeFeature, encodeFeature } from "../src/codec"
import { featureEquals } from "../src/equals"
import { feature } from "../src/feature"
import { jsonProperties } from "../src/properties"
import { catchGeoJSONError } from "./helpers"

describe("feature", () => {
	const dog = feature(point([32.6, 12.3]), new Animal("Brutus", 4))

	it("writes members in order", () => {
		const text = encodeFeature(dog, animalProperties)
		expect(text).toBe(
			'{"type":"Feature","geometry":{"type":"Point","coordinates":[32.6,12.3]},"properties":{"name":"Brutus","age":4}}',
		)
		expect(text).toContain('"type":"Feature"')
	})

	it("reads back geometry and each property", () => {
		const decoded = decodeFeature(encodeFeature(dog, animalProperties), animalProperties)
		expect(decoded.geometry?.kind).toBe("Point")
		expect(
			decoded.geometry !== null && geometryEquals(decoded.geometry, point([32.6, 12.3])),
		).toBe(true)
		expect(decoded.properties).toBeInstanceOf(Animal)
		expect(decoded.properties?.name).toBe("Brutus")
		expect(decoded.properties?.age).toBe(4)
		expect(featureEquals(decoded, dog)).toBe(true)
	})

	it("writes absent geometry and properties as null", () => {
		expect(
			encodeFeature(feature<Geometry, JsonObject>(null, null), jsonProperties),
		).toBe('{"type":"Feature","geometry":null,"properties":null}')
	})

	it("reads null and missing members as absent", () => {
		expect(
			decodeFeature(
				'{"type":"Feature","geometry":null,"properties":null}',
				jsonProperties,
			),
		).toEqual({ type: "Feature", geometry: null, properties: null })
		expect(decodeFeature('{"type":"Feature","id":null}', jsonProperties)).toEqual(
			{ type: "Feature", geometry: null, properties: null },
		)
	})

	it("writes id and bbox when set", () => {
		const properties: JsonObject = { kind: "marker" }
		const marker = feature(point([1, 2]), properties, {
			id: 42,
			bbox: [1, 2, 1, 2],
		})
		const text = encodeFeature(marker, jsonProperties)
		expect(text).toBe(
			'{"type":"Feature","id":42,"geometry":{"type":"Point","coordinates":[1,2]},"properties":{"kind":"marker"},"bbox":[1,2,1,2]}',
		)
		const decoded = decodeFeature(text, jsonProperties)
		expect(decoded.id).toBe(42)
		expect(decoded.bbox).toEqual([1, 2, 1, 2])
		expect(featureEquals(decoded, marker)).toBe(true)
	})

	it("keeps string ids", () => {
		const decoded = decodeFeature(
			'{"type":"Feature","id":"dog-1","geometry":null,"properties":{}}',
			jsonProperties,
		)
		expect(decoded.id).toBe("dog-1")
		expect(decoded.properties).toEqual({})
	})

	it("computes a bbox on request", () => {
		const properties: JsonObject = {}
		const line = feature(
			lineString([
				[0, 0],
				[10, 10],
				[20, 25],
			]),
			properties,
		)
		expect(encodeFeature(line, jsonProperties, { bbox: true })).toBe(
			'{"type":"Feature","geometry":{"type":"LineString","coordinates":[[0,0],[10,10],[20,25]]},"properties":{},"bbox":[0,0,20,25]}',
		)
		expect(
			encodeFeature(feature<Geometry, JsonObject>(null, properties), jsonProperties, {
				bbox: true,
			}),
		).toBe('{"type":"Feature","geometry":null,"properties":{}}')
	})

	it("pretty prints with an indent", () => {
		expect(
			encodeFeature(feature<Geometry, JsonObject>(null, null), jsonProperties, {
				indent: 2,
			}),
		).toBe('{\n  "type": "Feature",\n  "geometry": null,\n  "properties": null\n}')
	})
})

describe("feature decode errors", () => {
	it("wraps property decode failures", () => {
		const error = catchGeoJSONError(() =>
			decodeFeature(
				'{"type":"Feature","geometry":null,"properties":{"name":"Brutus","age":"four"}}',
				animalProperties,
			),
		)
		expect(error.code).toBe("PropertyDecodeError")
		expect(error.path).toBe("$.properties")
		expect(error.message).toBe(
			"PropertyDecodeError at $.properties: Animal age must be an integer",
		)
		expect(error.cause).toBeInstanceOf(Error)
	})

	it("rejects properties that are not objects", () => {
		const error = catchGeoJSONError(() =>
			decodeFeature('{"type":"Feature","geometry":null,"properties":5}', jsonProperties),
		)
		expect(error.message).toBe(
			"PropertyDecodeError at $.properties: expected an object, got number 5",
		)
	})

	it("rejects other envelope types", () => {
		const error = catchGeoJSONError(() =>
			decodeFeature('{"type":"Point","coordinates":[1,2]}', jsonProperties),
		)
		expect(error.code).toBe("UnknownEnvelopeType")
		expect(error.message).toBe(
			'UnknownEnvelopeType at $.type: expected Feature, got the string "Point"',
		)
		expect(
			catchGeoJSONError(() => decodeFeature("[]", jsonProperties)).message,
		).toBe("UnknownEnvelopeType at $: expected a Feature object, got an array")
	})

	it("rejects ids that are not strings or numbers", () => {
		const error = catchGeoJSONError(() =>
			decodeFeature(
				'{"type":"Feature","id":true,"geometry":null,"properties":null}',
				jsonProperties,
			),
		)
		expect(error.code).toBe("MalformedFeature")
		expect(error.message).toBe(
			"MalformedFeature at $.id: expected a string or number id, got boolean true",
		)
	})

	it("rejects malformed bboxes", () => {
		const short = catchGeoJSONError(() =>
			decodeFeature(
				'{"type":"Feature","bbox":[0,0,1],"geometry":null,"properties":null}',
				jsonProperties,
			),
		)
		expect(short.code).toBe("MalformedBBox")
		expect(short.message).toBe("MalformedBBox at $.bbox: expected 4 or 6 numbers, got 3")

		const text = catchGeoJSONError(() =>
			decodeFeature(
				'{"type":"Feature","bbox":[0,"a",1,1],"geometry":null,"properties":null}',
				jsonProperties,
			),
		)
		expect(text.path).toBe("$.bbox[1]")
	})

	it("reports geometry errors under the geometry member", () => {
		const error = catchGeoJSONError(() =>
			decodeFeature(
				'{"type":"Feature","geometry":{"type":"Circle"},"properties":null}',
				jsonProperties,
			),
		)
		expect(error.code).toBe("UnknownGeometryType")
		expect(error.path).toBe("$.geometry.type")
	})
})
