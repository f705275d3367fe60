import { describe, expect, it } from "vitest"
import {
	COORDINATE_SHAPES,
	isCoordinateKind,
	readPosition,
	readSequence,
} from "../src/shapes"
import { catchGeoJSONError } from "./helpers"

describe("coordinate shapes", () => {
	it("nests each kind to a fixed depth", () => {
		expect(COORDINATE_SHAPES.Point.depth).toBe(1)
		expect(COORDINATE_SHAPES.LineString.depth).toBe(2)
		expect(COORDINATE_SHAPES.MultiPoint.depth).toBe(2)
		expect(COORDINATE_SHAPES.Polygon.depth).toBe(3)
		expect(COORDINATE_SHAPES.MultiLineString.depth).toBe(3)
		expect(COORDINATE_SHAPES.MultiPolygon.depth).toBe(4)
		expect(isCoordinateKind("GeometryCollection")).toBe(false)
		expect(isCoordinateKind("MultiPolygon")).toBe(true)
	})

	it("reads positions", () => {
		expect(readPosition([1, 2], "$")).toEqual([1, 2])
		expect(readPosition([1, 2, 3], "$")).toEqual([1, 2, 3])
		expect(catchGeoJSONError(() => readPosition([], "$")).message).toBe(
			"MalformedCoordinates at $: expected 2 or 3 ordinates, got 0",
		)
		expect(
			catchGeoJSONError(() => readPosition([1, Number.NaN], "$")).message,
		).toBe("MalformedCoordinates at $[1]: expected a number, got number NaN")
	})

	it("reads sequences of one dimension", () => {
		const sequence = readSequence(
			[
				[0, 0, 1],
				[1, 1, 2],
			],
			"$",
		)
		expect(sequence.dimension).toBe(3)
		expect(sequence.size).toBe(2)
		expect(readSequence([], "$").isEmpty()).toBe(true)
	})

	it("writes and reads through the same table", () => {
		const polygon = COORDINATE_SHAPES.Polygon.read(
			[
				[
					[0, 0],
					[4, 0],
					[0, 4],
					[0, 0],
				],
			],
			"$.coordinates",
		)
		expect(polygon.holes).toHaveLength(0)
		expect(COORDINATE_SHAPES.Polygon.write(polygon)).toEqual([
			[
				[0, 0],
				[4, 0],
				[0, 4],
				[0, 0],
			],
		])
	})
})
