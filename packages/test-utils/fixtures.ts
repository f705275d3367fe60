import { createReadStream } from "node:fs"
import { readFile } from "node:fs/promises"
import { dirname, join, resolve } from "node:path"
import { Readable } from "node:stream"
import { fileURLToPath } from "node:url"
import {
	type Geometry,
	geometryCollection,
	lineString,
	multiLineString,
	multiPoint,
	multiPolygon,
	point,
	polygon,
} from "@geocodec/geometry"
import { assertValue } from "@geocodec/shared/assert"
import type { JsonObject, JsonValue, Position } from "@geocodec/shared/types"
import type { Geometry as GeoJSONGeometry, Position as GeoJSONPosition } from "geojson"
import { parse } from "wellknown"

const __dirname = dirname(fileURLToPath(import.meta.url))
const ROOT_DIR = resolve(__dirname, "../../")
const FIXTURES_DIR = resolve(ROOT_DIR, "fixtures")

export function getFixturePath(name: string) {
	return join(FIXTURES_DIR, name)
}

export async function getFixtureText(name: string): Promise<string> {
	return readFile(getFixturePath(name), "utf8")
}

export function getFixtureFileReadStream(name: string) {
	return Readable.toWeb(
		createReadStream(getFixturePath(name)),
	) as unknown as ReadableStream<Uint8Array>
}

function toPosition(position: GeoJSONPosition): Position {
	const [x, y, z] = position
	assertValue(x, "Position is missing x")
	assertValue(y, "Position is missing y")
	return z === undefined ? [x, y] : [x, y, z]
}

function toPositions(positions: GeoJSONPosition[]): Position[] {
	return positions.map(toPosition)
}

/**
 * Build a geometry value from a parsed GeoJSON geometry without going through
 * the codec under test.
 */
function fromParsedGeometry(geometry: GeoJSONGeometry): Geometry {
	switch (geometry.type) {
		case "Point":
			return geometry.coordinates.length === 0
				? point()
				: point(toPosition(geometry.coordinates))
		case "LineString":
			return lineString(toPositions(geometry.coordinates))
		case "Polygon": {
			const [shell = [], ...holes] = geometry.coordinates
			return polygon(toPositions(shell), holes.map(toPositions))
		}
		case "MultiPoint":
			return multiPoint(geometry.coordinates.map(toPosition))
		case "MultiLineString":
			return multiLineString(geometry.coordinates.map(toPositions))
		case "MultiPolygon":
			return multiPolygon(
				geometry.coordinates.map(([shell = [], ...holes]) =>
					polygon(toPositions(shell), holes.map(toPositions)),
				),
			)
		case "GeometryCollection":
			return geometryCollection(geometry.geometries.map(fromParsedGeometry))
	}
}

/**
 * Build a geometry from well-known text.
 *
 * @example
 * ```ts
 * const hole = geometryFromWkt("POLYGON((0 0,10 0,10 10,0 10,0 0),(5 5,7 5,7 7,5 7,5 5))")
 * ```
 */
export function geometryFromWkt(wkt: string): Geometry {
	const parsed: GeoJSONGeometry | null = parse(wkt)
	assertValue(parsed, `Invalid WKT: ${wkt}`)
	return fromParsedGeometry(parsed)
}

/**
 * WKT for one geometry of every kind.
 */
export const WKT_FIXTURES = {
	point: "POINT(15 20)",
	linestring: "LINESTRING(0 0, 10 10, 20 25, 50 60)",
	polygon: "POLYGON((0 0,10 0,10 10,0 10,0 0),(5 5,7 5,7 7,5 7, 5 5))",
	multipoint: "MULTIPOINT(0 0, 20 20, 60 60)",
	multilinestring: "MULTILINESTRING((10 10, 20 20), (15 15, 30 15))",
	multipolygon:
		"MULTIPOLYGON(((0 0,10 0,10 10,0 10,0 0)),((5 5,7 5,7 7,5 7, 5 5)))",
	geometrycollection:
		"GEOMETRYCOLLECTION(POINT(10 10), POINT(30 30), LINESTRING(15 15, 20 20))",
} as const

/**
 * Example property payload: an animal with a name and an age.
 */
export class Animal {
	constructor(
		readonly name: string,
		readonly age: number,
	) {}
}

function isObject(node: JsonValue): node is JsonObject {
	return typeof node === "object" && node !== null && !Array.isArray(node)
}

/**
 * Property codec for `Animal`, written against the codec's `PropertyCodec`
 * shape without importing it so the fixtures stay independent of the codec.
 */
export const animalProperties = {
	encode(animal: Animal): JsonObject {
		return { name: animal.name, age: animal.age }
	},
	decode(node: JsonValue): Animal {
		if (!isObject(node)) throw Error("Animal properties must be an object")
		const { name, age } = node
		if (typeof name !== "string") throw Error("Animal name must be a string")
		if (typeof age !== "number" || !Number.isInteger(age)) {
			throw Error("Animal age must be an integer")
		}
		return new Animal(name, age)
	},
}
