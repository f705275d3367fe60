/**
 * Coordinate shaping per geometry kind.
 *
 * `COORDINATE_SHAPES` is the single table of how deep each kind nests its
 * `coordinates` array and how positions map onto geometry parts. The geometry
 * codec writes and reads through it in both directions.
 *
 * | Kind                     | Depth | Shape                     |
 * | ------------------------ | ----- | ------------------------- |
 * | Point                    | 1     | `[x, y]`                  |
 * | LineString, MultiPoint   | 2     | `[[x, y], ...]`           |
 * | Polygon, MultiLineString | 3     | `[[[x, y], ...], ...]`    |
 * | MultiPolygon             | 4     | `[[[[x, y], ...], ...], ...]` |
 *
 * @module
 */

import {
	CoordinateSequence,
	type GeometryKind,
	type GeometryOfKind,
	lineString,
	multiLineString,
	multiPoint,
	multiPolygon,
	type Point,
	type Polygon,
	point,
	polygon,
} from "@geocodec/geometry"
import type { Position } from "@geocodec/shared/types"
import type { Geometry as GeoJSONGeometry } from "geojson"
import { describeValue, elementPath, GeoJSONError } from "./errors"

/** Geometry kinds that carry a `coordinates` member. */
export type CoordinateKind = Exclude<GeometryKind, "GeometryCollection">

/** Nesting depth of a `coordinates` array. */
export type CoordinateDepth = 1 | 2 | 3 | 4

/** The `coordinates` member GeoJSON defines for a kind. */
export type CoordinatesOfKind<K extends CoordinateKind> = Extract<
	GeoJSONGeometry,
	{ type: K }
>["coordinates"]

export interface CoordinateShape<K extends CoordinateKind> {
	readonly depth: CoordinateDepth
	write(geometry: GeometryOfKind<K>): CoordinatesOfKind<K>
	/**
	 * Validate a `coordinates` node and build the geometry from it.
	 *
	 * @throws GeoJSONError `MalformedCoordinates`
	 */
	read(node: unknown, path: string): GeometryOfKind<K>
}

/** Number of ordinates a position may have. */
export const MIN_ORDINATES = 2
export const MAX_ORDINATES = 3

function malformed(path: string, message: string) {
	return new GeoJSONError("MalformedCoordinates", path, message)
}

function readOrdinate(node: unknown, path: string): number {
	if (Array.isArray(node)) {
		throw malformed(path, "expected a number, got an array (nested too deep)")
	}
	if (typeof node !== "number" || !Number.isFinite(node)) {
		throw malformed(path, `expected a number, got ${describeValue(node)}`)
	}
	return node
}

function readArray<T>(
	node: unknown,
	path: string,
	readElement: (element: unknown, path: string) => T,
): T[] {
	if (!Array.isArray(node)) {
		const depthHint = typeof node === "number" ? " (nested too shallow)" : ""
		throw malformed(path, `expected an array, got ${describeValue(node)}${depthHint}`)
	}
	return node.map((element, i) => readElement(element, elementPath(path, i)))
}

/**
 * Read an `[x, y]` or `[x, y, z]` tuple.
 */
export function readPosition(node: unknown, path: string): Position {
	const ordinates = readArray(node, path, readOrdinate)
	const [x, y, z] = ordinates
	if (
		ordinates.length < MIN_ORDINATES ||
		ordinates.length > MAX_ORDINATES ||
		x === undefined ||
		y === undefined
	) {
		throw malformed(
			path,
			`expected ${MIN_ORDINATES} or ${MAX_ORDINATES} ordinates, got ${ordinates.length}`,
		)
	}
	return z === undefined ? [x, y] : [x, y, z]
}

/**
 * Check that every non-empty position has the dimension of the first one.
 */
function checkDimension(
	positions: readonly (Position | [])[],
	path: string,
): void {
	const dimension = positions.find((position) => position.length > 0)?.length
	positions.forEach((position, i) => {
		if (position.length > 0 && position.length !== dimension) {
			throw malformed(
				elementPath(path, i),
				`expected ${dimension} ordinates like the first position, got ${position.length}`,
			)
		}
	})
}

/**
 * Read a list of positions that share one dimension.
 */
export function readSequence(node: unknown, path: string): CoordinateSequence {
	const positions = readArray(node, path, readPosition)
	checkDimension(positions, path)
	return CoordinateSequence.from(positions)
}

/** Point coordinates: a position, or `[]` for an empty point. */
function readPoint(node: unknown, path: string): Point {
	if (Array.isArray(node) && node.length === 0) return point()
	return point(readPosition(node, path))
}

function writePoint(geometry: Point): Position | [] {
	return geometry.coordinates.isEmpty() ? [] : geometry.coordinates.get(0)
}

/** Polygon rings: shell first, then holes. `[]` is an empty polygon. */
function readPolygon(node: unknown, path: string): Polygon {
	const [shell, ...holes] = readArray(node, path, readSequence)
	return shell === undefined ? polygon([]) : polygon(shell, holes)
}

function writePolygon(geometry: Polygon): Position[][] {
	if (geometry.shell.isEmpty() && geometry.holes.length === 0) return []
	return [geometry.shell, ...geometry.holes].map((ring) => ring.toPositions())
}

export const COORDINATE_SHAPES: {
	readonly [K in CoordinateKind]: CoordinateShape<K>
} = {
	Point: {
		depth: 1,
		write: writePoint,
		read: readPoint,
	},
	LineString: {
		depth: 2,
		write: (geometry) => geometry.coordinates.toPositions(),
		read: (node, path) => lineString(readSequence(node, path)),
	},
	MultiPoint: {
		depth: 2,
		write: (geometry) => geometry.points.map(writePoint),
		read: (node, path) => {
			const points = readArray(node, path, readPoint)
			checkDimension(points.map(writePoint), path)
			return multiPoint(points)
		},
	},
	Polygon: {
		depth: 3,
		write: writePolygon,
		read: readPolygon,
	},
	MultiLineString: {
		depth: 3,
		write: (geometry) =>
			geometry.lineStrings.map((line) => line.coordinates.toPositions()),
		read: (node, path) =>
			multiLineString(readArray(node, path, readSequence)),
	},
	MultiPolygon: {
		depth: 4,
		write: (geometry) => geometry.polygons.map(writePolygon),
		read: (node, path) => multiPolygon(readArray(node, path, readPolygon)),
	},
}

/** Type guard: check if a kind carries a `coordinates` member. */
export function isCoordinateKind(kind: GeometryKind): kind is CoordinateKind {
	return kind !== "GeometryCollection"
}
