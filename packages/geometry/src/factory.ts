/**
 * Geometry constructors.
 *
 * Each constructor returns a frozen value. Coordinate inputs may be given as
 * positions or as an existing `CoordinateSequence`, which is shared rather
 * than copied since sequences are immutable.
 *
 * @module
 */

import type { Position } from "@geocodec/shared/types"
import { CoordinateSequence } from "./coordinate-sequence"
import type {
	Geometry,
	GeometryCollection,
	LineString,
	MultiLineString,
	MultiPoint,
	MultiPolygon,
	Point,
	Polygon,
} from "./types"

export type CoordinateInput = readonly Position[] | CoordinateSequence

function toSequence(input: CoordinateInput): CoordinateSequence {
	return input instanceof CoordinateSequence
		? input
		: CoordinateSequence.from(input)
}

/**
 * Create a point. Without a position the point is empty.
 *
 * @example
 * ```ts
 * const p = point([15, 20])
 * p.coordinates.getX(0) // 15
 * ```
 */
export function point(position?: Position | CoordinateSequence): Point {
	let coordinates: CoordinateSequence
	if (position === undefined) {
		coordinates = CoordinateSequence.empty()
	} else if (position instanceof CoordinateSequence) {
		if (position.size > 1) {
			throw Error(`A point has at most one position, got ${position.size}`)
		}
		coordinates = position
	} else {
		coordinates = CoordinateSequence.from([position])
	}
	return Object.freeze({ kind: "Point", coordinates })
}

export function lineString(coordinates: CoordinateInput): LineString {
	return Object.freeze({
		kind: "LineString",
		coordinates: toSequence(coordinates),
	})
}

/**
 * Create a polygon from an exterior ring and optional interior rings.
 * Rings are not checked for closure or orientation.
 */
export function polygon(
	shell: CoordinateInput,
	holes: readonly CoordinateInput[] = [],
): Polygon {
	return Object.freeze({
		kind: "Polygon",
		shell: toSequence(shell),
		holes: Object.freeze(holes.map(toSequence)),
	})
}

export function multiPoint(points: readonly (Point | Position)[]): MultiPoint {
	return Object.freeze({
		kind: "MultiPoint",
		points: Object.freeze(
			points.map((p) => (Array.isArray(p) ? point(p) : p)),
		),
	})
}

export function multiLineString(
	lineStrings: readonly (LineString | CoordinateInput)[],
): MultiLineString {
	return Object.freeze({
		kind: "MultiLineString",
		lineStrings: Object.freeze(
			lineStrings.map((l) => (isLineString(l) ? l : lineString(l))),
		),
	})
}

export function multiPolygon(polygons: readonly Polygon[]): MultiPolygon {
	return Object.freeze({
		kind: "MultiPolygon",
		polygons: Object.freeze([...polygons]),
	})
}

export function geometryCollection(
	geometries: readonly Geometry[],
): GeometryCollection {
	return Object.freeze({
		kind: "GeometryCollection",
		geometries: Object.freeze([...geometries]),
	})
}

function isLineString(
	value: LineString | CoordinateInput,
): value is LineString {
	return "kind" in value && value.kind === "LineString"
}
