/**
 * Read access to geometry parts.
 *
 * Simple geometries count as a single part of themselves; multi geometries
 * and collections expose their parts in order.
 *
 * @module
 */

import { assertIndex, assertValue } from "@geocodec/shared/assert"
import type { Dimension } from "@geocodec/shared/types"
import type { CoordinateSequence } from "./coordinate-sequence"
import type { Geometry } from "./types"

/** The ordered parts of a geometry. */
export function geometryParts(geometry: Geometry): readonly Geometry[] {
	switch (geometry.kind) {
		case "MultiPoint":
			return geometry.points
		case "MultiLineString":
			return geometry.lineStrings
		case "MultiPolygon":
			return geometry.polygons
		case "GeometryCollection":
			return geometry.geometries
		default:
			return [geometry]
	}
}

/** Number of parts: children for collections, 1 for simple geometries. */
export function numGeometries(geometry: Geometry): number {
	return geometryParts(geometry).length
}

/** Part at `index`, in the order given by `geometryParts`. */
export function getGeometryN(geometry: Geometry, index: number): Geometry {
	const parts = geometryParts(geometry)
	assertIndex(index, parts.length)
	const part = parts[index]
	assertValue(part, `No geometry at index ${index}`)
	return part
}

/** Every coordinate sequence of a geometry, depth first. */
export function* coordinateSequences(
	geometry: Geometry,
): Generator<CoordinateSequence> {
	switch (geometry.kind) {
		case "Point":
		case "LineString":
			yield geometry.coordinates
			return
		case "Polygon":
			yield geometry.shell
			yield* geometry.holes
			return
		default:
			for (const part of geometryParts(geometry)) {
				yield* coordinateSequences(part)
			}
	}
}

/** Total number of positions in a geometry. */
export function numPoints(geometry: Geometry): number {
	let count = 0
	for (const sequence of coordinateSequences(geometry)) count += sequence.size
	return count
}

export function isEmpty(geometry: Geometry): boolean {
	return numPoints(geometry) === 0
}

/**
 * Highest dimension of the non-empty sequences of a geometry, 2 when empty.
 */
export function coordinateDimension(geometry: Geometry): Dimension {
	for (const sequence of coordinateSequences(geometry)) {
		if (sequence.dimension === 3 && !sequence.isEmpty()) return 3
	}
	return 2
}
