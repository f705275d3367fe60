import type { CoordinateSequence } from "./coordinate-sequence"
import type { Geometry } from "./types"

function sequencesEqual(
	a: readonly CoordinateSequence[],
	b: readonly CoordinateSequence[],
) {
	return a.length === b.length && a.every((s, i) => b[i]?.equals(s) === true)
}

function partsEqual(a: readonly Geometry[], b: readonly Geometry[]) {
	return a.length === b.length && a.every((g, i) => {
		const other = b[i]
		return other !== undefined && geometryEquals(g, other)
	})
}

/**
 * Exact geometric equality: same kind, same coordinates in the same order
 * and, for multi geometries and collections, equal parts in the same order.
 */
export function geometryEquals(a: Geometry, b: Geometry): boolean {
	if (a === b) return true
	switch (a.kind) {
		case "Point":
			return b.kind === "Point" && a.coordinates.equals(b.coordinates)
		case "LineString":
			return b.kind === "LineString" && a.coordinates.equals(b.coordinates)
		case "Polygon":
			return (
				b.kind === "Polygon" &&
				a.shell.equals(b.shell) &&
				sequencesEqual(a.holes, b.holes)
			)
		case "MultiPoint":
			return b.kind === "MultiPoint" && partsEqual(a.points, b.points)
		case "MultiLineString":
			return (
				b.kind === "MultiLineString" && partsEqual(a.lineStrings, b.lineStrings)
			)
		case "MultiPolygon":
			return b.kind === "MultiPolygon" && partsEqual(a.polygons, b.polygons)
		case "GeometryCollection":
			return (
				b.kind === "GeometryCollection" &&
				partsEqual(a.geometries, b.geometries)
			)
	}
}
