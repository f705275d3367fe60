/**
 * Geometry value types.
 *
 * Geometries are plain, frozen objects discriminated by `kind`. Multi
 * geometries own their parts and a GeometryCollection owns its children.
 *
 * @module
 */

import type { CoordinateSequence } from "./coordinate-sequence"

/** Every geometry kind, in the order GeoJSON lists them. */
export const GEOMETRY_KINDS = [
	"Point",
	"LineString",
	"Polygon",
	"MultiPoint",
	"MultiLineString",
	"MultiPolygon",
	"GeometryCollection",
] as const

export type GeometryKind = (typeof GEOMETRY_KINDS)[number]

export interface Point {
	readonly kind: "Point"
	/** Zero positions for an empty point, otherwise exactly one. */
	readonly coordinates: CoordinateSequence
}

export interface LineString {
	readonly kind: "LineString"
	readonly coordinates: CoordinateSequence
}

export interface Polygon {
	readonly kind: "Polygon"
	/** Exterior ring. Empty for an empty polygon. */
	readonly shell: CoordinateSequence
	/** Interior rings, in order. */
	readonly holes: readonly CoordinateSequence[]
}

export interface MultiPoint {
	readonly kind: "MultiPoint"
	readonly points: readonly Point[]
}

export interface MultiLineString {
	readonly kind: "MultiLineString"
	readonly lineStrings: readonly LineString[]
}

export interface MultiPolygon {
	readonly kind: "MultiPolygon"
	readonly polygons: readonly Polygon[]
}

export interface GeometryCollection {
	readonly kind: "GeometryCollection"
	readonly geometries: readonly Geometry[]
}

export type Geometry =
	| Point
	| LineString
	| Polygon
	| MultiPoint
	| MultiLineString
	| MultiPolygon
	| GeometryCollection

/** Narrow the geometry union to one kind. */
export type GeometryOfKind<K extends GeometryKind> = Extract<
	Geometry,
	{ kind: K }
>

/** Type guard: check if a value names a geometry kind. */
export function isGeometryKind(value: unknown): value is GeometryKind {
	return GEOMETRY_KINDS.some((kind) => kind === value)
}
