/**
 * @geocodec/geometry - Minimal geometry value library.
 *
 * Provides the values the GeoJSON codec reads and builds:
 * - **Kinds**: Point, LineString, Polygon, MultiPoint, MultiLineString,
 *   MultiPolygon and GeometryCollection, discriminated by `kind`.
 * - **Storage**: immutable `CoordinateSequence`s packed into `Float64Array`s.
 * - **Access**: part counts and lookup, bounding boxes and exact equality.
 *
 * There are no spatial predicates or validity checks.
 *
 * @example
 * ```ts
 * import { geometryEquals, lineString, point } from "@geocodec/geometry"
 *
 * const a = lineString([[0, 0], [10, 10]])
 * geometryEquals(a, lineString([[0, 0], [10, 10]])) // true
 * ```
 *
 * @module @geocodec/geometry
 */

export * from "./accessors"
export * from "./bounds"
export * from "./coordinate-sequence"
export * from "./equals"
export * from "./factory"
export * from "./types"
