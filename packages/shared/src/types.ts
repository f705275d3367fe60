/**
 * A position in two or three dimensions. The third element, when present,
 * is an elevation.
 */
export type Position = XY | XYZ
export type XY = [x: number, y: number]
export type XYZ = [x: number, y: number, z: number]

/** Number of ordinates in a position. */
export type Dimension = 2 | 3

/**
 * A bounding box in the format [minX, minY, maxX, maxY], or with elevation
 * [minX, minY, minZ, maxX, maxY, maxZ].
 */
export type BBox2D = [minX: number, minY: number, maxX: number, maxY: number]
export type BBox3D = [
	minX: number,
	minY: number,
	minZ: number,
	maxX: number,
	maxY: number,
	maxZ: number,
]
export type BBox = BBox2D | BBox3D

/**
 * JSON values as produced by `JSON.parse`.
 */
export type JsonPrimitive = string | number | boolean | null
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject
export interface JsonObject {
	[key: string]: JsonValue
}
