import type { BBox } from "@geocodec/shared/types"
import { coordinateDimension, coordinateSequences } from "./accessors"
import type { Geometry } from "./types"

/**
 * Get the bounding box of a geometry, or undefined when it has no positions.
 *
 * Geometries with elevation produce the 3D form
 * [minX, minY, minZ, maxX, maxY, maxZ]; elevation is taken from 3D sequences
 * only.
 */
export function geometryBBox(geometry: Geometry): BBox | undefined {
	let minX = Number.POSITIVE_INFINITY
	let minY = Number.POSITIVE_INFINITY
	let minZ = Number.POSITIVE_INFINITY
	let maxX = Number.NEGATIVE_INFINITY
	let maxY = Number.NEGATIVE_INFINITY
	let maxZ = Number.NEGATIVE_INFINITY
	let count = 0

	for (const sequence of coordinateSequences(geometry)) {
		for (let i = 0; i < sequence.size; i++) {
			const x = sequence.getX(i)
			const y = sequence.getY(i)
			const z = sequence.getZ(i)
			if (x < minX) minX = x
			if (y < minY) minY = y
			if (x > maxX) maxX = x
			if (y > maxY) maxY = y
			if (z !== undefined) {
				if (z < minZ) minZ = z
				if (z > maxZ) maxZ = z
			}
			count++
		}
	}

	if (count === 0) return undefined
	return coordinateDimension(geometry) === 3
		? [minX, minY, minZ, maxX, maxY, maxZ]
		: [minX, minY, maxX, maxY]
}

/**
 * Merge bounding boxes into one that covers all of them. Returns undefined
 * for an empty list. The result is 3D only when every input is.
 */
export function mergeBBoxes(boxes: readonly BBox[]): BBox | undefined {
	if (boxes.length === 0) return undefined
	const all3D = boxes.every((b) => b.length === 6)
	let minX = Number.POSITIVE_INFINITY
	let minY = Number.POSITIVE_INFINITY
	let minZ = Number.POSITIVE_INFINITY
	let maxX = Number.NEGATIVE_INFINITY
	let maxY = Number.NEGATIVE_INFINITY
	let maxZ = Number.NEGATIVE_INFINITY
	for (const b of boxes) {
		if (b.length === 6) {
			minX = Math.min(minX, b[0])
			minY = Math.min(minY, b[1])
			minZ = Math.min(minZ, b[2])
			maxX = Math.max(maxX, b[3])
			maxY = Math.max(maxY, b[4])
			maxZ = Math.max(maxZ, b[5])
		} else {
			minX = Math.min(minX, b[0])
			minY = Math.min(minY, b[1])
			maxX = Math.max(maxX, b[2])
			maxY = Math.max(maxY, b[3])
		}
	}
	return all3D
		? [minX, minY, minZ, maxX, maxY, maxZ]
		: [minX, minY, maxX, maxY]
}
