import { type Geometry, geometryEquals } from "@geocodec/geometry"
import { dequal } from "dequal"
import type { Feature, FeatureCollection } from "./types"

/**
 * Check if two features have the same id, bbox, geometry and properties.
 * Properties are compared with `dequal` unless another comparison is given.
 */
export function featureEquals<P>(
	a: Feature<Geometry, P>,
	b: Feature<Geometry, P>,
	propertiesEqual: (a: P, b: P) => boolean = dequal,
): boolean {
	if (a.id !== b.id) return false
	if (!dequal(a.bbox, b.bbox)) return false
	if (a.geometry === null || b.geometry === null) {
		if (a.geometry !== b.geometry) return false
	} else if (!geometryEquals(a.geometry, b.geometry)) {
		return false
	}
	if (a.properties === null || b.properties === null) {
		return a.properties === b.properties
	}
	return propertiesEqual(a.properties, b.properties)
}

/** Check if two collections hold equal features in the same order. */
export function featureCollectionEquals<P>(
	a: FeatureCollection<Geometry, P>,
	b: FeatureCollection<Geometry, P>,
	propertiesEqual: (a: P, b: P) => boolean = dequal,
): boolean {
	if (!dequal(a.bbox, b.bbox)) return false
	if (a.features.length !== b.features.length) return false
	return a.features.every((f, i) => {
		const other = b.features[i]
		return other !== undefined && featureEquals(f, other, propertiesEqual)
	})
}
