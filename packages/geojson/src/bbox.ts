import type { BBox } from "@geocodec/shared/types"
import { describeValue, elementPath, GeoJSONError } from "./errors"

/**
 * Read a `bbox` member: 4 numbers, or 6 with elevation.
 *
 * @throws GeoJSONError `MalformedBBox`
 */
export function readBBox(node: unknown, path: string): BBox {
	if (!Array.isArray(node)) {
		throw new GeoJSONError(
			"MalformedBBox",
			path,
			`expected an array of 4 or 6 numbers, got ${describeValue(node)}`,
		)
	}
	const values = node.map((value, i) => {
		if (typeof value !== "number" || !Number.isFinite(value)) {
			throw new GeoJSONError(
				"MalformedBBox",
				elementPath(path, i),
				`expected a number, got ${describeValue(value)}`,
			)
		}
		return value
	})
	const [a, b, c, d, e, f] = values
	if (
		values.length === 4 &&
		a !== undefined &&
		b !== undefined &&
		c !== undefined &&
		d !== undefined
	) {
		return [a, b, c, d]
	}
	if (
		values.length === 6 &&
		a !== undefined &&
		b !== undefined &&
		c !== undefined &&
		d !== undefined &&
		e !== undefined &&
		f !== undefined
	) {
		return [a, b, c, d, e, f]
	}
	throw new GeoJSONError(
		"MalformedBBox",
		path,
		`expected 4 or 6 numbers, got ${values.length}`,
	)
}
