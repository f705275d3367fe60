import { GeoJSONError } from "../src/errors"

/**
 * Run `fn` and return the GeoJSONError it throws. Fails the test when it
 * returns normally or throws anything else.
 */
export function catchGeoJSONError(fn: () => unknown): GeoJSONError {
	try {
		fn()
	} catch (error) {
		if (error instanceof GeoJSONError) return error
		throw error
	}
	throw Error("Expected a GeoJSONError to be thrown")
}
