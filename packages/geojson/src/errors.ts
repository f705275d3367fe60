/**
 * Decode errors.
 *
 * Every failure raised while reading GeoJSON is a `GeoJSONError` whose `code`
 * names the kind of failure and whose `path` points at the offending member,
 * e.g. `$.features[1].geometry.coordinates[0]`.
 *
 * @module
 */

export type GeoJSONErrorCode =
	| "MalformedJSON"
	| "UnknownGeometryType"
	| "MalformedCoordinates"
	| "UnknownEnvelopeType"
	| "MissingFeaturesArray"
	| "MalformedFeature"
	| "MalformedBBox"
	| "PropertyDecodeError"

/** JSON path of the document root. */
export const ROOT_PATH = "$"

export class GeoJSONError extends Error {
	override readonly name = "GeoJSONError"
	readonly code: GeoJSONErrorCode
	readonly path: string

	constructor(
		code: GeoJSONErrorCode,
		path: string,
		message: string,
		options?: { cause?: unknown },
	) {
		super(`${code} at ${path}: ${message}`, options)
		this.code = code
		this.path = path
	}
}

/**
 * Check if an error is a `GeoJSONError`, optionally of a given code.
 *
 * @example
 * ```ts
 * try {
 *   decode(text)
 * } catch (error) {
 *   if (isGeoJSONError(error, "UnknownGeometryType")) console.warn(error.path)
 *   else throw error
 * }
 * ```
 */
export function isGeoJSONError(
	error: unknown,
	code?: GeoJSONErrorCode,
): error is GeoJSONError {
	return (
		error instanceof GeoJSONError && (code === undefined || error.code === code)
	)
}

/** Path of a member of the object at `path`. */
export function memberPath(path: string, member: string): string {
	return `${path}.${member}`
}

/** Path of an element of the array at `path`. */
export function elementPath(path: string, index: number): string {
	return `${path}[${index}]`
}

/** Describe a JSON value for error messages. */
export function describeValue(value: unknown): string {
	if (value === null) return "null"
	if (Array.isArray(value)) return "an array"
	if (typeof value === "string") return `the string ${JSON.stringify(value)}`
	if (typeof value === "object") return "an object"
	return `${typeof value} ${String(value)}`
}
