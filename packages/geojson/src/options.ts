/**
 * Encode settings.
 *
 * Callers pass a `Partial<GeoJSONEncodeOptions>`; missing settings fall back
 * to `DEFAULT_ENCODE_OPTIONS`.
 *
 * @module
 */

export interface GeoJSONEncodeOptions {
	/** Indentation handed to `JSON.stringify`. Undefined writes compact text. */
	indent: number | undefined
	/**
	 * Compute and write a `bbox` for features and collections that do not
	 * carry one.
	 */
	bbox: boolean
}

export const DEFAULT_ENCODE_OPTIONS: Readonly<GeoJSONEncodeOptions> =
	Object.freeze({
		indent: undefined,
		bbox: false,
	})

export function resolveEncodeOptions(
	options: Partial<GeoJSONEncodeOptions> = {},
): GeoJSONEncodeOptions {
	return { ...DEFAULT_ENCODE_OPTIONS, ...options }
}
