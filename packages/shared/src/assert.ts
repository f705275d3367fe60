/**
 * Assertion helpers.
 *
 * Typed guards that throw when a condition does not hold, used for index
 * bounds checks on coordinate storage and for null/undefined narrowing under
 * `noUncheckedIndexedAccess`.
 *
 * @module
 */

/**
 * Assert that a value is neither null nor undefined.
 *
 * @example
 * ```ts
 * const ring = rings[index]
 * assertValue(ring, `No ring at index ${index}`)
 * ```
 */
export function assertValue<T>(
	value?: T,
	message?: string,
): asserts value is NonNullable<T> {
	if (value === undefined || value === null) {
		throw Error(message ?? "Value is undefined or null")
	}
}

/**
 * Assert that `index` addresses an element of a sequence of `size` elements.
 */
export function assertIndex(index: number, size: number) {
	if (!Number.isInteger(index) || index < 0 || index >= size) {
		throw RangeError(`Index ${index} out of bounds for size ${size}`)
	}
}
