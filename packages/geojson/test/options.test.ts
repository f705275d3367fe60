import { point } from "@geocodec/geometry"
import { describe, expect, it } from "vitest"
import { encode } from "../src/codec"
import { DEFAULT_ENCODE_OPTIONS, resolveEncodeOptions } from "../src/options"
import { jsonProperties, propertyCodec } from "../src/properties"

describe("encode options", () => {
	it("fills in defaults", () => {
		expect(resolveEncodeOptions()).toEqual({ indent: undefined, bbox: false })
		expect(resolveEncodeOptions({ bbox: true })).toEqual({
			indent: undefined,
			bbox: true,
		})
		expect(Object.isFrozen(DEFAULT_ENCODE_OPTIONS)).toBe(true)
	})

	it("indents text", () => {
		expect(encode(point([15, 20]), { indent: 2 })).toBe(
			'{\n  "type": "Point",\n  "coordinates": [\n    15,\n    20\n  ]\n}',
		)
		expect(encode(point([15, 20]), { indent: undefined })).toBe(
			'{"type":"Point","coordinates":[15,20]}',
		)
	})
})

describe("property codecs", () => {
	it("passes JSON objects through", () => {
		const properties = { name: "Brutus", age: 4 }
		expect(jsonProperties.encode(properties)).toBe(properties)
		expect(jsonProperties.decode(properties)).toBe(properties)
		expect(() => jsonProperties.decode(["Brutus"])).toThrow(
			"expected an object, got an array",
		)
	})

	it("builds codecs from function pairs", () => {
		const counts = propertyCodec<number>(
			(count) => ({ count }),
			(node) => {
				if (typeof node !== "object" || node === null || Array.isArray(node)) {
					throw Error("expected an object")
				}
				const count = node["count"]
				if (typeof count !== "number") throw Error("expected a count")
				return count
			},
		)
		expect(counts.encode(3)).toEqual({ count: 3 })
		expect(counts.decode({ count: 3 })).toBe(3)
		expect(() => counts.decode({})).toThrow("expected a count")
	})
})
