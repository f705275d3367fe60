/**
 * Geometry encode/decode between geometry values and GeoJSON geometry objects.
 *
 * @module
 */

import {
	type Geometry,
	type GeometryKind,
	geometryCollection,
} from "@geocodec/geometry"
import type { JsonObject } from "@geocodec/shared/types"
import type { Geometry as GeoJSONGeometry } from "geojson"
import { type DecodeRoutine, TypeDispatcher } from "./dispatch"
import {
	describeValue,
	elementPath,
	GeoJSONError,
	memberPath,
	ROOT_PATH,
} from "./errors"
import { hasMember } from "./json"
import {
	COORDINATE_SHAPES,
	type CoordinateKind,
	isCoordinateKind,
} from "./shapes"

/**
 * Encode a geometry as a GeoJSON geometry object.
 *
 * @example
 * ```ts
 * encodeGeometry(point([15, 20]))
 * // { type: "Point", coordinates: [15, 20] }
 * ```
 */
export function encodeGeometry(geometry: Geometry): GeoJSONGeometry {
	switch (geometry.kind) {
		case "Point":
			return {
				type: "Point",
				coordinates: COORDINATE_SHAPES.Point.write(geometry),
			}
		case "LineString":
			return {
				type: "LineString",
				coordinates: COORDINATE_SHAPES.LineString.write(geometry),
			}
		case "Polygon":
			return {
				type: "Polygon",
				coordinates: COORDINATE_SHAPES.Polygon.write(geometry),
			}
		case "MultiPoint":
			return {
				type: "MultiPoint",
				coordinates: COORDINATE_SHAPES.MultiPoint.write(geometry),
			}
		case "MultiLineString":
			return {
				type: "MultiLineString",
				coordinates: COORDINATE_SHAPES.MultiLineString.write(geometry),
			}
		case "MultiPolygon":
			return {
				type: "MultiPolygon",
				coordinates: COORDINATE_SHAPES.MultiPolygon.write(geometry),
			}
		case "GeometryCollection":
			return {
				type: "GeometryCollection",
				geometries: geometry.geometries.map(encodeGeometry),
			}
	}
}

function coordinateRoutine(kind: CoordinateKind): DecodeRoutine<Geometry> {
	const shape = COORDINATE_SHAPES[kind]
	return (node, path) => {
		if (!hasMember(node, "coordinates")) {
			throw new GeoJSONError(
				"MalformedCoordinates",
				memberPath(path, "coordinates"),
				`missing ${kind} coordinates, expected an array nested ${shape.depth} deep`,
			)
		}
		return shape.read(node["coordinates"], memberPath(path, "coordinates"))
	}
}

function decodeCollection(node: JsonObject, path: string): Geometry {
	const geometriesPath = memberPath(path, "geometries")
	const geometries = node["geometries"]
	if (!Array.isArray(geometries)) {
		throw new GeoJSONError(
			"MalformedCoordinates",
			geometriesPath,
			`expected an array of geometries, got ${geometries === undefined ? "nothing" : describeValue(geometries)}`,
		)
	}
	return geometryCollection(
		geometries.map((child, i) =>
			GEOMETRY_DISPATCHER.decode(child, elementPath(geometriesPath, i)),
		),
	)
}

function geometryRoutine(kind: GeometryKind): DecodeRoutine<Geometry> {
	return isCoordinateKind(kind) ? coordinateRoutine(kind) : decodeCollection
}

/**
 * Dispatcher over the seven geometry tags.
 */
export const GEOMETRY_DISPATCHER = new TypeDispatcher<Geometry, GeometryKind>(
	{
		Point: geometryRoutine("Point"),
		LineString: geometryRoutine("LineString"),
		Polygon: geometryRoutine("Polygon"),
		MultiPoint: geometryRoutine("MultiPoint"),
		MultiLineString: geometryRoutine("MultiLineString"),
		MultiPolygon: geometryRoutine("MultiPolygon"),
		GeometryCollection: geometryRoutine("GeometryCollection"),
	},
	"UnknownGeometryType",
	"geometry",
)

/**
 * Decode a GeoJSON geometry object.
 *
 * @param node - Parsed JSON node.
 * @param path - JSON path of the node, used in error messages.
 * @throws GeoJSONError `UnknownGeometryType` or `MalformedCoordinates`.
 */
export function decodeGeometry(node: unknown, path: string = ROOT_PATH): Geometry {
	return GEOMETRY_DISPATCHER.decode(node, path)
}

