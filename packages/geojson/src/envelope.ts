import type { Geometry } from "@geocodec/geometry"
import { TypeDispatcher } from "./dispatch"
import { ROOT_PATH } from "./errors"
import { decodeFeatureNode } from "./feature"
import { decodeFeatureCollectionNode } from "./feature-collection"
import type {
	EnvelopeType,
	Feature,
	FeatureCollection,
	PropertyCodec,
} from "./types"

export type Envelope<P> = Feature<Geometry, P> | FeatureCollection<Geometry, P>

/**
 * Decoder bound to one node, waiting for the caller's property codec.
 */
type PendingEnvelope = <P>(properties: PropertyCodec<P>) => Envelope<P>

/**
 * Dispatcher over the two top-level envelope tags.
 */
export const ENVELOPE_DISPATCHER = new TypeDispatcher<
	PendingEnvelope,
	EnvelopeType
>(
	{
		Feature: (node, path) => (properties) =>
			decodeFeatureNode(node, properties, path),
		FeatureCollection: (node, path) => (properties) =>
			decodeFeatureCollectionNode(node, properties, path),
	},
	"UnknownEnvelopeType",
	"envelope",
)

/**
 * Decode a top-level Feature or FeatureCollection object, whichever its
 * `type` names.
 *
 * @throws GeoJSONError `UnknownEnvelopeType` for any other tag.
 */
export function decodeEnvelopeNode<P>(
	node: unknown,
	properties: PropertyCodec<P>,
	path: string = ROOT_PATH,
): Envelope<P> {
	return ENVELOPE_DISPATCHER.decode(node, path)(properties)
}

/** Type guard: check if an envelope is a FeatureCollection. */
export function isFeatureCollection<P>(
	envelope: Envelope<P>,
): envelope is FeatureCollection<Geometry, P> {
	return envelope.type === "FeatureCollection"
}
