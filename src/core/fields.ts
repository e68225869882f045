import {
	type Breadcrumb,
	getInclusion,
	MetadataMap,
	STREAM_ROOT,
} from "../catalog/metadata.js";
import type { CatalogDocument } from "../catalog/schema.js";

export interface Field {
	readonly streamName: string;
	readonly breadcrumb: Breadcrumb;
	readonly path: string;
}

const FIELD_SEGMENT = "properties";

/**
 * Path of a field as patterns see it: the stream name followed by every
 * breadcrumb segment after the leading "properties".
 *
 * ["properties", "a", "properties", "b"] on "orders" -> "orders/a/properties/b"
 */
export function makeFieldPath(streamName: string, breadcrumb: Breadcrumb): string {
	return [streamName, ...breadcrumb.slice(1)].join("/");
}

function matchableInclusions(metadata: MetadataMap): Set<string> {
	const inclusions = new Set(["available"]);
	// An optional stream is selected only through its fields, so its
	// automatic fields must be matchable too.
	if (getInclusion(metadata.get(STREAM_ROOT)) === "available") {
		inclusions.add("automatic");
	}
	return inclusions;
}

/**
 * Yield every selectable field in the catalog, in stream order and then
 * metadata order.
 */
export function* walkSelectableFields(catalog: CatalogDocument): Generator<Field> {
	for (const stream of catalog.streams) {
		const metadata = MetadataMap.fromList(stream.metadata);
		const inclusions = matchableInclusions(metadata);

		for (const [breadcrumb, properties] of metadata) {
			if (breadcrumb[0] !== FIELD_SEGMENT) continue;

			const inclusion = getInclusion(properties);
			if (inclusion === undefined || !inclusions.has(inclusion)) continue;

			yield {
				streamName: stream.stream,
				breadcrumb,
				path: makeFieldPath(stream.stream, breadcrumb),
			};
		}
	}
}
