import { serializeCatalog } from "../catalog/loader.js";
import { getInclusion, MetadataMap, STREAM_ROOT } from "../catalog/metadata.js";
import type { CatalogDocument } from "../catalog/schema.js";
import type { Field } from "../core/fields.js";
import type { CatalogMatch } from "../core/matcher.js";

export type OutputMode = "catalog" | "matched" | "unmatched";

export type ResultProducer = (catalog: CatalogDocument, result: CatalogMatch) => string;

function listPaths(fields: readonly Field[]): string {
	return fields.map((field) => `${field.path}\n`).join("");
}

export const produceMatched: ResultProducer = (_catalog, result) =>
	listPaths(result.matched);

export const produceUnmatched: ResultProducer = (_catalog, result) =>
	listPaths(result.unmatched);

/**
 * Write selection state into each stream's metadata and serialize the catalog.
 *
 * Matched fields get `selected: true`; unmatched fields keep whatever they
 * had. An optional stream (root inclusion "available") is selected exactly
 * when at least one of its fields matched. Mutates `catalog`.
 */
export const produceCatalog: ResultProducer = (catalog, result) => {
	const matchesByStream = new Map<string, Field[]>();
	for (const stream of catalog.streams) {
		matchesByStream.set(stream.stream, []);
	}
	for (const field of result.matched) {
		matchesByStream.get(field.streamName)?.push(field);
	}

	for (const stream of catalog.streams) {
		const metadata = MetadataMap.fromList(stream.metadata);
		const streamMatches = matchesByStream.get(stream.stream) ?? [];

		for (const field of streamMatches) {
			metadata.write(field.breadcrumb, "selected", true);
		}

		if (getInclusion(metadata.get(STREAM_ROOT)) === "available") {
			metadata.write(STREAM_ROOT, "selected", streamMatches.length > 0);
		}

		stream.metadata = metadata.toList();
	}

	return serializeCatalog(catalog);
};

const PRODUCERS: Record<OutputMode, ResultProducer> = {
	catalog: produceCatalog,
	matched: produceMatched,
	unmatched: produceUnmatched,
};

export function getProducer(mode: OutputMode): ResultProducer {
	return PRODUCERS[mode];
}
