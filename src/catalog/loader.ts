import fs from "node:fs/promises";
import { parse, stringify } from "lossless-json";
import { z, ZodError } from "zod";
import { CatalogFormatError } from "../core/errors.js";
import { type CatalogDocument, catalogSchema } from "./schema.js";

const looseObjectSchema = z.record(z.unknown());

function rawItems(raw: unknown, key: string): unknown[] {
	const result = z.object({ [key]: z.array(z.unknown()) }).safeParse(raw);
	return result.success ? result.data[key] : [];
}

// zod emits schema keys first; lay the parsed values out in the source order.
function keepKeyOrder<T extends object>(raw: unknown, parsed: T): T {
	const source = looseObjectSchema.safeParse(raw);
	return source.success ? { ...source.data, ...parsed } : parsed;
}

function restoreKeyOrder(raw: unknown, parsed: CatalogDocument): CatalogDocument {
	const rawStreams = rawItems(raw, "streams");
	const streams = parsed.streams.map((stream, i) => {
		const rawStream = rawStreams[i];
		const rawEntries = rawItems(rawStream, "metadata");
		return keepKeyOrder(rawStream, {
			...stream,
			metadata: stream.metadata.map((entry, j) => keepKeyOrder(rawEntries[j], entry)),
		});
	});
	return keepKeyOrder(raw, { ...parsed, streams });
}

/**
 * Parse catalog JSON. Numbers are kept as written, so 64-bit bounds in a
 * stream schema survive a round trip through {@link serializeCatalog}.
 */
export function parseCatalog(text: string): CatalogDocument {
	let raw: unknown;
	try {
		raw = parse(text);
	} catch (error: unknown) {
		const message = error instanceof Error ? error.message : String(error);
		throw new CatalogFormatError(`Catalog is not valid JSON: ${message}`);
	}

	try {
		return restoreKeyOrder(raw, catalogSchema.parse(raw));
	} catch (error: unknown) {
		if (error instanceof ZodError) {
			const issues = error.errors.map((err) =>
				err.path.length > 0 ? `${err.path.join(".")}: ${err.message}` : err.message,
			);
			throw new CatalogFormatError("Catalog does not have the expected shape", issues);
		}
		throw error;
	}
}

export function serializeCatalog(catalog: CatalogDocument): string {
	return `${stringify(catalog, undefined, 2) ?? "{}"}\n`;
}

export async function readCatalog(filePath: string): Promise<CatalogDocument> {
	const content = await fs.readFile(filePath, "utf-8");
	return parseCatalog(content);
}
