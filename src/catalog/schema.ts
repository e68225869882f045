import { z } from "zod";

// Objects pass unknown keys through so a catalog survives a round trip.
// Absent breadcrumb or metadata keys stay absent rather than being filled in.

export const metadataEntrySchema = z
	.object({
		breadcrumb: z.array(z.string()).optional(),
		metadata: z.record(z.unknown()).optional(),
	})
	.passthrough();

export const streamSchema = z
	.object({
		stream: z.string(),
		metadata: z.array(metadataEntrySchema).default([]),
	})
	.passthrough();

export const catalogSchema = z
	.object({
		streams: z.array(streamSchema).default([]),
	})
	.passthrough();

export type MetadataEntry = z.infer<typeof metadataEntrySchema>;
export type CatalogStream = z.infer<typeof streamSchema>;
export type CatalogDocument = z.infer<typeof catalogSchema>;
