import type { MetadataEntry } from "./schema.js";

export type Breadcrumb = readonly string[];
export type MetadataProperties = Record<string, unknown>;

/** Breadcrumb of the node describing the stream itself. */
export const STREAM_ROOT: Breadcrumb = [];

type MetadataSlot =
	| { kind: "node"; breadcrumb: Breadcrumb; properties: MetadataProperties }
	// An entry without a breadcrumb addresses nothing; it is carried as is.
	| { kind: "detached"; entry: MetadataEntry };

// Node keys are JSON arrays, so they never collide with detached keys.
function breadcrumbKey(breadcrumb: Breadcrumb): string {
	return JSON.stringify(breadcrumb);
}

/**
 * Breadcrumb-keyed view of a stream's metadata list.
 *
 * Iteration follows insertion order. When a breadcrumb appears twice in the
 * source list, the node keeps its first position and takes the later value.
 */
export class MetadataMap implements Iterable<[Breadcrumb, MetadataProperties]> {
	private readonly slots = new Map<string, MetadataSlot>();
	private nodeCount = 0;

	static fromList(entries: readonly MetadataEntry[]): MetadataMap {
		const map = new MetadataMap();
		entries.forEach((entry, index) => {
			if (entry.breadcrumb === undefined) {
				map.slots.set(`detached:${index}`, { kind: "detached", entry });
				return;
			}
			map.setNode(entry.breadcrumb, { ...entry.metadata });
		});
		return map;
	}

	/** Number of addressable nodes. */
	get size(): number {
		return this.nodeCount;
	}

	get(breadcrumb: Breadcrumb): MetadataProperties | undefined {
		const slot = this.slots.get(breadcrumbKey(breadcrumb));
		return slot?.kind === "node" ? slot.properties : undefined;
	}

	write(breadcrumb: Breadcrumb, key: string, value: unknown): void {
		const properties = this.get(breadcrumb);
		if (properties) {
			properties[key] = value;
		} else {
			this.setNode(breadcrumb, { [key]: value });
		}
	}

	toList(): MetadataEntry[] {
		return [...this.slots.values()].map((slot) =>
			slot.kind === "detached"
				? slot.entry
				: { breadcrumb: [...slot.breadcrumb], metadata: { ...slot.properties } },
		);
	}

	*[Symbol.iterator](): Iterator<[Breadcrumb, MetadataProperties]> {
		for (const slot of this.slots.values()) {
			if (slot.kind === "node") yield [slot.breadcrumb, slot.properties];
		}
	}

	private setNode(breadcrumb: Breadcrumb, properties: MetadataProperties): void {
		const key = breadcrumbKey(breadcrumb);
		if (!this.slots.has(key)) this.nodeCount++;
		this.slots.set(key, { kind: "node", breadcrumb: [...breadcrumb], properties });
	}
}

export function getInclusion(
	properties: MetadataProperties | undefined,
): string | undefined {
	const inclusion = properties?.inclusion;
	return typeof inclusion === "string" ? inclusion : undefined;
}
