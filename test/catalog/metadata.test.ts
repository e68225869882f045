import { describe, expect, it } from "vitest";
import { getInclusion, MetadataMap, STREAM_ROOT } from "../../src/catalog/metadata.js";
import { entry } from "../helpers/catalog.js";

describe("MetadataMap", () => {
	it("looks up properties by breadcrumb value", () => {
		const map = MetadataMap.fromList([
			entry([], { inclusion: "available" }),
			entry(["properties", "id"], { inclusion: "automatic" }),
		]);
		expect(map.get(STREAM_ROOT)).toEqual({ inclusion: "available" });
		expect(map.get(["properties", "id"])).toEqual({ inclusion: "automatic" });
		expect(map.get(["properties", "missing"])).toBeUndefined();
	});

	it("does not confuse breadcrumbs whose joined text is equal", () => {
		const map = MetadataMap.fromList([
			entry(["properties", "a/b"], { inclusion: "available" }),
			entry(["properties", "a", "b"], { inclusion: "unsupported" }),
		]);
		expect(map.size).toBe(2);
		expect(map.get(["properties", "a/b"])).toEqual({ inclusion: "available" });
	});

	it("keeps the first position and last value of a repeated breadcrumb", () => {
		const map = MetadataMap.fromList([
			entry(["properties", "a"], { inclusion: "available" }),
			entry(["properties", "b"], { inclusion: "available" }),
			entry(["properties", "a"], { inclusion: "unsupported" }),
		]);
		expect(map.toList()).toEqual([
			entry(["properties", "a"], { inclusion: "unsupported" }),
			entry(["properties", "b"], { inclusion: "available" }),
		]);
	});

	it("writes into existing nodes and appends new ones", () => {
		const map = MetadataMap.fromList([entry(["properties", "a"], { inclusion: "available" })]);
		map.write(["properties", "a"], "selected", true);
		map.write(STREAM_ROOT, "selected", false);
		expect(map.toList()).toEqual([
			entry(["properties", "a"], { inclusion: "available", selected: true }),
			entry([], { selected: false }),
		]);
	});

	it("does not modify the source entries", () => {
		const source = [entry(["properties", "a"], { inclusion: "available" })];
		const map = MetadataMap.fromList(source);
		map.write(["properties", "a"], "selected", true);
		expect(source[0]?.metadata).toEqual({ inclusion: "available" });
	});

	it("carries entries without a breadcrumb through unchanged", () => {
		const detached = { metadata: { inclusion: "available" }, note: "kept" };
		const map = MetadataMap.fromList([
			detached,
			entry(["properties", "a"], { inclusion: "available" }),
		]);
		map.write(["properties", "a"], "selected", true);

		expect(map.size).toBe(1);
		expect([...map].map(([breadcrumb]) => breadcrumb)).toEqual([["properties", "a"]]);
		expect(map.toList()).toEqual([
			detached,
			entry(["properties", "a"], { inclusion: "available", selected: true }),
		]);
	});

	it("iterates in insertion order", () => {
		const map = MetadataMap.fromList([
			entry(["properties", "z"], {}),
			entry([], {}),
			entry(["properties", "a"], {}),
		]);
		expect([...map].map(([breadcrumb]) => breadcrumb)).toEqual([
			["properties", "z"],
			[],
			["properties", "a"],
		]);
	});
});

describe("getInclusion", () => {
	it("returns string inclusions only", () => {
		expect(getInclusion({ inclusion: "available" })).toBe("available");
		expect(getInclusion({ inclusion: 3 })).toBeUndefined();
		expect(getInclusion({})).toBeUndefined();
		expect(getInclusion(undefined)).toBeUndefined();
	});
});
