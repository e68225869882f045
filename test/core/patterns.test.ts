import { describe, expect, it } from "vitest";
import { PatternCompileError } from "../../src/core/errors.js";
import {
	compileGlob,
	compilePatterns,
	DEFAULT_PATTERNS,
	splitPatternLines,
} from "../../src/core/patterns.js";

describe("compilePatterns", () => {
	it("skips blank lines and comments", () => {
		const patterns = [
			...compilePatterns(["", "   ", "# a comment", "  # indented comment", "orders/*"]),
		];
		expect(patterns.map((p) => p.source)).toEqual(["orders/*"]);
	});

	it("strips surrounding whitespace from the source", () => {
		const [pattern] = [...compilePatterns(["  orders/*\t"])];
		expect(pattern?.source).toBe("orders/*");
		expect(pattern?.negation).toBe(false);
	});

	it("marks negations and compiles the text after the bang", () => {
		const [pattern] = [...compilePatterns(["!users/password"])];
		expect(pattern?.source).toBe("!users/password");
		expect(pattern?.negation).toBe(true);
		expect(pattern?.compiled.match("users/password")).toBe(true);
		expect(pattern?.compiled.match("!users/password")).toBe(false);
	});

	it("keeps input order", () => {
		const patterns = [...compilePatterns(["b/*", "!b/x", "a/*"])];
		expect(patterns.map((p) => p.source)).toEqual(["b/*", "!b/x", "a/*"]);
	});

	it("rejects a bare bang", () => {
		expect(() => [...compilePatterns(["orders/*", "!"])]).toThrow(PatternCompileError);
	});

	it("reports the source line and cause when the compiler fails", () => {
		const failure = new Error("unbalanced class");
		const compile = () => {
			throw failure;
		};

		let caught: PatternCompileError | undefined;
		try {
			[...compilePatterns(["  !bad[  "], compile)];
		} catch (error) {
			if (error instanceof PatternCompileError) caught = error;
		}

		expect(caught?.source).toBe("!bad[");
		expect(caught?.message).toBe('Invalid pattern "!bad[": unbalanced class');
		expect(caught?.cause).toBe(failure);
	});

	it("passes the glob text to an injected compiler", () => {
		const seen: string[] = [];
		const compile = (glob: string) => {
			seen.push(glob);
			return { match: () => true };
		};
		[...compilePatterns(["a/*", "!a/b", "# skipped"], compile)];
		expect(seen).toEqual(["a/*", "a/b"]);
	});

	it("defaults to matching everything", () => {
		expect(DEFAULT_PATTERNS).toEqual(["**"]);
	});
});

describe("compileGlob", () => {
	it("keeps * inside one path segment", () => {
		const glob = compileGlob("orders/*");
		expect(glob.match("orders/total")).toBe(true);
		expect(glob.match("orders/customer/properties/email")).toBe(false);
	});

	it("lets ** cross segments", () => {
		const glob = compileGlob("orders/**");
		expect(glob.match("orders/customer/properties/email")).toBe(true);
		expect(glob.match("users/name")).toBe(false);
	});

	it("matches ? and character classes within a segment", () => {
		expect(compileGlob("users/na?e").match("users/name")).toBe(true);
		expect(compileGlob("users/[np]*").match("users/password")).toBe(true);
		expect(compileGlob("users/[np]*").match("users/email")).toBe(false);
	});

	it("anchors patterns at the start of the path", () => {
		expect(compileGlob("name").match("users/name")).toBe(false);
		expect(compileGlob("**/name").match("users/name")).toBe(true);
	});

	it("matches segments that start with a dot", () => {
		expect(compileGlob("orders/*").match("orders/.hidden")).toBe(true);
	});

	it("treats braces literally", () => {
		expect(compileGlob("orders/{a,b}").match("orders/a")).toBe(false);
		expect(compileGlob("orders/{a,b}").match("orders/{a,b}")).toBe(true);
	});

	it("rejects an empty pattern", () => {
		expect(() => compileGlob("")).toThrow("pattern is empty");
	});
});

describe("splitPatternLines", () => {
	it("splits on unix and windows line endings", () => {
		expect(splitPatternLines("a/*\r\n!a/b\nc\n")).toEqual(["a/*", "!a/b", "c", ""]);
	});
});
