import { Minimatch } from "minimatch";
import { PatternCompileError } from "./errors.js";

/** Compiled form of one glob, as produced by a {@link GlobCompiler}. */
export interface Matcher {
	match(path: string): boolean;
}

export type GlobCompiler = (pattern: string) => Matcher;

export interface Pattern {
	/** The line as written, whitespace stripped, including any leading "!". */
	readonly source: string;
	readonly negation: boolean;
	readonly compiled: Matcher;
}

/** Used when no pattern source is given: select everything selectable. */
export const DEFAULT_PATTERNS: readonly string[] = ["**"];

const GLOB_OPTIONS = {
	dot: true,
	nobrace: true,
	noext: true,
	nocomment: true,
	nonegate: true,
	platform: "linux",
} as const;

/**
 * Compile one glob with gitignore-style wildcards: `*` and `?` stay inside a
 * path segment, `**` spans segments, `[...]` is a character class.
 */
export function compileGlob(pattern: string): Matcher {
	if (pattern.length === 0) {
		throw new Error("pattern is empty");
	}
	const matcher = new Minimatch(pattern, GLOB_OPTIONS);
	if (matcher.makeRe() === false) {
		throw new Error("pattern cannot be compiled");
	}
	return matcher;
}

/**
 * Turn pattern-file lines into patterns, in order.
 *
 * Blank lines and `#` comments are dropped. A leading `!` marks a negation and
 * is not part of the compiled glob.
 */
export function* compilePatterns(
	lines: Iterable<string>,
	compile: GlobCompiler = compileGlob,
): Generator<Pattern> {
	for (const rawLine of lines) {
		const source = rawLine.trim();

		if (source.length === 0 || source.startsWith("#")) continue;

		const negation = source.startsWith("!");
		const glob = negation ? source.slice(1) : source;

		let compiled: Matcher;
		try {
			compiled = compile(glob);
		} catch (error: unknown) {
			const reason = error instanceof Error ? error.message : String(error);
			throw new PatternCompileError(source, reason, { cause: error });
		}

		yield { source, negation, compiled };
	}
}

/** Split pattern file content into lines. */
export function splitPatternLines(content: string): string[] {
	return content.split(/\r?\n/);
}
