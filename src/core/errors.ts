/**
 * A pattern line could not be compiled into a matcher.
 * Raised before any field is matched.
 */
export class PatternCompileError extends Error {
	readonly source: string;

	constructor(source: string, reason: string, options?: { cause?: unknown }) {
		super(`Invalid pattern "${source}": ${reason}`, options);
		this.name = "PatternCompileError";
		this.source = source;
	}
}

/**
 * One or more patterns matched no field. Usually a typo or a pattern left
 * behind after a field was removed from the catalog.
 */
export class UnusedPatternsError extends Error {
	/** Pattern source lines, sorted. */
	readonly patterns: string[];

	constructor(patterns: readonly string[]) {
		super("some pattern(s) matched no fields");
		this.name = "UnusedPatternsError";
		this.patterns = [...patterns].sort();
	}
}

/**
 * The catalog text is not JSON, or its shape is not a catalog.
 */
export class CatalogFormatError extends Error {
	readonly issues: string[];

	constructor(message: string, issues: readonly string[] = []) {
		super(message);
		this.name = "CatalogFormatError";
		this.issues = [...issues];
	}
}
