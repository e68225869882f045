import type { CatalogDocument } from "../catalog/schema.js";
import { getCategoryLogger } from "../output/app-logger.js";
import { getProducer, type OutputMode } from "../output/producers.js";
import { UnusedPatternsError } from "./errors.js";
import { matchCatalog } from "./matcher.js";
import { compilePatterns, DEFAULT_PATTERNS, type GlobCompiler } from "./patterns.js";

const log = getCategoryLogger("select");

export interface SelectOptions {
	catalog: CatalogDocument;
	/** Pattern file lines; {@link DEFAULT_PATTERNS} when omitted. */
	patternLines?: Iterable<string>;
	mode: OutputMode;
	ignoreUnusedPatterns: boolean;
	compile?: GlobCompiler;
}

/**
 * Match a catalog against patterns and render the chosen output.
 *
 * Throws PatternCompileError before matching, or UnusedPatternsError after
 * matching when a pattern decided no field and unused patterns are not
 * ignored. In "catalog" mode the catalog is annotated in place.
 */
export function selectFields(options: SelectOptions): string {
	const { catalog, mode, ignoreUnusedPatterns } = options;
	const patterns = [
		...compilePatterns(options.patternLines ?? DEFAULT_PATTERNS, options.compile),
	];
	log.debug("Compiled {count} pattern(s)", { count: patterns.length });

	const result = matchCatalog(patterns, catalog);
	log.debug("Matched {matched} field(s), left {unmatched} unmatched", {
		matched: result.matched.length,
		unmatched: result.unmatched.length,
	});

	if (result.unused.size > 0) {
		const error = new UnusedPatternsError(
			[...result.unused].map((pattern) => pattern.source),
		);
		if (!ignoreUnusedPatterns) {
			throw error;
		}
		log.info("Ignoring {count} unused pattern(s): {patterns}", {
			count: error.patterns.length,
			patterns: error.patterns,
		});
	}

	return getProducer(mode)(catalog, result);
}
