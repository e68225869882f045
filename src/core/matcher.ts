import type { CatalogDocument } from "../catalog/schema.js";
import { type Field, walkSelectableFields } from "./fields.js";
import type { Pattern } from "./patterns.js";

export interface MatchOutcome {
	/** The pattern that produced the final state, if any did. */
	pattern: Pattern | undefined;
	selected: boolean;
}

export interface CatalogMatch {
	matched: Field[];
	unmatched: Field[];
	/** Patterns that never decided the state of any field. */
	unused: Set<Pattern>;
}

/**
 * Decide whether `path` is selected.
 *
 * Patterns are scanned in order starting from "not selected". A pattern takes
 * effect only when it matches the path and its polarity opposes the current
 * state: a positive pattern can only select, a `!` pattern can only deselect.
 * A matching pattern of the same polarity as the current state is ignored.
 *
 * The final state is the same as gitignore's "last matching line wins", but
 * the reported pattern is the last one that flipped the state, not the last
 * one that matched. With ["a/*", "a/b"] the path "a/b" is selected by "a/*",
 * and "a/b" is never reported for it.
 */
export function matchPath(patterns: readonly Pattern[], path: string): MatchOutcome {
	let pattern: Pattern | undefined;
	let selected = false;

	for (const candidate of patterns) {
		if (candidate.negation === selected && candidate.compiled.match(path)) {
			pattern = candidate;
			selected = !selected;
		}
	}

	return { pattern, selected };
}

export function matchCatalog(
	patterns: readonly Pattern[],
	catalog: CatalogDocument,
): CatalogMatch {
	const matched: Field[] = [];
	const unmatched: Field[] = [];
	const unused = new Set(patterns);

	for (const field of walkSelectableFields(catalog)) {
		const outcome = matchPath(patterns, field.path);

		if (outcome.selected) {
			matched.push(field);
		} else {
			unmatched.push(field);
		}

		if (outcome.pattern) {
			unused.delete(outcome.pattern);
		}
	}

	return { matched, unmatched, unused };
}
