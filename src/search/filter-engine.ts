// ABOUTME: In-memory filter engine narrowing the cached raw entries by category and tokens
// ABOUTME: Tokens are AND-ed substrings of the joined path; never performs I/O

import type { Entry, Matcher } from './types';
import { matcherAccepts } from './category-matcher';
import { foldCase } from './normalize';

/** Folded full paths, computed once per entry and dropped with the entry */
const foldedPaths = new WeakMap<Entry, string>();

function foldedPathOf(entry: Entry): string {
	let folded = foldedPaths.get(entry);
	if (folded === undefined) {
		folded = foldCase(entry.fullPath);
		foldedPaths.set(entry, folded);
	}
	return folded;
}

/**
 * Returns the visible subset of `raw`, preserving order.
 *
 * An entry is kept iff the category matcher accepts it and every token is a
 * substring of its joined path. With no tokens, no pattern and an accept-all
 * matcher the input array itself is returned.
 *
 * @param pattern Optional refine regex tested against the joined path
 *
 * @example
 * filterEntries(entries, regexFor('images'), ['holiday'], true)
 */
export function filterEntries(
	raw: Entry[],
	matcher: Matcher,
	tokens: readonly string[],
	caseInsensitive: boolean,
	pattern: RegExp | null = null
): Entry[] {
	if (tokens.length === 0 && matcher.kind === 'all' && pattern === null) {
		return raw;
	}

	const needles = caseInsensitive ? tokens.map(foldCase) : tokens;
	const result: Entry[] = [];

	for (const entry of raw) {
		if (!matcherAccepts(matcher, entry)) {
			continue;
		}

		if (needles.length > 0) {
			const haystack = caseInsensitive ? foldedPathOf(entry) : entry.fullPath;
			let keep = true;
			for (const needle of needles) {
				if (!haystack.includes(needle)) {
					keep = false;
					break;
				}
			}
			if (!keep) {
				continue;
			}
		}

		if (pattern !== null && !pattern.test(entry.fullPath)) {
			continue;
		}

		result.push(entry);
	}

	return result;
}
