// ABOUTME: Category classifier mapping a CategoryId to a matcher over candidate entries
// ABOUTME: Extension categories compile once into a case-insensitive "ends with" pattern

import type { CategoryId, Entry, Matcher } from './types';
import { getCategory } from './categories';
import { escapeRegex } from './normalize';

const ALL: Matcher = { kind: 'all' };
const DIRECTORIES: Matcher = { kind: 'directories' };

const compiled = new Map<CategoryId, Matcher>();

/**
 * Builds the matcher for a category. The result is derived only from the static
 * category table and memoized, so a shortcut and a UI selection of the same
 * category share one matcher.
 *
 * @example
 * regexFor('images') // => { kind: 'pattern', pattern: /\.(?:jpg|jpeg|...)$/i }
 */
export function regexFor(category: CategoryId): Matcher {
	const cached = compiled.get(category);
	if (cached) {
		return cached;
	}

	const definition = getCategory(category);
	let matcher: Matcher;
	if (definition.directoriesOnly) {
		matcher = DIRECTORIES;
	} else if (definition.extensions.length === 0) {
		matcher = ALL;
	} else {
		const alternatives = definition.extensions.map(escapeRegex).join('|');
		matcher = { kind: 'pattern', category, pattern: new RegExp(`\\.(?:${alternatives})$`, 'i') };
	}

	compiled.set(category, matcher);
	return matcher;
}

/**
 * Matcher accepting every entry
 */
export function matchAll(): Matcher {
	return ALL;
}

export function matcherAccepts(matcher: Matcher, entry: Entry): boolean {
	switch (matcher.kind) {
		case 'all':
			return true;
		case 'directories':
			return entry.isDirectory;
		case 'pattern':
			return matcher.pattern.test(entry.fullPath);
	}
}

