// ABOUTME: Query tokenizer turning free text into tokens, a category shortcut and a search intent
// ABOUTME: Also parses the refine-filter box, which accepts plain tokens or a prefixed regex

import type { ParseError, SearchIntent, TokenizedQuery } from './types';
import { resolveShortcut } from './categories';
import { compileRegex, escapeRegex, splitWords } from './normalize';

/**
 * Settings interface for query parsing
 */
export interface QueryParserSettings {
	/** Prefix introducing an inline category shortcut, e.g. `::` in `::img` */
	categoryPrefix: string;
	/** Prefix turning the refine filter into a regular expression, e.g. `re:` */
	regexPrefix: string;
}

export const DEFAULT_QUERY_PARSER_SETTINGS: QueryParserSettings = {
	categoryPrefix: '::',
	regexPrefix: 're:',
};

/**
 * Result of parsing operation
 */
export interface ParseResult {
	query: TokenizedQuery;
	errors: ParseError[];
}

/**
 * Parsed refine-filter input
 */
export interface RefineFilter {
	tokens: string[];
	/** Source of a regex to apply over the joined path, already validated */
	regexSource: string | null;
}

export interface RefineParseResult {
	filter: RefineFilter;
	errors: ParseError[];
}

const shortcutPatterns = new Map<string, RegExp>();

function shortcutPattern(prefix: string): RegExp {
	let pattern = shortcutPatterns.get(prefix);
	if (!pattern) {
		pattern = new RegExp(`(^|\\s)${escapeRegex(prefix)}([\\p{L}\\p{N}]+)(?=\\s|$)`, 'gu');
		shortcutPatterns.set(prefix, pattern);
	}
	return pattern;
}

/**
 * Splits text into quoted phrases (verbatim, in order) followed by whitespace-separated words.
 * Blank phrases are discarded.
 */
function splitTokens(text: string): string[] {
	const phrases: string[] = [];
	for (const match of text.matchAll(/"([^"]*)"/g)) {
		if (match[1].trim().length > 0) {
			phrases.push(match[1]);
		}
	}
	const remaining = text.replace(/"[^"]*"/g, ' ');
	return [...phrases, ...splitWords(remaining)];
}

/**
 * Tokenizes a raw query into search tokens and an optional category.
 *
 * @example
 * tokenizeQuery('::doc annual review')
 * // => { tokens: ['annual', 'review'], category: 'documents' }
 */
export function tokenizeQuery(
	raw: string,
	settings: QueryParserSettings = DEFAULT_QUERY_PARSER_SETTINGS
): TokenizedQuery {
	return tokenizeQueryWithErrors(raw, settings).query;
}

/**
 * Tokenizes a query and reports shortcut-shaped tokens whose identifier is unknown.
 * Unknown shortcuts stay in the text and become literal tokens.
 */
export function tokenizeQueryWithErrors(
	raw: string,
	settings: QueryParserSettings = DEFAULT_QUERY_PARSER_SETTINGS
): ParseResult {
	const errors: ParseError[] = [];
	let remaining = raw;
	let category: TokenizedQuery['category'] = null;

	if (settings.categoryPrefix.length > 0) {
		for (const match of raw.matchAll(shortcutPattern(settings.categoryPrefix))) {
			const start = (match.index ?? 0) + match[1].length;
			const resolved = resolveShortcut(match[2]);
			if (!resolved) {
				errors.push({
					type: 'unknownCategory',
					message: `Unknown category shortcut: ${settings.categoryPrefix}${match[2]}`,
					position: start,
				});
				continue;
			}
			category = resolved;
			const end = start + settings.categoryPrefix.length + match[2].length;
			remaining = `${raw.slice(0, start)} ${raw.slice(end)}`;
			break;
		}
	}

	return {
		query: { tokens: splitTokens(remaining), category },
		errors,
	};
}

/**
 * Builds the intent for one lookup. The first token becomes the primary term sent
 * to the lookup tool; the rest are applied in memory.
 *
 * @returns null when the query has no tokens to look up
 */
export function buildSearchIntent(query: TokenizedQuery, caseInsensitive: boolean): SearchIntent | null {
	if (query.tokens.length === 0) {
		return null;
	}

	const [primaryTerm, ...postFilterTokens] = query.tokens;
	return {
		primaryTerm,
		postFilterTokens,
		category: query.category,
		caseInsensitive,
	};
}

/**
 * Parses the refine-filter box.
 * Text starting with the regex prefix is validated as a regular expression
 * without the `u` flag, so lenient forms such as `a{` or `\-` are accepted;
 * anything else is split into AND-ed substring tokens.
 */
export function parseRefineFilter(
	text: string,
	settings: QueryParserSettings = DEFAULT_QUERY_PARSER_SETTINGS
): RefineParseResult {
	const trimmed = text.trim();

	if (settings.regexPrefix.length > 0 && trimmed.startsWith(settings.regexPrefix)) {
		const source = trimmed.slice(settings.regexPrefix.length).trim();
		if (source.length === 0) {
			return { filter: { tokens: [], regexSource: null }, errors: [] };
		}
		const compiled = compileRegex(source, '');
		if (!compiled.ok) {
			return {
				filter: { tokens: [], regexSource: null },
				errors: [{
					type: 'regex',
					message: `Invalid regex pattern: ${compiled.message}`,
					position: settings.regexPrefix.length,
				}],
			};
		}
		return { filter: { tokens: [], regexSource: source }, errors: [] };
	}

	return { filter: { tokens: splitTokens(trimmed), regexSource: null }, errors: [] };
}
