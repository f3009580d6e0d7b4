// ABOUTME: Runtime type guards and assertions for the query pipeline types
// ABOUTME: Validates category data loaded from JSON and values crossing the collaborator boundary

import type { CategoryDefinition, CategoryId, Entry, SearchIntent, SortState } from './types';

const CATEGORY_IDS: readonly CategoryId[] = [
	'all',
	'directories',
	'documents',
	'images',
	'videos',
	'audio',
	'apps',
	'code',
	'archives',
	'text',
];

function isStringArray(v: unknown): v is string[] {
	return Array.isArray(v) && v.every((item: unknown) => typeof item === 'string');
}

function isRecord(v: unknown): v is Record<string, unknown> {
	return typeof v === 'object' && v !== null;
}

/**
 * Type guard to check if a value is a known CategoryId
 */
export function isCategoryId(v: unknown): v is CategoryId {
	return typeof v === 'string' && (CATEGORY_IDS as readonly string[]).includes(v);
}

/**
 * Type guard for one category record of the category data file
 */
export function isCategoryDefinition(v: unknown): v is CategoryDefinition {
	if (!isRecord(v)) {
		return false;
	}

	return (
		isCategoryId(v.id) &&
		isStringArray(v.shortcuts) &&
		isStringArray(v.extensions) &&
		typeof v.directoriesOnly === 'boolean'
	);
}

/**
 * Type guard to check if a value is a valid Entry.
 * Rejects entries whose parent path is empty.
 */
export function isEntry(v: unknown): v is Entry {
	if (!isRecord(v)) {
		return false;
	}

	return (
		typeof v.name === 'string' &&
		typeof v.parentPath === 'string' &&
		v.parentPath.length > 0 &&
		typeof v.isDirectory === 'boolean' &&
		typeof v.fullPath === 'string'
	);
}

/**
 * Type guard to check if a value is a valid SearchIntent
 */
export function isSearchIntent(v: unknown): v is SearchIntent {
	if (!isRecord(v)) {
		return false;
	}

	return (
		typeof v.primaryTerm === 'string' &&
		v.primaryTerm.length > 0 &&
		isStringArray(v.postFilterTokens) &&
		(v.category === null || isCategoryId(v.category)) &&
		typeof v.caseInsensitive === 'boolean'
	);
}

export function isSortState(v: unknown): v is SortState {
	if (!isRecord(v)) {
		return false;
	}

	return (
		(v.column === 'name' || v.column === 'parentPath') &&
		(v.direction === 'ascending' || v.direction === 'descending')
	);
}

/**
 * Assertion that throws if value is not an Entry
 *
 * @throws Error if e is not an Entry
 */
export function assertIsEntry(e: unknown): asserts e is Entry {
	if (!isEntry(e)) {
		throw new Error('Value is not a valid Entry');
	}
}

/**
 * Assertion that throws if value is not a SearchIntent
 *
 * @throws Error if i is not a SearchIntent
 */
export function assertIsSearchIntent(i: unknown): asserts i is SearchIntent {
	if (!isSearchIntent(i)) {
		throw new Error('Value is not a valid SearchIntent');
	}
}
