// ABOUTME: Static category table mapping CategoryId values to extension sets and shortcut names
// ABOUTME: Loads and validates categories.json once at module load

import categoryData from './categories.json';
import { isCategoryDefinition } from './guards';
import type { CategoryDefinition, CategoryId } from './types';

function loadDefinitions(data: unknown): ReadonlyMap<CategoryId, CategoryDefinition> {
	const records = typeof data === 'object' && data !== null && 'categories' in data ? data.categories : undefined;
	if (!Array.isArray(records)) {
		throw new Error('Category data is missing the categories list');
	}

	const definitions = new Map<CategoryId, CategoryDefinition>();
	for (const record of records) {
		if (!isCategoryDefinition(record)) {
			throw new Error(`Invalid category definition: ${JSON.stringify(record)}`);
		}
		definitions.set(record.id, {
			id: record.id,
			shortcuts: record.shortcuts.map(s => s.toLowerCase()),
			extensions: record.extensions.map(ext => ext.toLowerCase().replace(/^\./, '')),
			directoriesOnly: record.directoriesOnly,
		});
	}
	return definitions;
}

const DEFINITIONS = loadDefinitions(categoryData);

const SHORTCUTS = new Map<string, CategoryId>();
for (const definition of DEFINITIONS.values()) {
	for (const shortcut of definition.shortcuts) {
		SHORTCUTS.set(shortcut, definition.id);
	}
}

/**
 * All categories in display order
 */
export const CATEGORY_DEFINITIONS: readonly CategoryDefinition[] = Array.from(DEFINITIONS.values());

export function getCategory(id: CategoryId): CategoryDefinition {
	const definition = DEFINITIONS.get(id);
	if (!definition) {
		throw new Error(`No definition for category ${id}`);
	}
	return definition;
}

/**
 * Resolves a shortcut identifier (the part after the prefix) to a category.
 * Matching ignores case; unknown names resolve to null.
 */
export function resolveShortcut(name: string): CategoryId | null {
	return SHORTCUTS.get(name.toLowerCase()) ?? null;
}
