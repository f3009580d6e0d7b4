// ABOUTME: Stable, case-insensitive ordering of entries by a chosen column
// ABOUTME: Sorts the owned raw result array in place so later filtering keeps the order

import type { Entry, SortColumn, SortState } from './types';
import { foldCase } from './normalize';

function keyOf(entry: Entry, column: SortColumn): string {
	return foldCase(column === 'name' ? entry.name : entry.parentPath);
}

/**
 * Sorts entries in place and returns the same array.
 * Entries with equal keys keep their relative order in both directions.
 */
export function sortEntries(entries: Entry[], state: SortState): Entry[] {
	const sign = state.direction === 'ascending' ? 1 : -1;
	const decorated = entries.map((entry, index) => ({ entry, index, key: keyOf(entry, state.column) }));

	decorated.sort((a, b) => {
		if (a.key < b.key) return -sign;
		if (a.key > b.key) return sign;
		return a.index - b.index;
	});

	for (let i = 0; i < decorated.length; i++) {
		entries[i] = decorated[i].entry;
	}
	return entries;
}

/**
 * Header-click behaviour: a new column sorts ascending, the same column flips direction.
 */
export function toggleSort(current: SortState | null, column: SortColumn): SortState {
	if (current && current.column === column) {
		return { column, direction: current.direction === 'ascending' ? 'descending' : 'ascending' };
	}
	return { column, direction: 'ascending' };
}
