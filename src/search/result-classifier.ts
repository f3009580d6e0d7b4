// ABOUTME: Converts raw lookup-tool output lines into structured Entry records
// ABOUTME: Splits each path into name and parent, marking trailing-separator lines as directories

import type { Entry } from './types';

const SEPARATOR = '/';

const ROOT_ENTRY: Entry = Object.freeze({
	name: SEPARATOR,
	parentPath: SEPARATOR,
	isDirectory: true,
	fullPath: SEPARATOR,
});

/**
 * Joins a parent directory and a name without doubling the root separator.
 */
export function joinPath(parentPath: string, name: string): string {
	return parentPath === SEPARATOR ? `${SEPARATOR}${name}` : `${parentPath}${SEPARATOR}${name}`;
}

/**
 * Classifies one non-blank output line.
 *
 * @example
 * classifyLine('/home/user/doc.txt')  // => { name: 'doc.txt', parentPath: '/home/user', isDirectory: false }
 * classifyLine('/home/user/Photos/')  // => { name: 'Photos', parentPath: '/home/user', isDirectory: true }
 * classifyLine('/')                   // => { name: '/', parentPath: '/', isDirectory: true }
 */
export function classifyLine(rawLine: string): Entry {
	const isDirectory = rawLine.endsWith(SEPARATOR);
	const stripped = rawLine.replace(/\/+$/, '');
	if (stripped.length === 0) {
		return ROOT_ENTRY;
	}

	const cut = stripped.lastIndexOf(SEPARATOR);
	const name = stripped.slice(cut + 1);
	const parentPath = cut <= 0 ? SEPARATOR : stripped.slice(0, cut).replace(/\/+$/, '') || SEPARATOR;

	return Object.freeze({
		name,
		parentPath,
		isDirectory,
		fullPath: joinPath(parentPath, name),
	});
}

/**
 * Classifies a batch of output lines, skipping blank ones.
 */
export function classifyLines(lines: Iterable<string>): Entry[] {
	const entries: Entry[] = [];
	for (const line of lines) {
		const trimmed = line.trim();
		if (trimmed.length > 0) {
			entries.push(classifyLine(trimmed));
		}
	}
	return entries;
}

/**
 * Display-only row shown when a lookup matched nothing. Never a real entry.
 */
export const NO_RESULTS_ENTRY: Entry = Object.freeze({
	name: '',
	parentPath: SEPARATOR,
	isDirectory: false,
	fullPath: '',
});

export function isPlaceholder(entry: Entry): boolean {
	return entry === NO_RESULTS_ENTRY || entry.name.length === 0;
}
