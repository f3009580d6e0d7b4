// ABOUTME: Deterministic synthetic lookup output for tests and performance runs
// ABOUTME: Generates realistic absolute paths, with trailing separators marking directories

import type { Entry } from '../search/types';
import { classifyLines } from '../search/result-classifier';

export interface FixtureOptions {
	/** Number of output lines to generate */
	count: number;
	/** Random seed for deterministic generation */
	seed?: number;
	/** Share of lines that are directories, between 0 and 1 */
	directoryRatio?: number;
	/** Include non-ASCII and upper-case path components */
	includeUnicode?: boolean;
}

/**
 * Simple seeded random number generator for deterministic fixtures
 */
class SeededRandom {
	private seed: number;

	constructor(seed: number = 12345) {
		this.seed = seed;
	}

	next(): number {
		this.seed = (this.seed * 9301 + 49297) % 233280;
		return this.seed / 233280;
	}

	integer(min: number, max: number): number {
		return Math.floor(this.next() * (max - min + 1)) + min;
	}

	choice<T>(array: readonly T[]): T {
		return array[this.integer(0, array.length - 1)];
	}
}

const ROOTS = ['/home/user', '/home/guest', '/srv/data', '/opt', '/run/media/user/usb', '/var/log'] as const;

const FOLDERS = [
	'Documents', 'Pictures', 'Music', 'Videos', 'Downloads', 'projects', 'src',
	'archive', 'backup', '2023', '2024', 'reports', 'photos', 'notes', 'build',
] as const;

const UNICODE_FOLDERS = ['Résumés', 'Фото', '写真', 'Ärger', 'café'] as const;

const STEMS = [
	'report', 'annual', 'invoice', 'holiday', 'main', 'index', 'readme', 'draft',
	'final', 'budget', 'setup', 'track', 'clip', 'photo', 'notes', 'backup',
] as const;

const EXTENSIONS = [
	'txt', 'md', 'pdf', 'docx', 'jpg', 'PNG', 'mp4', 'mkv', 'mp3', 'flac',
	'ts', 'py', 'zip', 'tar', 'log', 'json', 'desktop',
] as const;

/**
 * Generates raw output lines in lookup-tool format. Directory lines end with `/`.
 */
export function generateLookupOutput(options: FixtureOptions): string[] {
	const { count, seed = 12345, directoryRatio = 0.15, includeUnicode = true } = options;
	const rng = new SeededRandom(seed);
	const lines: string[] = [];

	for (let i = 0; i < count; i++) {
		const parts: string[] = [rng.choice(ROOTS)];
		const depth = rng.integer(0, 3);
		for (let d = 0; d < depth; d++) {
			parts.push(includeUnicode && rng.next() < 0.1 ? rng.choice(UNICODE_FOLDERS) : rng.choice(FOLDERS));
		}

		if (rng.next() < directoryRatio) {
			parts.push(`${rng.choice(FOLDERS)}-${i}`);
			lines.push(`${parts.join('/')}/`);
		} else {
			parts.push(`${rng.choice(STEMS)}_${i}.${rng.choice(EXTENSIONS)}`);
			lines.push(parts.join('/'));
		}
	}

	return lines;
}

/**
 * Generates classified entries
 */
export function generateEntries(options: FixtureOptions): Entry[] {
	return classifyLines(generateLookupOutput(options));
}

/**
 * Predefined fixture sets for different testing scenarios
 */
export const FIXTURE_SETS = {
	/** Small set for unit tests */
	unit: () => generateEntries({ count: 50, seed: 11111 }),

	/** Medium set for integration-style session tests */
	integration: () => generateEntries({ count: 2_000, seed: 22222 }),

	/** Result set size the per-keystroke budget is defined for */
	keystroke: () => generateEntries({ count: 20_000, seed: 33333 }),
};
