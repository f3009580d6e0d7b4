// ABOUTME: Versioned settings for the locate-desk core with defaults and JSON loading
// ABOUTME: Merges user settings section by section onto DEFAULT_SETTINGS and validates the result

import { readFile } from 'node:fs/promises';
import type { QueryParserSettings } from './search/query-parser';

export interface LocateDeskSettings {
	schemaVersion: number;
	general: {
		/** Emit debug logging from every component */
		debug: boolean;
	};
	lookup: {
		/** Lookup tool executable */
		command: string;
		primaryDbPath: string;
		/** Combined with the primary database when the file exists */
		secondaryDbPath: string;
		/** Hard deadline for one lookup */
		timeoutMs: number;
	};
	rebuild: {
		/** Privilege-escalation helper the rebuild tool runs under */
		escalationCommand: string;
		/** Rebuild tool executable */
		command: string;
		/** Directory indexed into the secondary database */
		mediaScanPath: string;
		/** Wait between the graceful and the forced termination signal */
		terminationGraceMs: number;
	};
	query: QueryParserSettings;
}

export const SETTINGS_SCHEMA_VERSION = 1;

export const DEFAULT_SETTINGS: LocateDeskSettings = {
	schemaVersion: SETTINGS_SCHEMA_VERSION,
	general: {
		debug: false,
	},
	lookup: {
		command: 'plocate',
		primaryDbPath: '/var/lib/plocate/plocate.db',
		secondaryDbPath: '/var/lib/plocate/media.db',
		timeoutMs: 120_000,
	},
	rebuild: {
		escalationCommand: 'pkexec',
		command: 'updatedb',
		mediaScanPath: '/run/media',
		terminationGraceMs: 3_000,
	},
	query: {
		categoryPrefix: '::',
		regexPrefix: 're:',
	},
};

function isRecord(v: unknown): v is Record<string, unknown> {
	return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function section(prev: Record<string, unknown>, key: string): Record<string, unknown> {
	const value = prev[key];
	return isRecord(value) ? value : {};
}

function isPositiveNumber(v: unknown): v is number {
	return typeof v === 'number' && Number.isFinite(v) && v > 0;
}

function isNonEmptyString(v: unknown): v is string {
	return typeof v === 'string' && v.length > 0;
}

/**
 * Type guard for a complete settings object
 */
export function isSettings(v: unknown): v is LocateDeskSettings {
	if (!isRecord(v) || typeof v.schemaVersion !== 'number') {
		return false;
	}
	const { general, lookup, rebuild, query } = v;
	return (
		isRecord(general) &&
		typeof general.debug === 'boolean' &&
		isRecord(lookup) &&
		isNonEmptyString(lookup.command) &&
		isNonEmptyString(lookup.primaryDbPath) &&
		typeof lookup.secondaryDbPath === 'string' &&
		isPositiveNumber(lookup.timeoutMs) &&
		isRecord(rebuild) &&
		typeof rebuild.escalationCommand === 'string' &&
		isNonEmptyString(rebuild.command) &&
		isNonEmptyString(rebuild.mediaScanPath) &&
		typeof rebuild.terminationGraceMs === 'number' &&
		rebuild.terminationGraceMs >= 0 &&
		isRecord(query) &&
		typeof query.categoryPrefix === 'string' &&
		typeof query.regexPrefix === 'string'
	);
}

/**
 * Upgrades stored settings to the current schema, filling missing fields from defaults.
 *
 * @throws Error if the merged settings are malformed or come from a newer schema
 */
export function migrateSettings(prev: unknown): LocateDeskSettings {
	if (prev === undefined || prev === null) {
		return structuredClone(DEFAULT_SETTINGS);
	}
	if (!isRecord(prev)) {
		throw new Error('Settings must be a JSON object');
	}

	const version = typeof prev.schemaVersion === 'number' ? prev.schemaVersion : 0;
	if (version > SETTINGS_SCHEMA_VERSION) {
		throw new Error(`Settings schema version ${version} is newer than supported version ${SETTINGS_SCHEMA_VERSION}`);
	}

	const merged: unknown = {
		schemaVersion: SETTINGS_SCHEMA_VERSION,
		general: { ...DEFAULT_SETTINGS.general, ...section(prev, 'general') },
		lookup: { ...DEFAULT_SETTINGS.lookup, ...section(prev, 'lookup') },
		rebuild: { ...DEFAULT_SETTINGS.rebuild, ...section(prev, 'rebuild') },
		query: { ...DEFAULT_SETTINGS.query, ...section(prev, 'query') },
	};

	if (!isSettings(merged)) {
		throw new Error('Settings contain invalid values');
	}
	return merged;
}

export interface LoadSettingsOptions {
	readText?: (path: string) => Promise<string>;
}

function isMissingFile(error: unknown): boolean {
	return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Reads settings from a JSON file. A missing file yields the defaults.
 *
 * @throws Error if the file is not valid JSON or holds invalid settings
 */
export async function loadSettings(path: string, options: LoadSettingsOptions = {}): Promise<LocateDeskSettings> {
	const readText = options.readText ?? ((p: string) => readFile(p, 'utf8'));

	let text: string;
	try {
		text = await readText(path);
	} catch (error) {
		if (isMissingFile(error)) {
			return structuredClone(DEFAULT_SETTINGS);
		}
		throw error;
	}

	let data: unknown;
	try {
		data = JSON.parse(text);
	} catch (error) {
		throw new Error(`Settings file ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
	}
	return migrateSettings(data);
}
