// ABOUTME: Tests for settings defaults, migration and loading
// ABOUTME: Verifies section-wise merging, validation and missing-file handling

import { describe, it, expect } from 'vitest';
import { DEFAULT_SETTINGS, SETTINGS_SCHEMA_VERSION, isSettings, loadSettings, migrateSettings } from './settings';

describe('Settings', () => {
	it('should ship valid defaults', () => {
		expect(isSettings(DEFAULT_SETTINGS)).toBe(true);
		expect(DEFAULT_SETTINGS.lookup.timeoutMs).toBe(120_000);
		expect(DEFAULT_SETTINGS.rebuild.escalationCommand).toBe('pkexec');
	});

	describe('migrateSettings', () => {
		it('should return a copy of the defaults for empty input', () => {
			const settings = migrateSettings(undefined);
			expect(settings).toEqual(DEFAULT_SETTINGS);
			expect(settings).not.toBe(DEFAULT_SETTINGS);
			expect(migrateSettings(null)).toEqual(DEFAULT_SETTINGS);
		});

		it('should merge each section onto the defaults', () => {
			const settings = migrateSettings({
				schemaVersion: 1,
				general: { debug: true },
				lookup: { timeoutMs: 30_000 },
			});

			expect(settings.general.debug).toBe(true);
			expect(settings.lookup).toEqual({ ...DEFAULT_SETTINGS.lookup, timeoutMs: 30_000 });
			expect(settings.rebuild).toEqual(DEFAULT_SETTINGS.rebuild);
		});

		it('should upgrade unversioned settings', () => {
			const settings = migrateSettings({ query: { categoryPrefix: '@' } });
			expect(settings.schemaVersion).toBe(SETTINGS_SCHEMA_VERSION);
			expect(settings.query).toEqual({ categoryPrefix: '@', regexPrefix: 're:' });
		});

		it('should ignore sections that are not objects', () => {
			expect(migrateSettings({ lookup: 'plocate' }).lookup).toEqual(DEFAULT_SETTINGS.lookup);
		});

		it('should reject invalid values', () => {
			expect(() => migrateSettings({ lookup: { timeoutMs: -1 } })).toThrow('Settings contain invalid values');
			expect(() => migrateSettings({ lookup: { command: '' } })).toThrow('Settings contain invalid values');
			expect(() => migrateSettings([1, 2])).toThrow('Settings must be a JSON object');
		});

		it('should reject settings from a newer schema', () => {
			expect(() => migrateSettings({ schemaVersion: 99 })).toThrow(
				'Settings schema version 99 is newer than supported version 1'
			);
		});
	});

	describe('loadSettings', () => {
		it('should read and migrate a JSON file', async () => {
			const settings = await loadSettings('/etc/locate-desk.json', {
				readText: async () => JSON.stringify({ lookup: { command: '/usr/local/bin/plocate' } }),
			});

			expect(settings.lookup.command).toBe('/usr/local/bin/plocate');
		});

		it('should fall back to defaults when the file is missing', async () => {
			const settings = await loadSettings('/nowhere.json', {
				readText: async () => {
					throw Object.assign(new Error('ENOENT: no such file or directory'), { code: 'ENOENT' });
				},
			});

			expect(settings).toEqual(DEFAULT_SETTINGS);
		});

		it('should propagate other read errors', async () => {
			await expect(loadSettings('/root.json', {
				readText: async () => {
					throw Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });
				},
			})).rejects.toThrow('EACCES: permission denied');
		});

		it('should reject malformed JSON', async () => {
			await expect(loadSettings('/bad.json', { readText: async () => '{ nope' })).rejects.toThrow(
				/^Settings file \/bad\.json is not valid JSON: /
			);
		});
	});
});
