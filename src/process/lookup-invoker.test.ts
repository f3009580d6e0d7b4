// ABOUTME: Tests for the lookup invoker against a fake lookup tool
// ABOUTME: Covers argument building, exit-code mapping, timeout, cancellation and the secondary index probe

import { describe, it, expect, afterEach, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { buildLookupInvocation, LookupInvoker, secondaryIndexExists } from './lookup-invoker';
import type { LookupSettings } from './lookup-invoker';
import { DEFAULT_SETTINGS } from '../settings';
import type { SearchIntent } from '../search/types';
import { createFakeSpawner, exitWith, failToStart, hang, succeedWith } from '../test/fake-process';

const settings: LookupSettings = { ...DEFAULT_SETTINGS.lookup };

function intent(overrides: Partial<SearchIntent> = {}): SearchIntent {
	return { primaryTerm: 'report', postFilterTokens: [], category: null, caseInsensitive: true, ...overrides };
}

describe('buildLookupInvocation', () => {
	it('should pass -i for case-insensitive lookups', () => {
		expect(buildLookupInvocation(intent(), settings, false)).toEqual({ command: 'plocate', args: ['-i', 'report'] });
	});

	it('should omit -i for case-sensitive lookups', () => {
		expect(buildLookupInvocation(intent({ caseInsensitive: false }), settings, false).args).toEqual(['report']);
	});

	it('should combine both databases when the secondary index is used', () => {
		expect(buildLookupInvocation(intent(), settings, true).args).toEqual([
			'-i',
			'report',
			'-d',
			'/var/lib/plocate/plocate.db:/var/lib/plocate/media.db',
		]);
	});

	it('should skip the database argument when no secondary path is configured', () => {
		expect(buildLookupInvocation(intent(), { ...settings, secondaryDbPath: '' }, true).args).toEqual(['-i', 'report']);
	});

	it('should pass the term as one argument even with spaces', () => {
		expect(buildLookupInvocation(intent({ primaryTerm: 'final report' }), settings, false).args).toEqual([
			'-i',
			'final report',
		]);
	});
});

describe('LookupInvoker', () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	it('should return non-blank output lines on exit 0', async () => {
		const spawner = createFakeSpawner(succeedWith('/home/user/report.txt\n\n/home/user/reports/\n'));
		const invoker = new LookupInvoker(settings, { spawn: spawner.spawn });

		const result = await invoker.invoke(intent());

		expect(result).toEqual({ ok: true, lines: ['/home/user/report.txt', '/home/user/reports/'] });
		expect(spawner.calls[0].command).toBe('plocate');
		expect(spawner.calls[0].args).toEqual(['-i', 'report']);
	});

	it('should treat exit 1 with no output as no matches', async () => {
		const spawner = createFakeSpawner(exitWith(1));
		const invoker = new LookupInvoker(settings, { spawn: spawner.spawn });

		expect(await invoker.invoke(intent())).toEqual({ ok: true, lines: [] });
	});

	it('should treat exit 1 with diagnostics as a failure', async () => {
		const spawner = createFakeSpawner(exitWith(1, { stderr: 'plocate: /var/lib/plocate/plocate.db: Permission denied\n' }));
		const invoker = new LookupInvoker(settings, { spawn: spawner.spawn });

		expect(await invoker.invoke(intent())).toEqual({
			ok: false,
			error: {
				kind: 'nonZeroExit',
				command: 'plocate -i report',
				code: 1,
				stderr: 'plocate: /var/lib/plocate/plocate.db: Permission denied\n',
				stdout: '',
			},
		});
	});

	it('should never return partial output of a failed run', async () => {
		const spawner = createFakeSpawner(exitWith(2, { stdout: '/half/a\n', stderr: 'broken pipe\n' }));
		const invoker = new LookupInvoker(settings, { spawn: spawner.spawn });

		const result = await invoker.invoke(intent());

		expect(result.ok).toBe(false);
	});

	it('should report a missing lookup tool', async () => {
		const spawner = createFakeSpawner(failToStart());
		const invoker = new LookupInvoker(settings, { spawn: spawner.spawn });

		expect(await invoker.invoke(intent())).toEqual({
			ok: false,
			error: { kind: 'processNotFound', command: 'plocate -i report', message: 'spawn failed: ENOENT' },
		});
	});

	it('should time out using the configured deadline', async () => {
		vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
		const spawner = createFakeSpawner(hang());
		const invoker = new LookupInvoker({ ...settings, timeoutMs: 2_000 }, { spawn: spawner.spawn });

		const running = invoker.invoke(intent());
		await vi.advanceTimersByTimeAsync(2_000);

		expect(await running).toEqual({
			ok: false,
			error: { kind: 'timeout', command: 'plocate -i report', timeoutMs: 2_000 },
		});
	});

	it('should let a per-call deadline override the configured one', async () => {
		vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
		const spawner = createFakeSpawner(hang());
		const invoker = new LookupInvoker(settings, { spawn: spawner.spawn });

		const running = invoker.invoke(intent(), { timeoutMs: 50 });
		await vi.advanceTimersByTimeAsync(50);

		const result = await running;
		expect(!result.ok && result.error.kind).toBe('timeout');
	});

	it('should report cancellation', async () => {
		const spawner = createFakeSpawner(hang());
		const invoker = new LookupInvoker(settings, { spawn: spawner.spawn });
		const controller = new AbortController();

		const running = invoker.invoke(intent(), { signal: controller.signal, useSecondaryIndex: true });
		controller.abort();

		expect(await running).toEqual({
			ok: false,
			error: {
				kind: 'canceled',
				command: 'plocate -i report -d /var/lib/plocate/plocate.db:/var/lib/plocate/media.db',
			},
		});
	});
});

describe('secondaryIndexExists', () => {
	it('should detect an existing database file', async () => {
		const dir = await mkdtemp(join(tmpdir(), 'locate-desk-'));
		try {
			const db = join(dir, 'media.db');
			await writeFile(db, '');
			expect(await secondaryIndexExists(db)).toBe(true);
			expect(await secondaryIndexExists(join(dir, 'missing.db'))).toBe(false);
		} finally {
			await rm(dir, { recursive: true, force: true });
		}
	});

	it('should treat an empty path as absent', async () => {
		expect(await secondaryIndexExists('')).toBe(false);
	});
});
