// ABOUTME: Tests for the task supervisor's singleton slots, rebuild chains and notifications
// ABOUTME: Drives real invokers against fake child processes

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { TaskSupervisor } from './task-supervisor';
import type { SupervisorEvent } from './task-supervisor';
import { LookupInvoker } from '../process/lookup-invoker';
import { planRebuild, RebuildInvoker } from '../process/rebuild-invoker';
import { DEFAULT_SETTINGS } from '../settings';
import type { SearchIntent } from '../search/types';
import { createFakeSpawner, exitWith, hang } from '../test/fake-process';
import type { FakeSpawner } from '../test/fake-process';

const intent: SearchIntent = { primaryTerm: 'report', postFilterTokens: [], category: null, caseInsensitive: true };

const twoSteps = planRebuild({ excludePaths: [], includeMedia: true }, DEFAULT_SETTINGS.rebuild, DEFAULT_SETTINGS.lookup);

function createSupervisor(lookupSpawner: FakeSpawner, rebuildSpawner: FakeSpawner): TaskSupervisor {
	return new TaskSupervisor({
		lookup: new LookupInvoker(DEFAULT_SETTINGS.lookup, { spawn: lookupSpawner.spawn }),
		rebuild: new RebuildInvoker(DEFAULT_SETTINGS.rebuild, { spawn: rebuildSpawner.spawn }),
	});
}

describe('TaskSupervisor', () => {
	let lookupSpawner: FakeSpawner;
	let rebuildSpawner: FakeSpawner;
	let supervisor: TaskSupervisor;
	let events: SupervisorEvent[];

	beforeEach(() => {
		lookupSpawner = createFakeSpawner(hang());
		rebuildSpawner = createFakeSpawner(hang());
		supervisor = createSupervisor(lookupSpawner, rebuildSpawner);
		const seen: SupervisorEvent[] = [];
		events = seen;
		supervisor.subscribe(event => seen.push(event));
	});

	afterEach(() => {
		supervisor.cancelActive();
	});

	describe('lookups', () => {
		it('should run a lookup and report its lines', async () => {
			const started = supervisor.startLookup(intent);
			expect(started.ok).toBe(true);
			if (!started.ok) return;

			expect(supervisor.isActive('lookup')).toBe(true);
			lookupSpawner.last().writeStdout('/home/user/report.txt\n');
			lookupSpawner.last().exit(0);

			expect(await started.handle.settled).toEqual({ status: 'completed', value: ['/home/user/report.txt'] });
			expect(supervisor.isActive('lookup')).toBe(false);
			expect(events).toEqual([
				{
					type: 'lookupSettled',
					taskId: started.handle.id,
					intent,
					outcome: { status: 'completed', value: ['/home/user/report.txt'] },
				},
			]);
		});

		it('should reject a second lookup without disturbing the first', () => {
			const first = supervisor.startLookup(intent);
			const second = supervisor.startLookup({ ...intent, primaryTerm: 'other' });

			expect(first.ok).toBe(true);
			expect(second).toEqual({ ok: false, reason: 'alreadyRunning', activeTaskId: first.ok ? first.handle.id : -1 });
			expect(lookupSpawner.calls).toHaveLength(1);
			expect(lookupSpawner.last().signals).toEqual([]);
		});

		it('should cancel through the handle', async () => {
			const started = supervisor.startLookup(intent);
			if (!started.ok) throw new Error('lookup did not start');

			expect(supervisor.cancel(started.handle)).toBe(true);

			expect(await started.handle.settled).toEqual({ status: 'canceled' });
			expect(lookupSpawner.last().signals).toEqual(['SIGTERM']);
			expect(supervisor.cancel(started.handle)).toBe(false);
		});

		it('should release the slot before notifying subscribers', async () => {
			const restarted: boolean[] = [];
			supervisor.subscribe((event) => {
				if (event.type === 'lookupSettled' && restarted.length === 0) {
					restarted.push(supervisor.startLookup({ ...intent, primaryTerm: 'next' }).ok);
				}
			});

			const started = supervisor.startLookup(intent);
			if (!started.ok) throw new Error('lookup did not start');
			lookupSpawner.last().exit(1);
			await started.handle.settled;

			expect(restarted).toEqual([true]);
			expect(lookupSpawner.calls.map(call => call.args)).toEqual([['-i', 'report'], ['-i', 'next']]);
		});

		it('should keep notifying when a listener throws', async () => {
			const seen: string[] = [];
			supervisor.subscribe(() => {
				throw new Error('listener failure');
			});
			supervisor.subscribe(event => seen.push(event.type));

			const started = supervisor.startLookup(intent);
			if (!started.ok) throw new Error('lookup did not start');
			lookupSpawner.last().exit(1);
			await started.handle.settled;

			expect(seen).toEqual(['lookupSettled']);
		});
	});

	describe('rebuilds', () => {
		it('should reject a rebuild while one runs and accept one after it completes', async () => {
			const first = supervisor.startRebuild(twoSteps.slice(0, 1));
			if (!first.ok) throw new Error('rebuild did not start');

			const rejected = supervisor.startRebuild(twoSteps.slice(0, 1));
			expect(rejected).toEqual({ ok: false, reason: 'alreadyRunning', activeTaskId: first.handle.id });
			expect(rebuildSpawner.last().signals).toEqual([]);

			rebuildSpawner.last().exit(0);
			await first.handle.settled;

			expect(supervisor.startRebuild(twoSteps.slice(0, 1)).ok).toBe(true);
		});

		it('should accept a new rebuild after a failed one', async () => {
			const first = supervisor.startRebuild(twoSteps);
			if (!first.ok) throw new Error('rebuild did not start');

			rebuildSpawner.last().exit(1);
			await first.handle.settled;

			expect(supervisor.startRebuild(twoSteps).ok).toBe(true);
		});

		it('should run chain steps in order, each after the previous succeeded', async () => {
			const started = supervisor.startRebuild(twoSteps);
			if (!started.ok) throw new Error('rebuild did not start');

			expect(rebuildSpawner.calls).toHaveLength(1);
			rebuildSpawner.last().exit(0);

			await new Promise<void>(resolve => setImmediate(resolve));
			expect(rebuildSpawner.calls).toHaveLength(2);
			rebuildSpawner.last().exit(0);

			expect(await started.handle.settled).toEqual({ status: 'completed', value: twoSteps });
			expect(rebuildSpawner.calls.map(call => call.args)).toEqual([
				['updatedb'],
				['updatedb', '-o', '/var/lib/plocate/media.db', '-U', '/run/media'],
			]);
			expect(events.map(event => event.type)).toEqual(['rebuildStepSettled', 'rebuildStepSettled', 'rebuildSettled']);
		});

		it('should halt the chain when a step fails', async () => {
			rebuildSpawner = createFakeSpawner(exitWith(126, { stderr: 'Not authorized\n' }));
			supervisor = createSupervisor(lookupSpawner, rebuildSpawner);

			const started = supervisor.startRebuild(twoSteps);
			if (!started.ok) throw new Error('rebuild did not start');
			const outcome = await started.handle.settled;

			expect(rebuildSpawner.calls).toHaveLength(1);
			expect(outcome).toEqual({
				status: 'failed',
				error: {
					kind: 'stepFailed',
					step: twoSteps[0],
					error: { kind: 'nonZeroExit', command: 'pkexec updatedb', code: 126, stderr: 'Not authorized\n', stdout: '' },
				},
			});
		});

		it('should halt the chain when canceled', async () => {
			const started = supervisor.startRebuild(twoSteps);
			if (!started.ok) throw new Error('rebuild did not start');

			expect(supervisor.cancelActive('rebuild')).toBe(1);

			expect(await started.handle.settled).toEqual({ status: 'canceled' });
			expect(rebuildSpawner.calls).toHaveLength(1);
			expect(rebuildSpawner.last().signals).toEqual(['SIGTERM']);
		});

		it('should refuse an empty chain', () => {
			expect(() => supervisor.startRebuild([])).toThrow('A rebuild chain needs at least one step');
		});
	});

	it('should run a lookup and a rebuild at the same time', () => {
		expect(supervisor.startLookup(intent).ok).toBe(true);
		expect(supervisor.startRebuild(twoSteps).ok).toBe(true);
		expect(supervisor.cancelActive()).toBe(2);
	});
});
