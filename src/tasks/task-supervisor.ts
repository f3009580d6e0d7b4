// ABOUTME: Supervises background lookups and rebuild chains with one active slot per kind
// ABOUTME: Releases a slot before notifying subscribers so reactions can start the next task at once

import type { SearchIntent } from '../search/types';
import type { Logger } from '../logger';
import { silentLogger } from '../logger';
import type { LookupError, RebuildError } from '../process/errors';
import type { InvokeOptions, LookupInvoker } from '../process/lookup-invoker';
import type { RebuildInvoker, RebuildStep } from '../process/rebuild-invoker';
import { BackgroundTask } from './background-task';
import type { TaskCrash, TaskKind, TaskOutcome, WorkResult } from './background-task';

export interface RebuildChainError {
	kind: 'stepFailed';
	step: RebuildStep;
	error: RebuildError | TaskCrash;
}

export type LookupOutcome = TaskOutcome<string[], LookupError>;
export type RebuildStepOutcome = TaskOutcome<null, RebuildError>;
export type RebuildChainOutcome = TaskOutcome<RebuildStep[], RebuildChainError>;

export type SupervisorEvent =
	| { type: 'lookupSettled'; taskId: number; intent: SearchIntent; outcome: LookupOutcome }
	| { type: 'rebuildStepSettled'; taskId: number; chainId: number; step: RebuildStep; outcome: RebuildStepOutcome }
	| { type: 'rebuildSettled'; taskId: number; steps: RebuildStep[]; outcome: RebuildChainOutcome };

export type SupervisorListener = (event: SupervisorEvent) => void;

export interface TaskHandle<O> {
	readonly id: number;
	readonly kind: TaskKind;
	/** Resolves after the slot is released and subscribers were notified */
	readonly settled: Promise<O>;
}

export type StartResult<O> =
	| { ok: true; handle: TaskHandle<O> }
	| { ok: false; reason: 'alreadyRunning'; activeTaskId: number };

export type LookupStartOptions = Omit<InvokeOptions, 'signal'>;

export class TaskSupervisor {
	private readonly lookup: LookupInvoker;
	private readonly rebuild: RebuildInvoker;
	private readonly logger: Logger;
	private readonly listeners = new Set<SupervisorListener>();
	private nextId = 1;

	private lookupTask: BackgroundTask<string[], LookupError> | null = null;
	private rebuildTask: BackgroundTask<RebuildStep[], RebuildChainError> | null = null;

	constructor(options: { lookup: LookupInvoker; rebuild: RebuildInvoker; logger?: Logger }) {
		this.lookup = options.lookup;
		this.rebuild = options.rebuild;
		this.logger = options.logger ?? silentLogger;
	}

	/**
	 * Subscribes to task completions.
	 *
	 * @returns Function removing the listener
	 */
	subscribe(listener: SupervisorListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	isActive(kind: TaskKind): boolean {
		return (kind === 'lookup' ? this.lookupTask : this.rebuildTask) !== null;
	}

	startLookup(intent: SearchIntent, options: LookupStartOptions = {}): StartResult<LookupOutcome> {
		if (this.lookupTask) {
			this.logger.debug(`Lookup rejected, task ${this.lookupTask.id} is running`);
			return { ok: false, reason: 'alreadyRunning', activeTaskId: this.lookupTask.id };
		}

		const task = new BackgroundTask<string[], LookupError>(this.nextId++, 'lookup', async (signal) => {
			const result = await this.lookup.invoke(intent, { ...options, signal });
			return result.ok ? { ok: true, value: result.lines } : { ok: false, error: result.error };
		});
		this.lookupTask = task;
		this.logger.debug(`Lookup task ${task.id} started for "${intent.primaryTerm}"`);

		const settled = task.run().then((outcome) => {
			if (this.lookupTask === task) {
				this.lookupTask = null;
			}
			this.emit({ type: 'lookupSettled', taskId: task.id, intent, outcome });
			return outcome;
		});

		return { ok: true, handle: { id: task.id, kind: 'lookup', settled } };
	}

	/**
	 * Starts a rebuild chain. Each step runs only after the previous one completed;
	 * a failure or cancellation stops the chain.
	 *
	 * @throws Error if the chain is empty
	 */
	startRebuild(steps: RebuildStep[]): StartResult<RebuildChainOutcome> {
		if (steps.length === 0) {
			throw new Error('A rebuild chain needs at least one step');
		}
		if (this.rebuildTask) {
			this.logger.debug(`Rebuild rejected, task ${this.rebuildTask.id} is running`);
			return { ok: false, reason: 'alreadyRunning', activeTaskId: this.rebuildTask.id };
		}

		const chainId = this.nextId++;
		const task = new BackgroundTask<RebuildStep[], RebuildChainError>(chainId, 'rebuild', (signal) =>
			this.runChain(chainId, steps, signal)
		);
		this.rebuildTask = task;
		this.logger.debug(`Rebuild chain ${chainId} started with ${steps.length} step(s)`);

		const settled = task.run().then((outcome) => {
			if (this.rebuildTask === task) {
				this.rebuildTask = null;
			}
			this.emit({ type: 'rebuildSettled', taskId: chainId, steps, outcome });
			return outcome;
		});

		return { ok: true, handle: { id: chainId, kind: 'rebuild', settled } };
	}

	/**
	 * Cancels the task behind a handle if it is still the active one of its kind.
	 */
	cancel(handle: { id: number; kind: TaskKind }): boolean {
		const task = handle.kind === 'lookup' ? this.lookupTask : this.rebuildTask;
		if (!task || task.id !== handle.id) {
			return false;
		}
		this.logger.debug(`Canceling ${handle.kind} task ${handle.id}`);
		task.cancel();
		return true;
	}

	/**
	 * Cancels the active task of one kind, or of every kind when none is given.
	 *
	 * @returns Number of tasks asked to cancel
	 */
	cancelActive(kind?: TaskKind): number {
		let count = 0;
		if ((kind === undefined || kind === 'lookup') && this.lookupTask) {
			this.lookupTask.cancel();
			count++;
		}
		if ((kind === undefined || kind === 'rebuild') && this.rebuildTask) {
			this.rebuildTask.cancel();
			count++;
		}
		return count;
	}

	private async runChain(
		chainId: number,
		steps: RebuildStep[],
		signal: AbortSignal
	): Promise<WorkResult<RebuildStep[], RebuildChainError>> {
		const completed: RebuildStep[] = [];

		for (const step of steps) {
			if (signal.aborted) {
				break;
			}

			const stepTask = new BackgroundTask<null, RebuildError>(this.nextId++, 'rebuild', async (stepSignal) => {
				const result = await this.rebuild.run(step, { signal: stepSignal });
				return result.ok ? { ok: true, value: null } : { ok: false, error: result.error };
			});
			const forwardCancel = (): void => stepTask.cancel();
			signal.addEventListener('abort', forwardCancel, { once: true });
			const outcome = await stepTask.run();
			signal.removeEventListener('abort', forwardCancel);

			this.emit({ type: 'rebuildStepSettled', taskId: stepTask.id, chainId, step, outcome });

			if (outcome.status === 'canceled') {
				break;
			}
			if (outcome.status === 'failed') {
				return { ok: false, error: { kind: 'stepFailed', step, error: outcome.error } };
			}
			completed.push(step);
		}

		return { ok: true, value: completed };
	}

	private emit(event: SupervisorEvent): void {
		for (const listener of Array.from(this.listeners)) {
			try {
				listener(event);
			} catch (error) {
				this.logger.error(`Listener failed while handling ${event.type}`, error);
			}
		}
	}
}
