// ABOUTME: Cancellable unit of background work with an explicit state machine
// ABOUTME: Pending -> Running -> Completed | Canceled | Failed; never rejects its settled promise

export type TaskKind = 'lookup' | 'rebuild';

/**
 * Failure raised by work that threw instead of returning a typed error
 */
export interface TaskCrash {
	kind: 'crashed';
	message: string;
}

export type WorkResult<T, E> = { ok: true; value: T } | { ok: false; error: E };

export type TaskWork<T, E> = (signal: AbortSignal) => Promise<WorkResult<T, E>>;

export type TaskOutcome<T, E> =
	| { status: 'completed'; value: T }
	| { status: 'canceled' }
	| { status: 'failed'; error: E | TaskCrash };

export type TaskState<T, E> = { status: 'pending' } | { status: 'running' } | TaskOutcome<T, E>;

export class BackgroundTask<T, E> {
	readonly id: number;
	readonly kind: TaskKind;
	private readonly work: TaskWork<T, E>;
	private readonly controller = new AbortController();
	private current: TaskState<T, E> = { status: 'pending' };
	private settledPromise: Promise<TaskOutcome<T, E>> | null = null;

	constructor(id: number, kind: TaskKind, work: TaskWork<T, E>) {
		this.id = id;
		this.kind = kind;
		this.work = work;
	}

	get state(): TaskState<T, E> {
		return this.current;
	}

	get isActive(): boolean {
		return this.current.status === 'pending' || this.current.status === 'running';
	}

	get signal(): AbortSignal {
		return this.controller.signal;
	}

	/**
	 * Starts the work once; later calls return the same settled promise.
	 * Results arriving after cancellation are discarded.
	 */
	run(): Promise<TaskOutcome<T, E>> {
		if (!this.settledPromise) {
			this.settledPromise = this.execute();
		}
		return this.settledPromise;
	}

	cancel(): void {
		if (!this.isActive) {
			return;
		}
		this.controller.abort();
	}

	private async execute(): Promise<TaskOutcome<T, E>> {
		if (this.controller.signal.aborted) {
			return this.settle({ status: 'canceled' });
		}

		this.current = { status: 'running' };
		try {
			const result = await this.work(this.controller.signal);
			if (this.controller.signal.aborted) {
				return this.settle({ status: 'canceled' });
			}
			return this.settle(result.ok ? { status: 'completed', value: result.value } : { status: 'failed', error: result.error });
		} catch (error) {
			if (this.controller.signal.aborted) {
				return this.settle({ status: 'canceled' });
			}
			const message = error instanceof Error ? error.message : String(error);
			return this.settle({ status: 'failed', error: { kind: 'crashed', message } });
		}
	}

	private settle(outcome: TaskOutcome<T, E>): TaskOutcome<T, E> {
		this.current = outcome;
		return outcome;
	}
}
