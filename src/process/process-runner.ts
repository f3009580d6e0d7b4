// ABOUTME: Runs an external line-oriented process under a deadline and an abort signal
// ABOUTME: Collects stdout/stderr, terminates gracefully on cancel or timeout, exposes only terminal results

import { spawn } from 'node:child_process';
import type { Readable } from 'node:stream';
import type { Logger } from '../logger';
import { silentLogger } from '../logger';

/**
 * Minimal view of a spawned child process
 */
export interface SpawnedProcess {
	readonly stdout: Readable;
	readonly stderr: Readable;
	/** True once the process has exited or been terminated by a signal */
	readonly exited: boolean;
	kill(signal: NodeJS.Signals): boolean;
	onError(listener: (error: Error) => void): void;
	onClose(listener: (code: number | null, signal: NodeJS.Signals | null) => void): void;
}

export type SpawnFn = (command: string, args: readonly string[]) => SpawnedProcess;

/**
 * Spawns a real child process with piped output and no stdin
 */
export const spawnProcess: SpawnFn = (command, args) => {
	const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
	return {
		stdout: child.stdout,
		stderr: child.stderr,
		get exited() {
			return child.exitCode !== null || child.signalCode !== null;
		},
		kill: (signal) => child.kill(signal),
		onError: (listener) => {
			child.on('error', listener);
		},
		onClose: (listener) => {
			child.on('close', listener);
		},
	};
};

export type ProcessOutcome =
	| { kind: 'exited'; code: number | null; signal: NodeJS.Signals | null; stdout: string; stderr: string }
	| { kind: 'startFailed'; code: string | null; message: string }
	| { kind: 'timeout' }
	| { kind: 'canceled' };

export interface RunOptions {
	signal?: AbortSignal;
	/** Hard deadline; omitted means no deadline */
	timeoutMs?: number;
	/** Wait after SIGTERM before SIGKILL and giving up on the process */
	terminationGraceMs?: number;
	spawn?: SpawnFn;
	logger?: Logger;
}

function startFailure(error: unknown): ProcessOutcome {
	if (error instanceof Error) {
		const code = 'code' in error && typeof error.code === 'string' ? error.code : null;
		return { kind: 'startFailed', code, message: error.message };
	}
	return { kind: 'startFailed', code: null, message: String(error) };
}

/**
 * Renders a command line for user-facing messages.
 *
 * @example
 * formatCommand('pkexec', ['updatedb', '-e', '/mnt/my backup']) // => "pkexec updatedb -e '/mnt/my backup'"
 */
export function formatCommand(command: string, args: readonly string[]): string {
	return [command, ...args]
		.map(part => (part.length === 0 || /\s|'/.test(part) ? `'${part.replace(/'/g, `'\\''`)}'` : part))
		.join(' ');
}

/**
 * Runs a process to completion. Never rejects.
 *
 * Cancellation and timeout send SIGTERM, then SIGKILL after the grace period;
 * output collected up to that point is discarded. A process that has already
 * exited when termination is requested is not an error.
 */
export function runProcess(command: string, args: readonly string[], options: RunOptions = {}): Promise<ProcessOutcome> {
	const {
		signal,
		timeoutMs,
		terminationGraceMs = 3_000,
		spawn: spawnFn = spawnProcess,
		logger = silentLogger,
	} = options;

	if (signal?.aborted) {
		return Promise.resolve({ kind: 'canceled' });
	}

	return new Promise<ProcessOutcome>((resolve) => {
		let settled = false;
		let terminating: 'timeout' | 'canceled' | null = null;
		let stdout = '';
		let stderr = '';
		let deadline: NodeJS.Timeout | undefined;
		let graceTimer: NodeJS.Timeout | undefined;

		const finish = (outcome: ProcessOutcome): void => {
			if (settled) {
				return;
			}
			settled = true;
			clearTimeout(deadline);
			clearTimeout(graceTimer);
			signal?.removeEventListener('abort', onAbort);
			resolve(outcome);
		};

		let child: SpawnedProcess;
		try {
			child = spawnFn(command, args);
		} catch (error) {
			finish(startFailure(error));
			return;
		}

		const terminate = (reason: 'timeout' | 'canceled'): void => {
			if (settled || terminating !== null) {
				return;
			}
			terminating = reason;
			if (child.exited) {
				logger.debug(`${command} already exited before ${reason} termination`);
				finish({ kind: reason });
				return;
			}
			logger.debug(`Terminating ${command} (${reason})`);
			child.kill('SIGTERM');
			graceTimer = setTimeout(() => {
				if (!child.exited) {
					logger.warn(`${command} did not exit after SIGTERM, sending SIGKILL`);
					child.kill('SIGKILL');
				}
				finish({ kind: reason });
			}, terminationGraceMs);
		};

		function onAbort(): void {
			terminate('canceled');
		}

		signal?.addEventListener('abort', onAbort, { once: true });
		if (timeoutMs !== undefined) {
			deadline = setTimeout(() => terminate('timeout'), timeoutMs);
		}

		child.stdout.setEncoding('utf8');
		child.stdout.on('data', (chunk: string) => {
			stdout += chunk;
		});
		child.stderr.setEncoding('utf8');
		child.stderr.on('data', (chunk: string) => {
			stderr += chunk;
		});

		child.onError((error) => {
			if (terminating !== null) {
				logger.debug(`Ignoring error while terminating ${command}: ${error.message}`);
				return;
			}
			finish(startFailure(error));
		});

		child.onClose((code, exitSignal) => {
			if (terminating !== null) {
				finish({ kind: terminating });
				return;
			}
			finish({ kind: 'exited', code, signal: exitSignal, stdout, stderr });
		});
	});
}
