// ABOUTME: Plans and runs index rebuilds through the privilege-escalation helper
// ABOUTME: A rebuild plan is an ordered list of steps: system database, then optionally the media database

import type { LocateDeskSettings } from '../settings';
import type { Logger } from '../logger';
import { silentLogger } from '../logger';
import { splitWords } from '../search/normalize';
import type { RebuildResult } from './errors';
import { formatCommand, runProcess } from './process-runner';
import type { SpawnFn } from './process-runner';

export type RebuildSettings = LocateDeskSettings['rebuild'];

export interface RebuildOptions {
	/** Paths excluded from the system database */
	excludePaths: string[];
	/** Also index the media scan path into the secondary database */
	includeMedia: boolean;
}

export interface RebuildStep {
	id: 'system' | 'media';
	command: string;
	args: string[];
	/** Shown while the step runs */
	startMessage: string;
	/** Shown once the step completes */
	successMessage: string;
}

/**
 * Splits the exclusion input on whitespace.
 *
 * @example
 * parseExcludePaths(' /mnt/backup  /tmp ') // => ['/mnt/backup', '/tmp']
 */
export function parseExcludePaths(text: string): string[] {
	return splitWords(text);
}

function escalated(settings: RebuildSettings, toolArgs: string[]): { command: string; args: string[] } {
	if (settings.escalationCommand.length === 0) {
		return { command: settings.command, args: toolArgs };
	}
	return { command: settings.escalationCommand, args: [settings.command, ...toolArgs] };
}

/**
 * Builds the rebuild chain for the given options.
 *
 * @example
 * planRebuild({ excludePaths: ['/tmp'], includeMedia: true }, settings.rebuild, settings.lookup)
 * // => [pkexec updatedb -e /tmp, pkexec updatedb -o /var/lib/plocate/media.db -U /run/media]
 */
export function planRebuild(
	options: RebuildOptions,
	settings: RebuildSettings,
	lookup: LocateDeskSettings['lookup']
): RebuildStep[] {
	const excludes = options.excludePaths.filter(path => path.length > 0);
	const systemArgs = excludes.length > 0 ? ['-e', ...excludes] : [];
	const steps: RebuildStep[] = [
		{
			id: 'system',
			...escalated(settings, systemArgs),
			startMessage: excludes.length > 0
				? 'System DB update started (excluding custom paths).'
				: 'System DB update started (using default configuration).',
			successMessage: 'System database updated successfully.',
		},
	];

	if (options.includeMedia) {
		steps.push({
			id: 'media',
			...escalated(settings, ['-o', lookup.secondaryDbPath, '-U', settings.mediaScanPath]),
			startMessage: `Media DB update started (Indexing ${settings.mediaScanPath}).`,
			successMessage: 'Media database updated successfully.',
		});
	}

	return steps;
}

export class RebuildInvoker {
	private readonly spawn: SpawnFn | undefined;
	private readonly logger: Logger;
	private readonly terminationGraceMs: number;

	constructor(settings: RebuildSettings, options: { spawn?: SpawnFn; logger?: Logger } = {}) {
		this.spawn = options.spawn;
		this.logger = options.logger ?? silentLogger;
		this.terminationGraceMs = settings.terminationGraceMs;
	}

	/**
	 * Runs one rebuild step. Rebuilds carry no deadline; only cancellation stops them.
	 */
	async run(step: RebuildStep, options: { signal?: AbortSignal } = {}): Promise<RebuildResult> {
		const commandLine = formatCommand(step.command, step.args);
		this.logger.info(step.startMessage);
		this.logger.debug(`Running ${commandLine}`);

		const outcome = await runProcess(step.command, step.args, {
			signal: options.signal,
			terminationGraceMs: this.terminationGraceMs,
			spawn: this.spawn,
			logger: this.logger,
		});

		switch (outcome.kind) {
			case 'startFailed':
				return { ok: false, error: { kind: 'processNotFound', command: commandLine, message: outcome.message } };
			case 'canceled':
			case 'timeout':
				return { ok: false, error: { kind: 'canceled', command: commandLine } };
			case 'exited':
				if (outcome.code === 0) {
					this.logger.info(step.successMessage);
					return { ok: true };
				}
				return {
					ok: false,
					error: {
						kind: 'nonZeroExit',
						command: commandLine,
						code: outcome.code,
						stderr: outcome.stderr,
						stdout: outcome.stdout,
					},
				};
		}
	}
}
