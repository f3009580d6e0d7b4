// ABOUTME: Invokes the external index-lookup tool for one search intent
// ABOUTME: Maps exit codes to lines or a typed LookupError; exit 1 with no output means no matches

import { access } from 'node:fs/promises';
import type { LocateDeskSettings } from '../settings';
import type { SearchIntent } from '../search/types';
import type { Logger } from '../logger';
import { silentLogger } from '../logger';
import type { LookupResult } from './errors';
import { formatCommand, runProcess } from './process-runner';
import type { SpawnFn } from './process-runner';

export type LookupSettings = LocateDeskSettings['lookup'];

export interface LookupInvocation {
	command: string;
	args: string[];
}

export interface InvokeOptions {
	signal?: AbortSignal;
	/** Overrides the configured deadline */
	timeoutMs?: number;
	/** Append the combined primary:secondary database argument */
	useSecondaryIndex?: boolean;
}

/**
 * Builds `<tool> [-i] <term> [-d <db1>:<db2>]`.
 */
export function buildLookupInvocation(
	intent: SearchIntent,
	settings: LookupSettings,
	useSecondaryIndex: boolean
): LookupInvocation {
	const args: string[] = [];
	if (intent.caseInsensitive) {
		args.push('-i');
	}
	args.push(intent.primaryTerm);
	if (useSecondaryIndex && settings.secondaryDbPath.length > 0) {
		args.push('-d', `${settings.primaryDbPath}:${settings.secondaryDbPath}`);
	}
	return { command: settings.command, args };
}

/**
 * Probes whether the secondary database file exists and is readable.
 */
export async function secondaryIndexExists(path: string): Promise<boolean> {
	if (path.length === 0) {
		return false;
	}
	try {
		await access(path);
		return true;
	} catch {
		return false;
	}
}

function outputLines(stdout: string): string[] {
	return stdout.split(/\r?\n/).filter(line => line.trim().length > 0);
}

export class LookupInvoker {
	private readonly settings: LookupSettings;
	private readonly spawn: SpawnFn | undefined;
	private readonly logger: Logger;
	private readonly terminationGraceMs: number;

	constructor(
		settings: LookupSettings,
		options: { spawn?: SpawnFn; logger?: Logger; terminationGraceMs?: number } = {}
	) {
		this.settings = settings;
		this.spawn = options.spawn;
		this.logger = options.logger ?? silentLogger;
		this.terminationGraceMs = options.terminationGraceMs ?? 1_000;
	}

	/**
	 * Runs one lookup. Resolves with every non-blank output line, or a typed error.
	 * No partial output is ever returned.
	 */
	async invoke(intent: SearchIntent, options: InvokeOptions = {}): Promise<LookupResult> {
		const invocation = buildLookupInvocation(intent, this.settings, options.useSecondaryIndex ?? false);
		const commandLine = formatCommand(invocation.command, invocation.args);
		const timeoutMs = options.timeoutMs ?? this.settings.timeoutMs;

		this.logger.debug(`Running ${commandLine}`);
		const outcome = await runProcess(invocation.command, invocation.args, {
			signal: options.signal,
			timeoutMs,
			terminationGraceMs: this.terminationGraceMs,
			spawn: this.spawn,
			logger: this.logger,
		});

		switch (outcome.kind) {
			case 'startFailed':
				return { ok: false, error: { kind: 'processNotFound', command: commandLine, message: outcome.message } };
			case 'timeout':
				return { ok: false, error: { kind: 'timeout', command: commandLine, timeoutMs } };
			case 'canceled':
				return { ok: false, error: { kind: 'canceled', command: commandLine } };
			case 'exited':
				break;
		}

		if (outcome.code === 0) {
			const lines = outputLines(outcome.stdout);
			this.logger.debug(`${commandLine} returned ${lines.length} lines`);
			return { ok: true, lines };
		}

		if (outcome.code === 1 && outcome.stdout.trim().length === 0 && outcome.stderr.trim().length === 0) {
			this.logger.debug(`${commandLine} found no matches`);
			return { ok: true, lines: [] };
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
