// ABOUTME: Fire-and-forget metadata lookups for the selected entry, tagged with a subject key
// ABOUTME: Every failure collapses into "not accessible"; callers drop reports that are no longer current

import { stat as fsStat } from 'node:fs/promises';
import type { Logger } from '../logger';
import { silentLogger } from '../logger';
import { formatSize, formatTimestamp } from './format';

export interface FileStats {
	size: number;
	mtime: Date;
}

export type StatFn = (path: string) => Promise<FileStats>;

export type MetadataOutcome =
	| { status: 'ok'; sizeBytes: number; modifiedAt: Date }
	| { status: 'notAccessible' };

/**
 * Completed request, tagged with the path it describes and its issue order
 */
export interface MetadataReport {
	subjectKey: string;
	sequence: number;
	outcome: MetadataOutcome;
}

/**
 * Display form of a metadata outcome
 */
export type MetadataStatus =
	| { kind: 'loading'; subjectKey: string }
	| { kind: 'ready'; subjectKey: string; size: string; modified: string }
	| { kind: 'notAccessible'; subjectKey: string };

export class MetadataFetcher {
	private readonly stat: StatFn;
	private readonly logger: Logger;
	private sequence = 0;

	constructor(options: { stat?: StatFn; logger?: Logger } = {}) {
		this.stat = options.stat ?? ((path: string) => fsStat(path));
		this.logger = options.logger ?? silentLogger;
	}

	/**
	 * Sequence number of the most recently issued request
	 */
	get latestSequence(): number {
		return this.sequence;
	}

	/**
	 * Stats one path. Never rejects.
	 */
	async fetch(path: string): Promise<MetadataOutcome> {
		try {
			const stats = await this.stat(path);
			return { status: 'ok', sizeBytes: stats.size, modifiedAt: stats.mtime };
		} catch (error) {
			this.logger.debug(`Metadata unavailable for ${path}: ${error instanceof Error ? error.message : String(error)}`);
			return { status: 'notAccessible' };
		}
	}

	/**
	 * Issues a tagged request. The returned sequence is strictly greater than any issued before.
	 */
	request(subjectKey: string): { sequence: number; report: Promise<MetadataReport> } {
		const sequence = ++this.sequence;
		const report = this.fetch(subjectKey).then((outcome) => ({ subjectKey, sequence, outcome }));
		return { sequence, report };
	}
}

export function toMetadataStatus(report: MetadataReport): MetadataStatus {
	if (report.outcome.status === 'notAccessible') {
		return { kind: 'notAccessible', subjectKey: report.subjectKey };
	}
	return {
		kind: 'ready',
		subjectKey: report.subjectKey,
		size: formatSize(report.outcome.sizeBytes),
		modified: formatTimestamp(report.outcome.modifiedAt),
	};
}

/**
 * One-line status text for the status bar
 */
export function describeMetadataStatus(status: MetadataStatus): string {
	switch (status.kind) {
		case 'loading':
			return 'Loading…';
		case 'ready':
			return `Size: ${status.size} | Modified: ${status.modified}`;
		case 'notAccessible':
			return 'Not accessible';
	}
}
