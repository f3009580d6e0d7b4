// ABOUTME: Session controller owning all search state and exposing the collaborator-facing API
// ABOUTME: Workers report back through supervisor events; only this controller mutates SessionState

import type { CategoryId, Entry, RawResultSet, SearchIntent, SortColumn, SortState } from '../search/types';
import type { LocateDeskSettings } from '../settings';
import type { Logger } from '../logger';
import { createLogger } from '../logger';
import { CasePolicy } from '../search/case-policy';
import { regexFor } from '../search/category-matcher';
import { filterEntries } from '../search/filter-engine';
import { compileRegex } from '../search/normalize';
import { buildSearchIntent, parseRefineFilter, tokenizeQueryWithErrors } from '../search/query-parser';
import type { RefineFilter } from '../search/query-parser';
import { classifyLines, isPlaceholder, NO_RESULTS_ENTRY } from '../search/result-classifier';
import { sortEntries, toggleSort } from '../search/sort';
import { describeLookupError, describeRebuildError, REBUILD_CANCELED_NOTICE } from '../process/errors';
import type { FailureNotice } from '../process/errors';
import { buildLookupInvocation, LookupInvoker, secondaryIndexExists } from '../process/lookup-invoker';
import { formatCommand } from '../process/process-runner';
import type { SpawnFn } from '../process/process-runner';
import { planRebuild, RebuildInvoker } from '../process/rebuild-invoker';
import type { RebuildOptions, RebuildStep } from '../process/rebuild-invoker';
import { TaskSupervisor } from '../tasks/task-supervisor';
import type { LookupOutcome, RebuildChainOutcome, SupervisorEvent } from '../tasks/task-supervisor';
import { MetadataFetcher, toMetadataStatus } from '../metadata/metadata-fetcher';
import type { MetadataReport, MetadataStatus, StatFn } from '../metadata/metadata-fetcher';
import { NO_SELECTION_MESSAGE } from './commands';
import type { CommandResult, DesktopBridge, SessionCommand } from './commands';

/**
 * Everything the interactive side knows about the current search
 */
export interface SessionState {
	queryText: string;
	/** Category chosen in the UI; a shortcut in the current intent takes precedence */
	category: CategoryId;
	intent: SearchIntent | null;
	raw: RawResultSet | null;
	/** Filtered, sorted entries currently displayed; never the raw result array itself */
	view: Entry[];
	/** A lookup ran and nothing survived filtering */
	showPlaceholder: boolean;
	sort: SortState | null;
	caseInsensitive: boolean;
	caseOverride: boolean;
	selection: Entry | null;
	metadata: MetadataStatus | null;
	lookupRunning: boolean;
	rebuildRunning: boolean;
}

export type SessionEvent =
	| { type: 'viewChanged'; rows: readonly Entry[]; placeholder: boolean; total: number }
	| { type: 'lookupStateChanged'; running: boolean }
	| { type: 'failure'; notice: FailureNotice }
	| { type: 'metadataChanged'; status: MetadataStatus | null }
	| { type: 'rebuildStateChanged'; running: boolean; message: string }
	| { type: 'rebuildFinished'; ok: boolean; notice: FailureNotice };

export type SessionListener = (event: SessionEvent) => void;

export type LookupReport =
	| { status: 'completed' | 'cached' | 'cleared'; view: readonly Entry[] }
	| { status: 'superseded' }
	| { status: 'failed' | 'canceled'; notice: FailureNotice };

export type RefineReport =
	| { ok: true; view: readonly Entry[] }
	| { ok: false; view: readonly Entry[]; notice: FailureNotice };

export interface RebuildReport {
	ok: boolean;
	completedSteps: RebuildStep['id'][];
	notice: FailureNotice;
}

export type RebuildStart =
	| { status: 'started'; steps: RebuildStep[]; done: Promise<RebuildReport> }
	| { status: 'alreadyRunning' };

interface LookupRequest {
	intent: SearchIntent;
	commandLine: string;
	resolve: (report: LookupReport) => void;
}

interface ActiveLookup {
	request: LookupRequest;
	taskId: number;
	/** Set when the query was cleared; the result is dropped silently */
	discard: boolean;
}

export interface SessionOptions {
	settings: LocateDeskSettings;
	supervisor: TaskSupervisor;
	metadata: MetadataFetcher;
	bridge: DesktopBridge;
	probeSecondaryIndex?: () => Promise<boolean>;
	logger?: Logger;
}

function initialState(): SessionState {
	return {
		queryText: '',
		category: 'all',
		intent: null,
		raw: null,
		view: [],
		showPlaceholder: false,
		sort: null,
		caseInsensitive: true,
		caseOverride: false,
		selection: null,
		metadata: null,
		lookupRunning: false,
		rebuildRunning: false,
	};
}

export function rebuildReport(outcome: RebuildChainOutcome): RebuildReport {
	switch (outcome.status) {
		case 'completed':
			return {
				ok: true,
				completedSteps: outcome.value.map(step => step.id),
				notice: { title: 'Update Completed', message: outcome.value.map(step => step.successMessage).join('\n') },
			};
		case 'canceled':
			return { ok: false, completedSteps: [], notice: REBUILD_CANCELED_NOTICE };
		case 'failed': {
			const failure = outcome.error;
			if (failure.kind === 'crashed') {
				return { ok: false, completedSteps: [], notice: { title: 'Update Error', message: failure.message } };
			}
			const inner = failure.error;
			const notice = inner.kind === 'crashed'
				? { title: 'Update Error', message: inner.message }
				: describeRebuildError(inner);
			return { ok: false, completedSteps: [], notice };
		}
	}
}

export class SessionController {
	private readonly settings: LocateDeskSettings;
	private readonly supervisor: TaskSupervisor;
	private readonly metadata: MetadataFetcher;
	private readonly bridge: DesktopBridge;
	private readonly probeSecondaryIndex: () => Promise<boolean>;
	private readonly logger: Logger;
	private readonly casePolicy = new CasePolicy();
	private readonly listeners = new Set<SessionListener>();
	private readonly patternCache = new Map<string, RegExp>();
	private readonly unsubscribe: () => void;

	private state: SessionState = initialState();
	private refine: RefineFilter = { tokens: [], regexSource: null };
	private activeLookup: ActiveLookup | null = null;
	private pendingLookup: LookupRequest | null = null;
	private cacheValid = false;
	private secondaryIndexAvailable = false;

	constructor(options: SessionOptions) {
		this.settings = options.settings;
		this.supervisor = options.supervisor;
		this.metadata = options.metadata;
		this.bridge = options.bridge;
		this.logger = options.logger ?? createLogger('Session', { debug: options.settings.general.debug });
		this.probeSecondaryIndex =
			options.probeSecondaryIndex ?? (() => secondaryIndexExists(options.settings.lookup.secondaryDbPath));
		this.unsubscribe = this.supervisor.subscribe((event) => this.handleSupervisorEvent(event));
	}

	/**
	 * Probes the secondary database so lookups know whether to combine indexes.
	 */
	async initialize(): Promise<void> {
		await this.refreshSecondaryIndex();
	}

	dispose(): void {
		this.unsubscribe();
		this.dropPendingLookup();
		if (this.activeLookup) {
			this.activeLookup.request.resolve({ status: 'superseded' });
			this.activeLookup = null;
		}
		this.supervisor.cancelActive();
		this.listeners.clear();
	}

	subscribe(listener: SessionListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	/**
	 * Snapshot of the session state; arrays are shared, not copied.
	 */
	getState(): Readonly<SessionState> {
		return { ...this.state };
	}

	/**
	 * Rows to render: the view, or the single placeholder row when nothing matched.
	 */
	rows(): readonly Entry[] {
		return this.state.showPlaceholder ? [NO_RESULTS_ENTRY] : this.state.view;
	}

	/**
	 * Runs the query in the main box. Reuses the cached raw results when the primary
	 * term and case flag are unchanged; otherwise starts a lookup, superseding any
	 * lookup still running.
	 */
	runLookup(text: string): Promise<LookupReport> {
		this.state.queryText = text;
		this.casePolicy.observeQuery(text);
		this.state.caseOverride = this.casePolicy.hasOverride;

		const parsed = tokenizeQueryWithErrors(text, this.settings.query);
		for (const error of parsed.errors) {
			this.logger.debug(error.message);
		}

		const caseInsensitive = this.casePolicy.resolve(parsed.query.tokens.join(' '));
		const intent = buildSearchIntent(parsed.query, caseInsensitive);
		this.state.caseInsensitive = caseInsensitive;

		if (!intent) {
			this.abandonLookups();
			this.clearResults();
			return Promise.resolve({ status: 'cleared', view: this.state.view });
		}

		if (!this.activeLookup && this.canReuseCache(intent)) {
			this.logger.debug(`Reusing cached results for "${intent.primaryTerm}"`);
			this.state.intent = intent;
			this.recomputeView();
			return Promise.resolve({ status: 'cached', view: this.state.view });
		}

		const invocation = buildLookupInvocation(intent, this.settings.lookup, this.secondaryIndexAvailable);
		return new Promise<LookupReport>((resolve) => {
			const request: LookupRequest = {
				intent,
				commandLine: formatCommand(invocation.command, invocation.args),
				resolve,
			};

			if (this.activeLookup) {
				this.dropPendingLookup();
				this.pendingLookup = request;
				this.supervisor.cancel({ id: this.activeLookup.taskId, kind: 'lookup' });
				return;
			}
			this.startLookup(request);
		});
	}

	/**
	 * Re-applies the refine box to the cached results without re-running the lookup.
	 * An invalid pattern leaves the current view in place.
	 */
	refineFilter(text: string): RefineReport {
		const parsed = parseRefineFilter(text, this.settings.query);
		if (parsed.errors.length > 0) {
			const notice: FailureNotice = {
				title: 'Error',
				message: `Filter contains an invalid regex pattern.\n${parsed.errors.map(e => e.message).join('\n')}`,
			};
			this.emit({ type: 'failure', notice });
			return { ok: false, view: this.state.view, notice };
		}

		this.refine = parsed.filter;
		this.recomputeView();
		return { ok: true, view: this.state.view };
	}

	/**
	 * Selects a category in the UI, replacing any shortcut category of the current intent.
	 */
	setCategory(category: CategoryId): readonly Entry[] {
		this.state.category = category;
		if (this.state.intent && this.state.intent.category !== null) {
			this.state.intent = { ...this.state.intent, category: null };
		}
		this.recomputeView();
		return this.state.view;
	}

	/**
	 * Header click: sorts the owned raw results in place, then re-filters.
	 */
	sortBy(column: SortColumn): SortState {
		const sort = toggleSort(this.state.sort, column);
		this.state.sort = sort;
		if (this.state.raw) {
			sortEntries(this.state.raw.entries, sort);
		}
		this.recomputeView();
		return sort;
	}

	/**
	 * Manual case toggle; wins over the upper-case heuristic until the query is cleared.
	 */
	setCaseInsensitive(caseInsensitive: boolean): Promise<LookupReport> {
		this.casePolicy.setOverride(caseInsensitive);
		this.state.caseOverride = true;
		return this.runLookup(this.state.queryText);
	}

	/**
	 * Selects an entry and fetches its metadata. Resolves with the status that was
	 * applied, or null when the selection moved on before the fetch completed.
	 */
	selectEntry(entry: Entry | null): Promise<MetadataStatus | null> {
		if (!entry || isPlaceholder(entry)) {
			this.state.selection = null;
			this.setMetadata(null);
			return Promise.resolve(null);
		}

		this.state.selection = entry;
		this.setMetadata({ kind: 'loading', subjectKey: entry.fullPath });
		const { report } = this.metadata.request(entry.fullPath);
		return report.then((completed) => {
			if (!this.isCurrentMetadata(completed)) {
				this.logger.debug(`Dropping stale metadata for ${completed.subjectKey}`);
				return null;
			}
			const status = toMetadataStatus(completed);
			this.setMetadata(status);
			return status;
		});
	}

	startRebuild(options: RebuildOptions): RebuildStart {
		const steps = planRebuild(options, this.settings.rebuild, this.settings.lookup);
		const started = this.supervisor.startRebuild(steps);
		if (!started.ok) {
			return { status: 'alreadyRunning' };
		}

		this.state.rebuildRunning = true;
		this.emit({ type: 'rebuildStateChanged', running: true, message: steps[0].startMessage });
		return { status: 'started', steps, done: started.handle.settled.then(rebuildReport) };
	}

	/**
	 * Cancels the running lookup and rebuild, if any.
	 *
	 * @returns Number of tasks asked to cancel
	 */
	cancelActive(): number {
		this.dropPendingLookup();
		return this.supervisor.cancelActive();
	}

	async dispatch(command: SessionCommand): Promise<CommandResult> {
		switch (command.type) {
			case 'openEntry':
				return this.withSelection(entry => this.bridge.openPath(entry.fullPath), 'Opened');
			case 'openContainingFolder':
				return this.withSelection(entry => this.bridge.openPath(entry.parentPath), 'Opened folder');
			case 'copyPath':
				return this.withSelection(entry => this.bridge.copyText(entry.fullPath), 'Copied');
			case 'startRebuild': {
				const started = this.startRebuild(command.options);
				if (started.status === 'alreadyRunning') {
					return { ok: false, reason: 'alreadyRunning', message: 'A database update is already running.' };
				}
				return { ok: true, message: started.steps[0].startMessage };
			}
			case 'cancelActive': {
				const count = this.cancelActive();
				return { ok: true, message: count > 0 ? 'Cancellation requested.' : 'Nothing to cancel.' };
			}
		}
	}

	private async withSelection(action: (entry: Entry) => Promise<void>, verb: string): Promise<CommandResult> {
		const entry = this.state.selection;
		if (!entry || isPlaceholder(entry)) {
			return { ok: false, reason: 'noSelection', message: NO_SELECTION_MESSAGE };
		}
		try {
			await action(entry);
			return { ok: true, message: `${verb} ${entry.fullPath}` };
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			this.logger.warn(`${verb} failed for ${entry.fullPath}: ${message}`);
			return { ok: false, reason: 'failed', message };
		}
	}

	private startLookup(request: LookupRequest): void {
		const started = this.supervisor.startLookup(request.intent, {
			useSecondaryIndex: this.secondaryIndexAvailable,
			timeoutMs: this.settings.lookup.timeoutMs,
		});
		if (!started.ok) {
			this.logger.warn(`Lookup slot held by task ${started.activeTaskId}, queueing "${request.intent.primaryTerm}"`);
			this.pendingLookup = request;
			this.supervisor.cancelActive('lookup');
			return;
		}

		this.activeLookup = { request, taskId: started.handle.id, discard: false };
		this.setLookupRunning(true);
	}

	private handleSupervisorEvent(event: SupervisorEvent): void {
		switch (event.type) {
			case 'lookupSettled':
				this.handleLookupSettled(event.taskId, event.outcome);
				return;
			case 'rebuildStepSettled':
				if (event.outcome.status === 'completed') {
					this.emit({ type: 'rebuildStateChanged', running: true, message: event.step.successMessage });
				}
				return;
			case 'rebuildSettled': {
				this.cacheValid = false;
				this.state.rebuildRunning = false;
				const report = rebuildReport(event.outcome);
				this.emit({ type: 'rebuildStateChanged', running: false, message: report.notice.message });
				this.emit({ type: 'rebuildFinished', ok: report.ok, notice: report.notice });
				this.refreshSecondaryIndex().catch((error: unknown) => {
					this.logger.warn('Secondary index probe failed', error);
				});
				return;
			}
		}
	}

	private handleLookupSettled(taskId: number, outcome: LookupOutcome): void {
		const active = this.activeLookup;
		if (!active || active.taskId !== taskId) {
			if (!this.activeLookup && this.pendingLookup) {
				const pending = this.pendingLookup;
				this.pendingLookup = null;
				this.startLookup(pending);
			}
			return;
		}
		this.activeLookup = null;

		const pending = this.pendingLookup;
		if (pending) {
			this.pendingLookup = null;
			active.request.resolve({ status: 'superseded' });
			this.startLookup(pending);
			return;
		}

		this.setLookupRunning(false);
		if (active.discard) {
			active.request.resolve({ status: 'superseded' });
			return;
		}

		switch (outcome.status) {
			case 'completed':
				this.applyResults(active.request.intent, outcome.value);
				active.request.resolve({ status: 'completed', view: this.state.view });
				return;
			case 'canceled': {
				const notice = describeLookupError({ kind: 'canceled', command: active.request.commandLine });
				this.clearResults();
				active.request.resolve({ status: 'canceled', notice });
				return;
			}
			case 'failed': {
				const error = outcome.error;
				const notice = error.kind === 'crashed'
					? { title: 'Error', message: `Lookup failed: ${error.message}` }
					: describeLookupError(error);
				this.logger.error(notice.message);
				this.clearResults();
				this.emit({ type: 'failure', notice });
				active.request.resolve({ status: 'failed', notice });
				return;
			}
		}
	}

	private applyResults(intent: SearchIntent, lines: string[]): void {
		const entries = classifyLines(lines);
		if (this.state.sort) {
			sortEntries(entries, this.state.sort);
		}
		this.state.raw = { term: intent.primaryTerm, caseInsensitive: intent.caseInsensitive, entries };
		this.state.intent = intent;
		this.cacheValid = true;
		this.state.selection = null;
		this.setMetadata(null);
		this.recomputeView();
	}

	private clearResults(): void {
		this.state.raw = null;
		this.state.intent = null;
		this.cacheValid = false;
		this.state.selection = null;
		this.setMetadata(null);
		this.recomputeView();
	}

	private canReuseCache(intent: SearchIntent): boolean {
		const raw = this.state.raw;
		return (
			this.cacheValid &&
			raw !== null &&
			raw.term === intent.primaryTerm &&
			raw.caseInsensitive === intent.caseInsensitive
		);
	}

	private recomputeView(): void {
		const raw = this.state.raw;
		const intent = this.state.intent;

		if (!raw) {
			this.state.view = [];
			this.state.showPlaceholder = false;
		} else {
			const caseInsensitive = intent?.caseInsensitive ?? raw.caseInsensitive;
			const category = intent?.category ?? this.state.category;
			const tokens = [...(intent?.postFilterTokens ?? []), ...this.refine.tokens];
			const pattern = this.refine.regexSource === null
				? null
				: this.compilePattern(this.refine.regexSource, caseInsensitive);
			const filtered = filterEntries(raw.entries, regexFor(category), tokens, caseInsensitive, pattern);
			this.state.view = filtered === raw.entries ? filtered.slice() : filtered;
			this.state.showPlaceholder = this.state.view.length === 0;
		}

		this.emit({
			type: 'viewChanged',
			rows: this.rows(),
			placeholder: this.state.showPlaceholder,
			total: raw?.entries.length ?? 0,
		});
	}

	private compilePattern(source: string, caseInsensitive: boolean): RegExp | null {
		const flags = caseInsensitive ? 'i' : '';
		const key = `${flags}:${source}`;
		const cached = this.patternCache.get(key);
		if (cached) {
			return cached;
		}
		const compiled = compileRegex(source, flags);
		if (!compiled.ok) {
			this.logger.warn(`Ignoring refine pattern: ${compiled.message}`);
			return null;
		}
		this.patternCache.set(key, compiled.regex);
		return compiled.regex;
	}

	private isCurrentMetadata(report: MetadataReport): boolean {
		return (
			this.state.selection !== null &&
			this.state.selection.fullPath === report.subjectKey &&
			report.sequence === this.metadata.latestSequence
		);
	}

	private abandonLookups(): void {
		this.dropPendingLookup();
		if (this.activeLookup) {
			this.activeLookup.discard = true;
			this.supervisor.cancel({ id: this.activeLookup.taskId, kind: 'lookup' });
		}
	}

	private dropPendingLookup(): void {
		if (this.pendingLookup) {
			this.pendingLookup.resolve({ status: 'superseded' });
			this.pendingLookup = null;
		}
	}

	private async refreshSecondaryIndex(): Promise<void> {
		this.secondaryIndexAvailable = await this.probeSecondaryIndex();
		this.logger.debug(`Secondary index ${this.secondaryIndexAvailable ? 'available' : 'not found'}`);
	}

	private setLookupRunning(running: boolean): void {
		if (this.state.lookupRunning !== running) {
			this.state.lookupRunning = running;
			this.emit({ type: 'lookupStateChanged', running });
		}
	}

	private setMetadata(status: MetadataStatus | null): void {
		this.state.metadata = status;
		this.emit({ type: 'metadataChanged', status });
	}

	private emit(event: SessionEvent): void {
		for (const listener of Array.from(this.listeners)) {
			try {
				listener(event);
			} catch (error) {
				this.logger.error(`Listener failed while handling ${event.type}`, error);
			}
		}
	}
}

export interface SessionDependencies {
	bridge: DesktopBridge;
	spawn?: SpawnFn;
	stat?: StatFn;
	probeSecondaryIndex?: () => Promise<boolean>;
}

/**
 * Wires invokers, supervisor and metadata fetcher for one session.
 */
export function createSession(settings: LocateDeskSettings, deps: SessionDependencies): SessionController {
	const debug = settings.general.debug;
	const lookup = new LookupInvoker(settings.lookup, {
		spawn: deps.spawn,
		logger: createLogger('LookupInvoker', { debug }),
		terminationGraceMs: settings.rebuild.terminationGraceMs,
	});
	const rebuild = new RebuildInvoker(settings.rebuild, {
		spawn: deps.spawn,
		logger: createLogger('RebuildInvoker', { debug }),
	});
	const supervisor = new TaskSupervisor({ lookup, rebuild, logger: createLogger('TaskSupervisor', { debug }) });
	const metadata = new MetadataFetcher({ stat: deps.stat, logger: createLogger('MetadataFetcher', { debug }) });

	return new SessionController({
		settings,
		supervisor,
		metadata,
		bridge: deps.bridge,
		probeSecondaryIndex: deps.probeSecondaryIndex,
	});
}
