// ABOUTME: Public entry point of the locate-desk core
// ABOUTME: Re-exports the session API, pipeline building blocks and settings for the desktop shell

export type {
	CategoryDefinition,
	CategoryId,
	Entry,
	Matcher,
	ParseError,
	RawResultSet,
	SearchIntent,
	SortColumn,
	SortDirection,
	SortState,
	TokenizedQuery,
} from './search/types';
export { CATEGORY_DEFINITIONS, getCategory, resolveShortcut } from './search/categories';
export { isCategoryId, isEntry, isSearchIntent, isSortState, assertIsEntry, assertIsSearchIntent } from './search/guards';
export {
	buildSearchIntent,
	parseRefineFilter,
	tokenizeQuery,
	tokenizeQueryWithErrors,
	DEFAULT_QUERY_PARSER_SETTINGS,
} from './search/query-parser';
export type { QueryParserSettings, RefineFilter } from './search/query-parser';
export { CasePolicy, autoCaseInsensitive } from './search/case-policy';
export { matchAll, matcherAccepts, regexFor } from './search/category-matcher';
export { classifyLine, classifyLines, isPlaceholder, NO_RESULTS_ENTRY } from './search/result-classifier';
export { filterEntries } from './search/filter-engine';
export { sortEntries, toggleSort } from './search/sort';

export { describeLookupError, describeRebuildError, REBUILD_CANCELED_NOTICE } from './process/errors';
export type { FailureNotice, LookupError, LookupResult, RebuildError, RebuildResult } from './process/errors';
export { formatCommand, runProcess, spawnProcess } from './process/process-runner';
export type { ProcessOutcome, SpawnedProcess, SpawnFn } from './process/process-runner';
export { buildLookupInvocation, LookupInvoker, secondaryIndexExists } from './process/lookup-invoker';
export { parseExcludePaths, planRebuild, RebuildInvoker } from './process/rebuild-invoker';
export type { RebuildOptions, RebuildStep } from './process/rebuild-invoker';

export { BackgroundTask } from './tasks/background-task';
export type { TaskKind, TaskOutcome, TaskState } from './tasks/background-task';
export { TaskSupervisor } from './tasks/task-supervisor';
export type { SupervisorEvent, TaskHandle } from './tasks/task-supervisor';

export { describeMetadataStatus, MetadataFetcher, toMetadataStatus } from './metadata/metadata-fetcher';
export type { MetadataReport, MetadataStatus, StatFn } from './metadata/metadata-fetcher';
export { formatSize, formatTimestamp } from './metadata/format';

export { createSession, rebuildReport, SessionController } from './session/session-controller';
export type {
	LookupReport,
	RebuildReport,
	RebuildStart,
	RefineReport,
	SessionEvent,
	SessionState,
} from './session/session-controller';
export { NO_SELECTION_MESSAGE } from './session/commands';
export type { CommandResult, DesktopBridge, SessionCommand } from './session/commands';

export { DEFAULT_SETTINGS, loadSettings, migrateSettings, SETTINGS_SCHEMA_VERSION } from './settings';
export type { LocateDeskSettings } from './settings';
export { createLogger, silentLogger } from './logger';
export type { Logger } from './logger';
