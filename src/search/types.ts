// ABOUTME: Core type definitions for the locate-desk query and filter pipeline
// ABOUTME: Defines Entry, CategoryId, SearchIntent, Matcher and related types shared by the core

/**
 * One matched filesystem path, split into a displayable name and its containing directory.
 * Immutable once created by the result classifier.
 */
export interface Entry {
	/** Final path component; `/` for the filesystem root */
	readonly name: string;

	/** Containing directory; the root is represented by `/` itself, never by an empty string */
	readonly parentPath: string;

	/** True when the lookup tool reported the path with a trailing separator */
	readonly isDirectory: boolean;

	/** Parent and name joined once at classification time */
	readonly fullPath: string;
}

/**
 * Stable identifiers for the predefined file-type groupings
 */
export type CategoryId =
	| 'all'
	| 'directories'
	| 'documents'
	| 'images'
	| 'videos'
	| 'audio'
	| 'apps'
	| 'code'
	| 'archives'
	| 'text';

/**
 * Static definition of a category: either an extension set or the directories-only marker
 */
export interface CategoryDefinition {
	id: CategoryId;

	/** Names accepted after the shortcut prefix (e.g. `doc` in `::doc`) */
	shortcuts: string[];

	/** Lower-cased extensions without the leading dot; empty for `all` and `directories` */
	extensions: string[];

	/** Matches directories regardless of their name */
	directoriesOnly: boolean;
}

/**
 * Category predicate applied by the filter engine
 */
export type Matcher =
	| { kind: 'all' }
	| { kind: 'directories' }
	| { kind: 'pattern'; category: CategoryId; pattern: RegExp };

/**
 * Structured search intent produced fresh for every lookup
 */
export interface SearchIntent {
	/** The single term handed to the lookup tool */
	primaryTerm: string;

	/** Tokens applied only by in-memory filtering */
	postFilterTokens: string[];

	/** Category selected by an inline shortcut, if any */
	category: CategoryId | null;

	/** Whether the lookup and the in-memory filter ignore case */
	caseInsensitive: boolean;
}

/**
 * Cached output of the most recent successful lookup
 */
export interface RawResultSet {
	/** Exact primary term that produced the entries */
	term: string;

	/** Case flag the lookup ran with */
	caseInsensitive: boolean;

	entries: Entry[];
}

/**
 * Recoverable problem found while parsing user input
 */
export interface ParseError {
	type: 'unknownCategory' | 'regex';
	message: string;
	position?: number;
}

/**
 * Output of the query tokenizer
 */
export interface TokenizedQuery {
	/** Quoted phrases first, then unquoted words */
	tokens: string[];

	category: CategoryId | null;
}

/**
 * Columns the sort engine can order by
 */
export type SortColumn = 'name' | 'parentPath';

export type SortDirection = 'ascending' | 'descending';

export interface SortState {
	column: SortColumn;
	direction: SortDirection;
}
