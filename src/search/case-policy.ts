// ABOUTME: Case-sensitivity policy combining the upper-case heuristic with a manual override
// ABOUTME: The manual override wins until the query is cleared, then the heuristic resumes

import { hasUpperCase } from './normalize';

/**
 * Automatic rule: any upper-case character makes the search case-sensitive.
 */
export function autoCaseInsensitive(text: string): boolean {
	return !hasUpperCase(text);
}

export class CasePolicy {
	private manualOverride: boolean | null = null;
	private queryHasText = false;

	/**
	 * Whether a manual choice currently takes precedence over the heuristic
	 */
	get hasOverride(): boolean {
		return this.manualOverride !== null;
	}

	resolve(text: string): boolean {
		return this.manualOverride ?? autoCaseInsensitive(text);
	}

	setOverride(caseInsensitive: boolean): void {
		this.manualOverride = caseInsensitive;
	}

	/**
	 * Tracks query edits; clearing a non-empty query drops the manual override.
	 * An override chosen while the query is still empty survives until then.
	 */
	observeQuery(text: string): void {
		const hasText = text.trim().length > 0;
		if (this.queryHasText && !hasText) {
			this.manualOverride = null;
		}
		this.queryHasText = hasText;
	}
}
