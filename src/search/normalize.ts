// ABOUTME: Text normalization helpers shared by the tokenizer, matchers and filter engine
// ABOUTME: Handles case folding, upper-case detection and safe regex construction

/**
 * Folds a string for case-insensitive comparison.
 *
 * @example
 * foldCase('Photo.JPG') // => 'photo.jpg'
 */
export function foldCase(str: string): string {
	return str.toLowerCase();
}

/**
 * Detects whether text contains any upper-case letter, in any script.
 *
 * @example
 * hasUpperCase('report') // => false
 * hasUpperCase('Report') // => true
 * hasUpperCase('Été')    // => true
 */
export function hasUpperCase(str: string): boolean {
	return /\p{Lu}/u.test(str);
}

/**
 * Splits text on runs of whitespace, dropping empty pieces.
 *
 * @example
 * splitWords('  /mnt/backup   /tmp ') // => ['/mnt/backup', '/tmp']
 */
export function splitWords(str: string): string[] {
	return str.split(/\s+/).filter(word => word.length > 0);
}

/**
 * Escapes special regex characters in a string for use in RegExp constructor.
 *
 * @example
 * escapeRegex('file.txt') // => 'file\\.txt'
 * escapeRegex('[test]') // => '\\[test\\]'
 */
export function escapeRegex(str: string): string {
	return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Safely constructs a RegExp, reporting the engine's message instead of throwing.
 *
 * @example
 * compileRegex('test.*', 'i')  // => { ok: true, regex: new RegExp('test.*', 'i') }
 * compileRegex('[invalid', '') // => { ok: false, message: 'Invalid regular expression: ...' }
 */
export function compileRegex(
	source: string,
	flags: string
): { ok: true; regex: RegExp } | { ok: false; message: string } {
	try {
		return { ok: true, regex: new RegExp(source, flags) };
	} catch (error) {
		return { ok: false, message: error instanceof Error ? error.message : 'Unknown error' };
	}
}
