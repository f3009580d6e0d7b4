// ABOUTME: Error taxonomy for lookup and rebuild invocations and their user-facing descriptions
// ABOUTME: Errors are tagged values, never thrown; "no matches" is a success and has no variant here

export type LookupError =
	| { kind: 'processNotFound'; command: string; message: string }
	| { kind: 'nonZeroExit'; command: string; code: number | null; stderr: string; stdout: string }
	| { kind: 'timeout'; command: string; timeoutMs: number }
	| { kind: 'canceled'; command: string };

export type RebuildError =
	| { kind: 'processNotFound'; command: string; message: string }
	| { kind: 'nonZeroExit'; command: string; code: number | null; stderr: string; stdout: string }
	| { kind: 'canceled'; command: string };

export type LookupResult = { ok: true; lines: string[] } | { ok: false; error: LookupError };

export type RebuildResult = { ok: true } | { ok: false; error: RebuildError };

/**
 * User-visible failure notification
 */
export interface FailureNotice {
	title: string;
	message: string;
}

const NO_DETAILS = 'No detailed error message was returned.';

export const REBUILD_CANCELED_NOTICE: FailureNotice = {
	title: 'Info',
	message: 'Database update cancelled.',
};

function diagnosticText(stderr: string, stdout: string): string {
	const details = stderr.trim() || stdout.trim();
	return details.length > 0 ? details : NO_DETAILS;
}

/**
 * Describes a lookup failure with the offending command and the raw diagnostic text.
 */
export function describeLookupError(error: LookupError): FailureNotice {
	switch (error.kind) {
		case 'processNotFound':
			return {
				title: 'Execution Error',
				message: `Could not run the lookup tool.\nCommand: ${error.command}\nDetails: \n${error.message}`,
			};
		case 'nonZeroExit':
			return {
				title: 'Error',
				message:
					`Error executing lookup:\nCommand: ${error.command}\nExit Status: ${error.code ?? 'killed'}` +
					`\nDetails: \n${diagnosticText(error.stderr, error.stdout)}`,
			};
		case 'timeout':
			return {
				title: 'Error',
				message: `Lookup timed out after ${Math.round(error.timeoutMs / 1000)} seconds.\nCommand: ${error.command}`,
			};
		case 'canceled':
			return {
				title: 'Info',
				message: `Lookup canceled.\nCommand: ${error.command}`,
			};
	}
}

/**
 * Describes a rebuild failure with the offending command and the raw diagnostic text.
 */
export function describeRebuildError(error: RebuildError): FailureNotice {
	switch (error.kind) {
		case 'processNotFound':
			return {
				title: 'Execution Error',
				message:
					`Could not start the database update.\nCommand: ${error.command}\nDetails: \n${error.message}` +
					'\nPlease ensure the privilege-escalation helper is installed and configured.',
			};
		case 'nonZeroExit':
			return {
				title: 'Update Error',
				message:
					`Could not update database:\nCommand: ${error.command}\nExit Status: ${error.code ?? 'killed'}` +
					`\nDetails: \n${diagnosticText(error.stderr, error.stdout)}`,
			};
		case 'canceled':
			return REBUILD_CANCELED_NOTICE;
	}
}
