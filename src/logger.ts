// ABOUTME: Scoped console logger shared by the core components
// ABOUTME: Prefixes messages with the component name and gates debug output on a flag

export interface Logger {
	debug(message: string, ...details: unknown[]): void;
	info(message: string, ...details: unknown[]): void;
	warn(message: string, ...details: unknown[]): void;
	error(message: string, ...details: unknown[]): void;
}

export interface LoggerOptions {
	/** Emit debug messages */
	debug?: boolean;
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
	const prefix = `[${scope}]`;
	const debugEnabled = options.debug ?? false;

	return {
		debug(message, ...details) {
			if (debugEnabled) {
				console.log(`${prefix} ${message}`, ...details);
			}
		},
		info(message, ...details) {
			console.info(`${prefix} ${message}`, ...details);
		},
		warn(message, ...details) {
			console.warn(`${prefix} ${message}`, ...details);
		},
		error(message, ...details) {
			console.error(`${prefix} ${message}`, ...details);
		},
	};
}

/**
 * Logger that drops everything, for callers that opt out of output
 */
export const silentLogger: Logger = {
	debug() {},
	info() {},
	warn() {},
	error() {},
};
