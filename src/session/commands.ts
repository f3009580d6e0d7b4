// ABOUTME: Command/intent union the UI dispatches into the session, and the desktop collaborator contract
// ABOUTME: Keeps the core free of UI framework types; opening and clipboard access stay with the shell

import type { RebuildOptions } from '../process/rebuild-invoker';

export type SessionCommand =
	| { type: 'openEntry' }
	| { type: 'openContainingFolder' }
	| { type: 'copyPath' }
	| { type: 'startRebuild'; options: RebuildOptions }
	| { type: 'cancelActive' };

export type CommandResult =
	| { ok: true; message: string }
	| { ok: false; reason: 'noSelection' | 'alreadyRunning' | 'failed'; message: string };

/**
 * Desktop-environment services the shell provides
 */
export interface DesktopBridge {
	/** Opens a file or folder with the desktop's default handler */
	openPath(path: string): Promise<void>;
	copyText(text: string): Promise<void>;
}

export const NO_SELECTION_MESSAGE = 'Please select a valid result row.';
