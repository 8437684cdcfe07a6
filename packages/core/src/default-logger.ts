/**
 * Process-wide default logger.
 *
 * Starts as a no-op logger; nothing is configured at load time. Libraries
 * log through log() and applications decide where events go with
 * setDefaultLogger().
 */

import type { LogEvent } from '@logrelay/sdk';
import { Logger } from './logger.js';

let current: Logger | undefined;

export function getDefaultLogger(): Logger {
	current ??= Logger.noop();
	return current;
}

/** Install a logger as the process default. Returns the one it replaced. */
export function setDefaultLogger(logger: Logger): Logger {
	const previous = getDefaultLogger();
	current = logger;
	return previous;
}

/** Go back to the no-op default */
export function resetDefaultLogger(): void {
	current = undefined;
}

/** Dispatch through the default logger */
export function log(event: LogEvent): LogEvent | null {
	return getDefaultLogger().log(event);
}
