/**
 * Middleware — ordered, short-circuiting event transforms.
 *
 * A middleware returns the (optionally modified) event to continue, or null
 * to drop it. Dropping is not an error. The same chain type is attached to
 * loggers and to individual sinks.
 */

import { ConfigurationError } from './errors.js';
import type { ConfigSchema } from './schema.js';
import type { LogEvent } from './types.js';

export type Middleware = (event: LogEvent) => LogEvent | null;

/**
 * What a middleware package exports.
 */
export interface MiddlewareRegistration {
	/** Unique middleware ID */
	id: string;
	/** Build a middleware from its config block */
	create: (config: Record<string, unknown>) => Middleware;
	/** JSON Schema for config validation */
	configSchema?: ConfigSchema;
}

/**
 * Run a middleware chain in registration order.
 * Returns null as soon as one middleware drops the event; later ones never run.
 */
export function runMiddleware(chain: readonly Middleware[], event: LogEvent): LogEvent | null {
	let current = event;
	for (const middleware of chain) {
		const next = middleware(current);
		if (next === null) return null;
		current = next;
	}
	return current;
}

/** Normalize a single middleware or a list into a list */
export function toMiddlewareList(
	middleware: Middleware | readonly Middleware[],
): readonly Middleware[] {
	if (typeof middleware === 'function') return [middleware];
	for (const [i, mw] of middleware.entries()) {
		if (typeof mw !== 'function') {
			throw new ConfigurationError('must be a function', { path: `middleware[${i}]` });
		}
	}
	return middleware;
}
