/**
 * Capability interfaces for immutable composition.
 *
 * Loggers, configured sinks and level constructors share the same with*
 * vocabulary. Each operation returns a new value; the receiver is never
 * modified.
 */

import type { Middleware } from './middleware.js';
import type { ComposeOptions } from './types.js';

/** Something that carries an ordered list of default tags */
export interface Taggable<T> {
	readonly tags: readonly string[];
	withTags(tags: readonly string[], options?: ComposeOptions): T;
}

/** Something that runs an ordered middleware chain */
export interface MiddlewareAttachable<T> {
	readonly middleware: readonly Middleware[];
	withMiddleware(middleware: Middleware | readonly Middleware[], options?: ComposeOptions): T;
}

/** Something that filters events by an inclusive level range */
export interface LimitAttachable<T> {
	readonly limits: { readonly lower: number; readonly upper: number };
	/** Bounds accept a level number, a level name or a level constructor */
	withLimits(lower?: LevelBound, upper?: LevelBound): T;
}

/** A level reference usable as a range bound */
export type LevelBound = number | string | { readonly levelNumber: number };
