/**
 * A sink as registered on a logger.
 *
 * Carries the per-sink level range, middleware chain and tags. Like the
 * logger, every with* operation returns a new value.
 */

import type {
	ComposeOptions,
	LevelBound,
	LevelRange,
	LimitAttachable,
	LogEvent,
	Middleware,
	MiddlewareAttachable,
	Sink,
	Taggable,
} from '@logrelay/sdk';
import {
	FULL_RANGE,
	inRange,
	runMiddleware,
	toMiddlewareList,
	toTags,
	withEventTags,
} from '@logrelay/sdk';
import { resolveLimits } from './limits.js';

export interface ConfiguredSinkOptions {
	limits?: LevelRange;
	middleware?: readonly Middleware[];
	tags?: readonly string[];
}

export class ConfiguredSink
	implements
		Taggable<ConfiguredSink>,
		MiddlewareAttachable<ConfiguredSink>,
		LimitAttachable<ConfiguredSink>
{
	readonly sink: Sink;
	readonly limits: LevelRange;
	readonly middleware: readonly Middleware[];
	readonly tags: readonly string[];

	constructor(sink: Sink, options?: ConfiguredSinkOptions) {
		this.sink = sink;
		this.limits = options?.limits ?? FULL_RANGE;
		this.middleware = options?.middleware ?? [];
		this.tags = options?.tags ?? [];
	}

	get id(): string {
		return this.sink.id;
	}

	withLimits(lower?: LevelBound, upper?: LevelBound): ConfiguredSink {
		return this.with({ limits: resolveLimits(lower, upper) });
	}

	withMiddleware(
		middleware: Middleware | readonly Middleware[],
		options?: ComposeOptions,
	): ConfiguredSink {
		const added = toMiddlewareList(middleware);
		return this.with({
			middleware: options?.append === false ? added : [...this.middleware, ...added],
		});
	}

	withTags(tags: readonly string[], options?: ComposeOptions): ConfiguredSink {
		return this.with({ tags: toTags(options?.append === false ? tags : [...this.tags, ...tags]) });
	}

	/**
	 * Apply this sink's range, middleware and tags.
	 * Returns the event to write, or null when this sink skips it.
	 */
	prepare(event: LogEvent): LogEvent | null {
		if (!inRange(event.level_number, this.limits)) return null;
		const result = runMiddleware(this.middleware, event);
		if (result === null) return null;
		return withEventTags(result, this.tags);
	}

	/** Prepare and write one event */
	receive(event: LogEvent): void | Promise<void> {
		const prepared = this.prepare(event);
		if (prepared === null) return;
		return this.sink.write(prepared);
	}

	private with(changes: ConfiguredSinkOptions): ConfiguredSink {
		return new ConfiguredSink(this.sink, {
			limits: this.limits,
			middleware: this.middleware,
			tags: this.tags,
			...changes,
		});
	}
}
