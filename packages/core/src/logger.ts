/**
 * Logger — level filtering, middleware, tag stamping and fan-out.
 *
 * Library-first API:
 *   const log = new Logger()
 *     .withSinks({ console: consoleSink(), app: onLocal(toText(), { path: 'app.log' }) })
 *     .withLimits(NOTE, HIGHEST);
 *   log.log(WARNING('disk almost full'));
 *
 * Loggers are immutable: every with* operation returns a new Logger, so a
 * scope can extend a shared logger without affecting anyone else.
 */

import type {
	BackendFormatter,
	ComposeOptions,
	Diagnostics,
	LevelBound,
	LevelRange,
	LimitAttachable,
	LogEvent,
	Middleware,
	MiddlewareAttachable,
	Sink,
	SinkFunction,
	Taggable,
} from '@logrelay/sdk';
import {
	buildEvent,
	ConfigurationError,
	diagnostics as defaultDiagnostics,
	describeCause,
	ERROR,
	FULL_RANGE,
	inRange,
	isSink,
	runMiddleware,
	SinkFailureError,
	toMiddlewareList,
	toSink,
	toTags,
	withEventTags,
} from '@logrelay/sdk';
import { ConfiguredSink } from './configured-sink.js';
import { resolveLimits } from './limits.js';
import { type BackendRegistry, defaultRegistry, isBackendFormatter } from './registry.js';

/** Anything withSinks() accepts as a sink */
export type SinkInput = Sink | SinkFunction | BackendFormatter | ConfiguredSink;

/** A sink as registered on a logger */
export interface SinkEntry {
	/** Unique name within the logger */
	readonly name: string;
	/** Label used in diagnostics (the sink's id) */
	readonly label: string;
	readonly sink: ConfiguredSink;
}

export interface LoggerOptions {
	/** Receives an ERROR event tagged `sink_error` whenever a sink fails */
	fallback?: Sink;
	diagnostics?: Diagnostics;
	/** Registry used to build formatter + backend sinks */
	registry?: BackendRegistry;
}

interface LoggerState {
	limits: LevelRange;
	sinks: readonly SinkEntry[];
	middleware: readonly Middleware[];
	tags: readonly string[];
	fallback?: Sink;
	diagnostics: Diagnostics;
	registry: BackendRegistry;
}

export const SINK_ERROR_TAG = 'sink_error';

// ─── Logger Class ─────────────────────────────────────────────────────────────

export class Logger
	implements Taggable<Logger>, MiddlewareAttachable<Logger>, LimitAttachable<Logger>
{
	private readonly state: LoggerState;

	constructor(options?: LoggerOptions) {
		this.state = {
			limits: FULL_RANGE,
			sinks: [],
			middleware: [],
			tags: [],
			fallback: options?.fallback,
			diagnostics: options?.diagnostics ?? defaultDiagnostics,
			registry: options?.registry ?? defaultRegistry(),
		};
	}

	/** A logger with no sinks: log() returns every event untouched */
	static noop(): Logger {
		return new Logger();
	}

	get limits(): LevelRange {
		return this.state.limits;
	}

	get middleware(): readonly Middleware[] {
		return this.state.middleware;
	}

	get tags(): readonly string[] {
		return this.state.tags;
	}

	/** Registered sinks, in invocation order */
	get sinks(): readonly SinkEntry[] {
		return this.state.sinks;
	}

	get diagnostics(): Diagnostics {
		return this.state.diagnostics;
	}

	// ─── Composition ──────────────────────────────────────────────────────────

	/**
	 * Add (or replace) sinks. Named with the keys of a map, otherwise
	 * `sink_<n>` by position; colliding names get a `_2`, `_3` suffix.
	 */
	withSinks(
		sinks: SinkInput | readonly SinkInput[] | Readonly<Record<string, SinkInput>>,
		options?: ComposeOptions,
	): Logger {
		const append = options?.append !== false;
		const named = this.toNamedInputs(sinks);
		if (named.length === 0 && append) {
			this.state.diagnostics.warn('logger.empty_sinks', 'withSinks() called without sinks');
		}

		const existing = append ? this.state.sinks : [];
		const taken = new Set(existing.map((entry) => entry.name));
		const added: SinkEntry[] = [];
		for (const [i, { name, input }] of named.entries()) {
			const sink = this.resolveSink(input, name ?? `sinks[${i}]`);
			const unique = uniqueName(name ?? `sink_${existing.length + i + 1}`, taken);
			taken.add(unique);
			added.push(Object.freeze({ name: unique, label: sink.id, sink }));
		}
		return this.with({ sinks: [...existing, ...added] });
	}

	/** Set the inclusive level range. Omitted bounds default to 0 and 120. */
	withLimits(lower?: LevelBound, upper?: LevelBound): Logger {
		return this.with({ limits: resolveLimits(lower, upper) });
	}

	/** Tags stamped after each event's own tags */
	withTags(tags: readonly string[], options?: ComposeOptions): Logger {
		const append = options?.append !== false;
		if (tags.length === 0 && append) {
			this.state.diagnostics.warn('logger.empty_tags', 'withTags() called without tags');
		}
		const next = append ? [...this.state.tags, ...tags] : tags;
		return this.with({ tags: toTags(next) });
	}

	withMiddleware(middleware: Middleware | readonly Middleware[], options?: ComposeOptions): Logger {
		const added = toMiddlewareList(middleware);
		return this.with({
			middleware: options?.append === false ? added : [...this.state.middleware, ...added],
		});
	}

	/** Replace one named sink, e.g. to attach sink-level limits or middleware */
	withSink(name: string, update: (sink: ConfiguredSink) => ConfiguredSink): Logger {
		const index = this.state.sinks.findIndex((entry) => entry.name === name);
		if (index === -1) {
			throw new ConfigurationError(`no sink named "${name}"`);
		}
		const sinks = [...this.state.sinks];
		const sink = update(sinks[index].sink);
		sinks[index] = Object.freeze({ name, label: sink.id, sink });
		return this.with({ sinks });
	}

	// ─── Dispatch ─────────────────────────────────────────────────────────────

	/**
	 * Dispatch one event.
	 *
	 * Returns null when logger middleware drops the event. An event outside
	 * the level range reaches no sink but is still returned, so loggers chain.
	 * Sink failures are reported, never thrown.
	 */
	log(event: LogEvent): LogEvent | null {
		const transformed = runMiddleware(this.state.middleware, event);
		if (transformed === null) return null;
		if (!inRange(transformed.level_number, this.state.limits)) return transformed;

		const stamped = withEventTags(transformed, this.state.tags);
		for (const [index, entry] of this.state.sinks.entries()) {
			this.deliver(index, entry, stamped);
		}
		return stamped;
	}

	private deliver(index: number, entry: SinkEntry, event: LogEvent): void {
		try {
			const result = entry.sink.receive(event);
			if (result instanceof Promise) {
				void result.catch((err: unknown) => this.reportFailure(index, entry, err));
			}
		} catch (err) {
			this.reportFailure(index, entry, err);
		}
	}

	private reportFailure(index: number, entry: SinkEntry, err: unknown): void {
		const error = new SinkFailureError(index, entry.name, entry.label, { cause: err });
		this.state.diagnostics.error('sink.failed', error.message, { source: entry.name, error });

		const fallback = this.state.fallback;
		if (!fallback) return;
		const onFallbackFailure = (fallbackErr: unknown): void => {
			this.state.diagnostics.error(
				'sink.fallback_failed',
				`${error.message}; fallback sink "${fallback.id}" also failed: ${describeCause(fallbackErr)}`,
				{ source: entry.name, error },
			);
		};
		try {
			const result = fallback.write(
				buildEvent({
					level: ERROR.levelName,
					level_number: ERROR.levelNumber,
					message: `${error.message}\nSink: ${entry.label}`,
					tags: [SINK_ERROR_TAG],
					fields: { sink_index: index, sink_name: entry.name },
				}),
			);
			if (result instanceof Promise) {
				void result.catch(onFallbackFailure);
			}
		} catch (fallbackErr) {
			onFallbackFailure(fallbackErr);
		}
	}

	// ─── Internal ─────────────────────────────────────────────────────────────

	private with(changes: Partial<LoggerState>): Logger {
		const next = new Logger();
		Object.assign(next.state, this.state, changes);
		return next;
	}

	private toNamedInputs(
		sinks: SinkInput | readonly SinkInput[] | Readonly<Record<string, SinkInput>>,
	): Array<{ name?: string; input: SinkInput }> {
		if (Array.isArray(sinks)) {
			return sinks.map((input: SinkInput) => ({ input }));
		}
		if (isSinkInput(sinks)) {
			return [{ input: sinks }];
		}
		return Object.entries(sinks).map(([name, input]) => ({ name, input }));
	}

	private resolveSink(input: SinkInput, path: string): ConfiguredSink {
		if (input instanceof ConfiguredSink) return input;
		if (isBackendFormatter(input)) {
			return new ConfiguredSink(
				this.state.registry.build(input, { diagnostics: this.state.diagnostics }),
			);
		}
		if (isSink(input)) return new ConfiguredSink(input);
		if (typeof input === 'function') {
			try {
				return new ConfiguredSink(toSink(input, path));
			} catch (err) {
				throw new ConfigurationError(describeCause(err), { path, cause: err });
			}
		}
		throw new ConfigurationError(
			'must be a sink, a one-argument function or a formatter with a backend',
			{ path },
		);
	}
}

function isSinkInput(value: unknown): value is SinkInput {
	return (
		typeof value === 'function' ||
		value instanceof ConfiguredSink ||
		isSink(value) ||
		isBackendFormatter(value)
	);
}

function uniqueName(name: string, taken: ReadonlySet<string>): string {
	if (!taken.has(name)) return name;
	let n = 2;
	while (taken.has(`${name}_${n}`)) n++;
	return `${name}_${n}`;
}

/**
 * Combine loggers so one call dispatches through each in turn.
 * Stops at the first logger whose middleware drops the event.
 */
export function chainLoggers(...loggers: Logger[]): (event: LogEvent) => LogEvent | null {
	return (event) => {
		let current: LogEvent | null = event;
		for (const logger of loggers) {
			if (current === null) break;
			current = logger.log(current);
		}
		return current;
	};
}
