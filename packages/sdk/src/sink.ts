/**
 * Sink interface — the contract for event destinations.
 *
 * A sink accepts one event at a time. Buffered sinks also expose flush() and
 * bufferSize(); sinks holding resources expose close(). Sinks are built
 * directly, from a one-argument function, or from a formatter decorated with
 * a backend descriptor (see BackendRegistration).
 */

import type { Diagnostics } from './diagnostics.js';
import { ConfigurationError } from './errors.js';
import type { ConfigSchema } from './schema.js';
import type { FormattedRecord, LogEvent } from './types.js';

/**
 * Sink interface.
 *
 * write() may return a promise; the logger isolates both thrown errors and
 * rejections, so a failing sink never reaches the logging caller.
 */
export interface Sink {
	/** Label used in diagnostics and the admin surface */
	readonly id: string;

	/** Accept one event */
	write(event: LogEvent): void | Promise<void>;

	/** Write out anything buffered. A no-op when nothing is buffered. */
	flush?(): void | Promise<void>;

	/** Number of buffered records, or null when the sink does not buffer */
	bufferSize?(): number | null;

	/** Flush and release resources */
	close?(): void | Promise<void>;
}

export type SinkFunction = (event: LogEvent) => void | Promise<void>;

/**
 * Wrap a one-argument function as a sink.
 * Functions declaring any other number of parameters are rejected.
 */
export function toSink(fn: SinkFunction, id?: string): Sink {
	if (typeof fn !== 'function') {
		throw new ConfigurationError('sink must be a function or implement write(event)');
	}
	if (fn.length !== 1) {
		throw new ConfigurationError(
			`sink functions must take exactly one argument (the event), got ${fn.length}`,
		);
	}
	return {
		id: id ?? (fn.name || 'function'),
		write: (event) => fn(event),
	};
}

/** Check whether a value implements the Sink contract */
export function isSink(value: unknown): value is Sink {
	return (
		typeof value === 'object' &&
		value !== null &&
		'write' in value &&
		typeof value.write === 'function' &&
		'id' in value &&
		typeof value.id === 'string'
	);
}

// ─── Formatters ───────────────────────────────────────────────────────────────

/** Line formatters produce strings; row formatters produce row objects */
export type FormatterKind = 'line' | 'row';

/**
 * Formatter contract: event → formatted record.
 */
export interface Formatter {
	readonly name: string;
	readonly kind: FormatterKind;
	format(event: LogEvent): FormattedRecord;
	/** Line written once at the top of a new output (e.g. a CSV header) */
	readonly header?: string;
}

/** Backend descriptor attached to a formatter */
export interface BackendConfig {
	/** Registered backend kind, e.g. "local" */
	kind: string;
	/** Buffer records and write them in batches of this size */
	flush_threshold?: number;
	[key: string]: unknown;
}

/** Keys every backend config may carry, handled by the registry */
export const SHARED_BACKEND_KEYS: readonly string[] = ['kind', 'flush_threshold', 'async'];

/** The backend-specific part of a config: everything but the shared keys */
export function backendSettings(config: BackendConfig): Record<string, unknown> {
	return Object.fromEntries(
		Object.entries(config).filter(([key]) => !SHARED_BACKEND_KEYS.includes(key)),
	);
}

/** A formatter decorated with a backend descriptor */
export interface BackendFormatter {
	readonly formatter: Formatter;
	readonly backend: BackendConfig;
}

/** Context handed to backend builders */
export interface BackendContext {
	diagnostics: Diagnostics;
}

/** Build a sink for a formatter and backend config. Throws on invalid config. */
export type BackendBuilder = (
	formatter: Formatter,
	config: BackendConfig,
	context: BackendContext,
) => Sink;

/**
 * What a backend package exports.
 */
export interface BackendRegistration {
	/** Backend kind, e.g. "webhook" */
	kind: string;
	/** Sink builder */
	build: BackendBuilder;
	/** JSON Schema for config validation */
	configSchema?: ConfigSchema;
}

/**
 * What a direct sink package exports.
 */
export interface SinkRegistration {
	/** Unique sink ID, used as `kind` in config files */
	id: string;
	/** Build a sink from its config block */
	create: (config: Record<string, unknown>) => Sink;
	/** JSON Schema for config validation */
	configSchema?: ConfigSchema;
}
