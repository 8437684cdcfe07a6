/**
 * Event builders, copy-on-write transforms and validation.
 *
 * Events are built from validated copies of their inputs and frozen, so a
 * middleware or sink can never see another consumer's mutation.
 */

import { ConfigurationError } from './errors.js';
import type { FieldMap, FieldValue, Fields, LogEvent } from './types.js';
import { MAX_LEVEL, MIN_LEVEL } from './types.js';

/** Options for building an event */
export interface BuildEventOptions {
	level: string;
	level_number: number;
	message?: string;
	tags?: readonly string[];
	fields?: Readonly<Record<string, unknown>>;
	timestamp?: string | Date;
}

// ─── Field validation ─────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null;
}

function isPlainObject(value: object): boolean {
	const proto = Object.getPrototypeOf(value);
	return proto === Object.prototype || proto === null;
}

/**
 * Validate and copy a field value.
 * Throws ConfigurationError for functions, symbols, bigints, non-finite
 * numbers and non-plain objects (class instances, handles, dates).
 */
export function toFieldValue(value: unknown, path: string): FieldValue {
	if (value === null || typeof value === 'string' || typeof value === 'boolean') {
		return value;
	}
	if (typeof value === 'number') {
		if (!Number.isFinite(value)) {
			throw new ConfigurationError(`field value must be a finite number, got ${value}`, { path });
		}
		return value;
	}
	if (Array.isArray(value)) {
		return Object.freeze(value.map((item, i) => toFieldValue(item, `${path}[${i}]`)));
	}
	if (typeof value === 'object' && isPlainObject(value)) {
		return toFields(value, path);
	}
	const kind =
		typeof value === 'object' ? (value.constructor?.name ?? 'object') : typeof value;
	throw new ConfigurationError(
		`field values must be strings, numbers, booleans, null, lists or plain maps (got ${kind})`,
		{ path },
	);
}

/**
 * Validate and freeze a whole field map. Keys become own properties, so a
 * field named `__proto__` stays an ordinary field.
 */
export function toFields(input: object, path = 'fields'): Fields {
	const entries = Object.entries(input)
		.filter(([, value]) => value !== undefined)
		.map(([key, value]): [string, FieldValue] => [key, toFieldValue(value, `${path}.${key}`)]);
	return Object.freeze(Object.fromEntries(entries)) satisfies FieldMap;
}

/** Validate and freeze a tag list */
export function toTags(tags: readonly unknown[]): readonly string[] {
	const result: string[] = [];
	for (const tag of tags) {
		if (typeof tag !== 'string' || tag.length === 0) {
			throw new ConfigurationError(`tags must be non-empty strings, got ${JSON.stringify(tag)}`);
		}
		result.push(tag);
	}
	return Object.freeze(result);
}

// ─── Building ─────────────────────────────────────────────────────────────────

/**
 * Build a well-formed, frozen event.
 * Fills in defaults for message, timestamp, tags and fields.
 */
export function buildEvent(options: BuildEventOptions): LogEvent {
	const timestamp =
		options.timestamp instanceof Date
			? options.timestamp.toISOString()
			: (options.timestamp ?? new Date().toISOString());

	return Object.freeze({
		message: options.message ?? '',
		timestamp,
		level: options.level,
		level_number: options.level_number,
		tags: toTags(options.tags ?? []),
		fields: toFields(options.fields ?? {}),
	});
}

// ─── Copy-on-write transforms ─────────────────────────────────────────────────

/** New event with tags appended (or replaced) */
export function withEventTags(
	event: LogEvent,
	tags: readonly string[],
	options?: { append?: boolean },
): LogEvent {
	if (tags.length === 0 && options?.append !== false) return event;
	const next = options?.append === false ? tags : [...event.tags, ...tags];
	return Object.freeze({ ...event, tags: toTags(next) });
}

/** New event with fields merged in (later keys win) */
export function withEventFields(
	event: LogEvent,
	fields: Readonly<Record<string, unknown>>,
): LogEvent {
	return Object.freeze({ ...event, fields: toFields({ ...event.fields, ...fields }) });
}

/** New event with a different message */
export function withMessage(event: LogEvent, message: string): LogEvent {
	return Object.freeze({ ...event, message });
}

// ─── Validation ───────────────────────────────────────────────────────────────

/** Validation error */
export interface ValidationError {
	field: string;
	message: string;
}

/**
 * Validate an unknown value as a log event.
 * Returns an array of validation errors (empty if valid).
 */
export function validateEvent(event: unknown): ValidationError[] {
	const errors: ValidationError[] = [];

	if (!isRecord(event)) {
		errors.push({ field: '', message: 'Event must be a non-null object' });
		return errors;
	}

	const e = event;

	if (typeof e.message !== 'string') {
		errors.push({ field: 'message', message: 'message must be a string' });
	}
	if (typeof e.timestamp !== 'string') {
		errors.push({ field: 'timestamp', message: 'timestamp must be an ISO 8601 string' });
	}
	if (typeof e.level !== 'string' || e.level.length === 0) {
		errors.push({ field: 'level', message: 'level must be a non-empty string' });
	}
	if (
		typeof e.level_number !== 'number' ||
		!Number.isInteger(e.level_number) ||
		e.level_number < MIN_LEVEL ||
		e.level_number > MAX_LEVEL
	) {
		errors.push({
			field: 'level_number',
			message: `level_number must be an integer in [${MIN_LEVEL}, ${MAX_LEVEL}]`,
		});
	}
	if (!Array.isArray(e.tags) || !e.tags.every((t) => typeof t === 'string')) {
		errors.push({ field: 'tags', message: 'tags must be an array of strings' });
	}
	if (!e.fields || typeof e.fields !== 'object' || Array.isArray(e.fields)) {
		errors.push({ field: 'fields', message: 'fields must be an object' });
	}

	return errors;
}

/**
 * Check if a value is a valid log event (type guard).
 */
export function isLogEvent(value: unknown): value is LogEvent {
	return validateEvent(value).length === 0;
}
