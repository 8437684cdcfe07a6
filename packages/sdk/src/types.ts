/**
 * Core types for logrelay.
 *
 * Events, field values, level ranges and formatted records shared by the
 * SDK, the core engine and every plug-in package.
 */

// ─── Field values ─────────────────────────────────────────────────────────────

/** Scalar values an event field may hold */
export type FieldScalar = string | number | boolean | null;

/** Values an event field may hold: scalars, lists and nested maps */
export type FieldValue = FieldScalar | readonly FieldValue[] | FieldMap;

/** Nested map of field values */
export interface FieldMap {
	readonly [key: string]: FieldValue;
}

/** Ordered name → value map of extra event fields */
export type Fields = FieldMap;

// ─── Event ────────────────────────────────────────────────────────────────────

/**
 * One structured log record.
 *
 * Events are frozen on construction. Anything that changes an event
 * (middleware, tag stamping) produces a new value.
 */
export interface LogEvent {
	/** Human-readable message (empty string when none was given) */
	readonly message: string;
	/** ISO 8601 timestamp */
	readonly timestamp: string;
	/** Level name, e.g. "WARNING" */
	readonly level: string;
	/** Integer severity in [0, 120] */
	readonly level_number: number;
	/** Tags in the order they were attached */
	readonly tags: readonly string[];
	/** Extra structured fields */
	readonly fields: Fields;
}

// ─── Level ranges ─────────────────────────────────────────────────────────────

/** Inclusive level range */
export interface LevelRange {
	readonly lower: number;
	readonly upper: number;
}

export const MIN_LEVEL = 0;
export const MAX_LEVEL = 120;

/** The full [0, 120] range */
export const FULL_RANGE: LevelRange = Object.freeze({ lower: MIN_LEVEL, upper: MAX_LEVEL });

/** Check whether a level number falls within an inclusive range */
export function inRange(levelNumber: number, range: LevelRange): boolean {
	return levelNumber >= range.lower && levelNumber <= range.upper;
}

// ─── Formatted records ────────────────────────────────────────────────────────

/** Row-like formatted record, for batched/columnar backends */
export interface FormattedRow {
	readonly [column: string]: FieldValue;
}

/** Output of a formatter: a line of text or a row */
export type FormattedRecord = string | FormattedRow;

// ─── Composition options ──────────────────────────────────────────────────────

/** Options shared by every with* composition operation */
export interface ComposeOptions {
	/** Append to the existing list (default) or replace it */
	append?: boolean;
}

// ─── Utilities ────────────────────────────────────────────────────────────────

/**
 * Parse a duration string like "5m", "1h", "30s", "100ms" to milliseconds.
 */
export function parseDuration(duration: string): number {
	const match = duration.match(/^(\d+)(ms|s|m|h|d)$/);
	if (!match) {
		throw new Error(`Invalid duration format: "${duration}"`);
	}
	const value = Number.parseInt(match[1], 10);
	switch (match[2]) {
		case 'ms':
			return value;
		case 's':
			return value * 1000;
		case 'm':
			return value * 60_000;
		case 'h':
			return value * 3_600_000;
		case 'd':
			return value * 86_400_000;
		default:
			throw new Error(`Invalid duration format: "${duration}"`);
	}
}

const SIZE_UNITS: Record<string, number> = {
	b: 1,
	kb: 1024,
	mb: 1024 ** 2,
	gb: 1024 ** 3,
};

/**
 * Parse a byte size like "512", "64kb", "1mb" or a plain number to bytes.
 */
export function parseSize(size: string | number): number {
	if (typeof size === 'number') {
		if (!Number.isFinite(size) || size <= 0) {
			throw new Error(`Invalid size: ${size}`);
		}
		return Math.floor(size);
	}
	const match = size
		.trim()
		.toLowerCase()
		.match(/^(\d+(?:\.\d+)?)\s*(b|kb|mb|gb)?$/);
	if (!match) {
		throw new Error(`Invalid size format: "${size}"`);
	}
	const bytes = Math.floor(Number.parseFloat(match[1]) * SIZE_UNITS[match[2] ?? 'b']);
	if (bytes <= 0) {
		throw new Error(`Invalid size: "${size}"`);
	}
	return bytes;
}
