/**
 * Levels — named ordinal severities on a [0, 120] scale.
 *
 * A level constructor is a function that builds events at its level, with a
 * few read-only properties describing the level. Built-in levels are a
 * closed set and cannot carry default tags.
 */

import type { LevelBound, Taggable } from './capabilities.js';
import { type Diagnostics, diagnostics as defaultDiagnostics } from './diagnostics.js';
import { BuiltinLevelError, ConfigurationError } from './errors.js';
import { buildEvent, toTags } from './event.js';
import type { ComposeOptions, LogEvent } from './types.js';
import { MAX_LEVEL, MIN_LEVEL } from './types.js';

/** Per-call options for a level constructor */
export interface LevelCallOptions {
	fields?: Readonly<Record<string, unknown>>;
	tags?: readonly string[];
	timestamp?: string | Date;
}

export interface LevelConstructor extends Taggable<LevelConstructor> {
	(message?: string, options?: LevelCallOptions): LogEvent;
	readonly levelName: string;
	readonly levelNumber: number;
	readonly builtin: boolean;
}

export interface DefineLevelOptions {
	/** Default tags stamped on every event of this level */
	tags?: readonly string[];
	diagnostics?: Diagnostics;
}

// ─── Construction ─────────────────────────────────────────────────────────────

function createLevel(
	levelName: string,
	levelNumber: number,
	tags: readonly string[],
	builtin: boolean,
): LevelConstructor {
	const construct = (message?: string, options?: LevelCallOptions): LogEvent =>
		buildEvent({
			level: levelName,
			level_number: levelNumber,
			message,
			tags: options?.tags ? [...tags, ...options.tags] : tags,
			fields: options?.fields,
			timestamp: options?.timestamp,
		});

	const level: LevelConstructor = Object.assign(construct, {
		levelName,
		levelNumber,
		builtin,
		tags,
		withTags(next: readonly string[], options?: ComposeOptions): LevelConstructor {
			if (builtin) throw new BuiltinLevelError(levelName);
			const merged = options?.append === false ? next : [...tags, ...next];
			return createLevel(levelName, levelNumber, toTags(merged), false);
		},
	});
	Object.freeze(level);
	return level;
}

/**
 * Define a custom level.
 *
 * Non-integral numbers are rounded to the nearest integer with a
 * `level.rounded` warning. Numbers outside [0, 120] are rejected.
 */
export function defineLevel(
	name: string,
	number: number,
	options?: DefineLevelOptions,
): LevelConstructor {
	if (typeof name !== 'string' || name.trim().length === 0) {
		throw new ConfigurationError('level name must be a non-empty string');
	}
	if (typeof number !== 'number' || !Number.isFinite(number)) {
		throw new ConfigurationError(`level number must be a finite number, got ${String(number)}`, {
			path: name,
		});
	}

	let levelNumber = number;
	if (!Number.isInteger(number)) {
		levelNumber = Math.round(number);
		(options?.diagnostics ?? defaultDiagnostics).warn(
			'level.rounded',
			`level number ${number} rounded to ${levelNumber}`,
			{ source: name },
		);
	}
	if (levelNumber < MIN_LEVEL || levelNumber > MAX_LEVEL) {
		throw new ConfigurationError(
			`level number must be in [${MIN_LEVEL}, ${MAX_LEVEL}], got ${levelNumber}`,
			{ path: name },
		);
	}

	return createLevel(name, levelNumber, toTags(options?.tags ?? []), false);
}

// ─── Built-in levels ──────────────────────────────────────────────────────────

export const LOWEST = createLevel('LOWEST', 0, [], true);
export const TRACE = createLevel('TRACE', 10, [], true);
export const DEBUG = createLevel('DEBUG', 20, [], true);
export const NOTE = createLevel('NOTE', 40, [], true);
export const MESSAGE = createLevel('MESSAGE', 60, [], true);
export const WARNING = createLevel('WARNING', 80, [], true);
export const ERROR = createLevel('ERROR', 100, [], true);
export const CRITICAL = createLevel('CRITICAL', 110, [], true);
export const HIGHEST = createLevel('HIGHEST', 120, [], true);

/** Built-in levels, ascending */
export const BUILTIN_LEVELS: readonly LevelConstructor[] = Object.freeze([
	LOWEST,
	TRACE,
	DEBUG,
	NOTE,
	MESSAGE,
	WARNING,
	ERROR,
	CRITICAL,
	HIGHEST,
]);

/** Look up a built-in level by name (case insensitive) */
export function levelByName(name: string): LevelConstructor | undefined {
	const upper = name.toUpperCase();
	return BUILTIN_LEVELS.find((level) => level.levelName === upper);
}

/**
 * Resolve a level bound to its number.
 * Accepts an integer in range, a numeric string, a built-in level name or
 * anything carrying a levelNumber.
 */
export function resolveLevelNumber(bound: LevelBound): number {
	if (typeof bound !== 'number' && typeof bound !== 'string') return bound.levelNumber;
	if (typeof bound === 'string') {
		const byName = levelByName(bound);
		if (byName) return byName.levelNumber;
		if (!/^\d+$/.test(bound.trim())) {
			throw new ConfigurationError(
				`unknown level "${bound}". Built-in levels: ${BUILTIN_LEVELS.map((l) => l.levelName).join(', ')}`,
			);
		}
		return resolveLevelNumber(Number.parseInt(bound, 10));
	}
	if (!Number.isInteger(bound) || bound < MIN_LEVEL || bound > MAX_LEVEL) {
		throw new ConfigurationError(
			`level bound must be an integer in [${MIN_LEVEL}, ${MAX_LEVEL}], got ${bound}`,
		);
	}
	return bound;
}

/** Order two levels by number, then by name */
export function compareLevels(
	a: Pick<LevelConstructor, 'levelName' | 'levelNumber'>,
	b: Pick<LevelConstructor, 'levelName' | 'levelNumber'>,
): number {
	return a.levelNumber - b.levelNumber || a.levelName.localeCompare(b.levelName);
}
