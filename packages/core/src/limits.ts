import type { LevelBound, LevelRange } from '@logrelay/sdk';
import { ConfigurationError, MAX_LEVEL, MIN_LEVEL, resolveLevelNumber } from '@logrelay/sdk';

/**
 * Resolve an inclusive level range. Omitted bounds default to the ends of
 * the scale; lower must not exceed upper.
 */
export function resolveLimits(lower?: LevelBound, upper?: LevelBound): LevelRange {
	const lo = lower === undefined ? MIN_LEVEL : resolveLevelNumber(lower);
	const hi = upper === undefined ? MAX_LEVEL : resolveLevelNumber(upper);
	if (lo > hi) {
		throw new ConfigurationError(`lower limit ${lo} is above upper limit ${hi}`, { path: 'limits' });
	}
	return Object.freeze({ lower: lo, upper: hi });
}
