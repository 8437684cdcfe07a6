/**
 * Sample middleware — keep a random fraction of events to cut volume.
 *
 * Events at or above `exempt_above` are always kept. Kept events that went
 * through sampling carry `sampled: true` and `sample_rate` fields.
 */

import type { LevelBound, LogEvent, Middleware } from '@logrelay/sdk';
import { ConfigurationError, levelByName, resolveLevelNumber, withEventFields } from '@logrelay/sdk';

export interface SampleOptions {
	/** Fraction of events kept, in [0, 1] */
	rate: number;
	/** Per-level rates by level name, overriding `rate` */
	rates?: Readonly<Record<string, number>>;
	/** Events at or above this level are never dropped (default: WARNING) */
	exempt_above?: LevelBound;
	/** Add sampled/sample_rate fields to kept events (default: true) */
	mark?: boolean;
	/** Random source in [0, 1) */
	rng?: () => number;
}

export const DEFAULT_EXEMPT_LEVEL = 'WARNING';

function checkRate(rate: unknown, path: string): number {
	if (typeof rate !== 'number' || !(rate >= 0 && rate <= 1)) {
		throw new ConfigurationError(`must be a number in [0, 1], got ${String(rate)}`, { path });
	}
	return rate;
}

export function sample(options: SampleOptions): Middleware {
	const rate = checkRate(options.rate, 'sample.rate');
	const rates = new Map<string, number>();
	for (const [name, levelRate] of Object.entries(options.rates ?? {})) {
		const level = levelByName(name);
		if (!level) {
			throw new ConfigurationError(`unknown level "${name}"`, { path: `sample.rates.${name}` });
		}
		rates.set(level.levelName, checkRate(levelRate, `sample.rates.${name}`));
	}
	const exempt = resolveLevelNumber(options.exempt_above ?? DEFAULT_EXEMPT_LEVEL);
	const mark = options.mark ?? true;
	const rng = options.rng ?? Math.random;

	return (event: LogEvent) => {
		if (event.level_number >= exempt) return event;
		const keep = rates.get(event.level.toUpperCase()) ?? rate;
		if (rng() >= keep) return null;
		return mark ? withEventFields(event, { sampled: true, sample_rate: keep }) : event;
	};
}
