/**
 * @logrelay/middleware-sample — registration entry point.
 */

import type { ConfigSchema, MiddlewareRegistration } from '@logrelay/sdk';
import { checkConfig } from '@logrelay/sdk';
import { type SampleOptions, sample } from './sample.js';

export const SAMPLE_CONFIG_SCHEMA: ConfigSchema = {
	type: 'object',
	properties: {
		rate: {
			type: 'number',
			minimum: 0,
			maximum: 1,
			description: 'Fraction of events kept.',
			default: 1,
		},
		rates: {
			type: 'object',
			description: 'Per-level rates by level name, e.g. { DEBUG: 0.05 }.',
			additionalProperties: { type: 'number', minimum: 0, maximum: 1 },
		},
		exempt_above: {
			type: ['string', 'integer'],
			description: 'Events at or above this level are always kept.',
			default: 'WARNING',
		},
		mark: {
			type: 'boolean',
			description: 'Add sampled and sample_rate fields to kept events.',
			default: true,
		},
	},
	additionalProperties: false,
};

type SampleConfig = Partial<Omit<SampleOptions, 'rng'>>;

/** Validate a config-file block into SampleOptions */
export function parseSampleConfig(config: Record<string, unknown>): SampleOptions {
	const settings = checkConfig<SampleConfig>(SAMPLE_CONFIG_SCHEMA, config, 'sample');
	return {
		rate: settings.rate ?? 1,
		rates: settings.rates,
		exempt_above: settings.exempt_above,
		mark: settings.mark,
	};
}

export function register(): MiddlewareRegistration {
	return {
		id: 'sample',
		create: (config) => sample(parseSampleConfig(config)),
		configSchema: SAMPLE_CONFIG_SCHEMA,
	};
}

export { DEFAULT_EXEMPT_LEVEL, type SampleOptions, sample } from './sample.js';
