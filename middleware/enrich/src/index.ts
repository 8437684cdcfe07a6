/**
 * @logrelay/middleware-enrich — registration entry point.
 */

import type { ConfigSchema, MiddlewareRegistration } from '@logrelay/sdk';
import { checkConfig } from '@logrelay/sdk';
import { type EnrichOptions, enrich } from './enrich.js';

export const ENRICH_CONFIG_SCHEMA: ConfigSchema = {
	type: 'object',
	properties: {
		set: {
			type: 'object',
			description: 'Static values to set on event fields (dot-path → value).',
		},
		copy: {
			type: 'object',
			description: 'Copy values into fields (target field dot-path → source event dot-path).',
			additionalProperties: { type: 'string' },
		},
		compute: {
			type: 'object',
			description: 'Computed boolean fields from simple expressions (target dot-path → expression).',
			additionalProperties: { type: 'string' },
		},
		tags: {
			type: 'array',
			items: { type: 'string' },
			description: 'Tags appended to every event.',
		},
	},
	additionalProperties: false,
};

/** Validate a config-file block into EnrichOptions */
export function parseEnrichConfig(config: Record<string, unknown>): EnrichOptions {
	return checkConfig<EnrichOptions>(ENRICH_CONFIG_SCHEMA, config, 'enrich');
}

export function register(): MiddlewareRegistration {
	return {
		id: 'enrich',
		create: (config) => enrich(parseEnrichConfig(config)),
		configSchema: ENRICH_CONFIG_SCHEMA,
	};
}

export { type EnrichOptions, enrich, evaluateExpression } from './enrich.js';
