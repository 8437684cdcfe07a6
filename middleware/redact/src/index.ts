/**
 * @logrelay/middleware-redact — registration entry point.
 */

import type { ConfigSchema, MiddlewareRegistration } from '@logrelay/sdk';
import { checkConfig } from '@logrelay/sdk';
import { PRESETS, type PresetName, type RedactOptions, redact } from './redact.js';

export const REDACT_CONFIG_SCHEMA: ConfigSchema = {
	type: 'object',
	properties: {
		presets: {
			type: 'array',
			items: { type: 'string', enum: Object.keys(PRESETS) },
			description: 'Built-in patterns to apply.',
		},
		patterns: {
			type: 'array',
			items: { type: 'string' },
			description: 'Regular expressions replaced in the message and string fields.',
		},
		fields: {
			type: 'array',
			items: { type: 'string' },
			description: 'Field names whose value is replaced entirely.',
		},
		replacement: {
			type: 'string',
			default: '[REDACTED]',
		},
	},
	additionalProperties: false,
};

interface RedactConfig {
	presets?: PresetName[];
	patterns?: string[];
	fields?: string[];
	replacement?: string;
}

/** Validate a config-file block into RedactOptions */
export function parseRedactConfig(config: Record<string, unknown>): RedactOptions {
	const { presets = [], patterns = [], fields = [], replacement } = checkConfig<RedactConfig>(
		REDACT_CONFIG_SCHEMA,
		config,
		'redact',
	);
	return {
		patterns: [...presets.map((name) => PRESETS[name]), ...patterns],
		fields,
		replacement,
	};
}

export function register(): MiddlewareRegistration {
	return {
		id: 'redact',
		create: (config) => redact(parseRedactConfig(config)),
		configSchema: REDACT_CONFIG_SCHEMA,
	};
}

export {
	DEFAULT_REPLACEMENT,
	PRESETS,
	type PresetName,
	type RedactOptions,
	type RedactRule,
	redact,
	redactPii,
} from './redact.js';
