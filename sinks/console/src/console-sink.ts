/**
 * Console sink — human-readable colored output for development.
 *
 * Writes to process.stdout by default; `stream: stderr` keeps stdout clean
 * for piped output.
 */

import type { ConfigSchema, LevelBound, LogEvent, Sink } from '@logrelay/sdk';
import { checkConfig, MAX_LEVEL, MIN_LEVEL, resolveLevelNumber } from '@logrelay/sdk';
import { formatCompact, formatVerbose, shouldLog } from './format.js';

export interface ConsoleSinkConfig {
	lower?: LevelBound;
	upper?: LevelBound;
	color?: boolean;
	compact?: boolean;
	stream?: 'stdout' | 'stderr';
}

export class ConsoleSink implements Sink {
	readonly id = 'console';
	readonly lower: number;
	readonly upper: number;
	private readonly useColor: boolean;
	private readonly compact: boolean;
	private readonly stream: 'stdout' | 'stderr';

	constructor(config?: ConsoleSinkConfig) {
		this.lower = config?.lower === undefined ? MIN_LEVEL : resolveLevelNumber(config.lower);
		this.upper = config?.upper === undefined ? MAX_LEVEL : resolveLevelNumber(config.upper);
		this.useColor = config?.color ?? true;
		this.compact = config?.compact ?? true;
		this.stream = config?.stream ?? 'stdout';
	}

	write(event: LogEvent): void {
		if (!shouldLog(event.level_number, this.lower, this.upper)) return;
		const formatted = this.compact
			? formatCompact(event, this.useColor)
			: formatVerbose(event, this.useColor);
		process[this.stream].write(`${formatted}\n`);
	}

	bufferSize(): null {
		return null;
	}
}

/** Console sink factory */
export function consoleSink(config?: ConsoleSinkConfig): ConsoleSink {
	return new ConsoleSink(config);
}

export const CONSOLE_CONFIG_SCHEMA: ConfigSchema = {
	type: 'object',
	properties: {
		lower: {
			type: ['string', 'integer'],
			description: 'Lowest level to display (name or number).',
			default: MIN_LEVEL,
		},
		upper: {
			type: ['string', 'integer'],
			description: 'Highest level to display (name or number).',
			default: MAX_LEVEL,
		},
		color: {
			type: 'boolean',
			description: 'Use ANSI colors in output.',
			default: true,
		},
		compact: {
			type: 'boolean',
			description: 'One line per event; otherwise fields follow as JSON.',
			default: true,
		},
		stream: {
			type: 'string',
			enum: ['stdout', 'stderr'],
			default: 'stdout',
		},
	},
	additionalProperties: false,
};

/** Validate a config-file block into ConsoleSinkConfig */
export function parseConsoleConfig(config: Record<string, unknown>): ConsoleSinkConfig {
	return checkConfig<ConsoleSinkConfig>(CONSOLE_CONFIG_SCHEMA, config, 'console');
}
