/**
 * In-memory backend. Records land in a caller-supplied array, which makes
 * it the backend of choice for tests and in-process inspection.
 */

import type {
	BackendConfig,
	BackendContext,
	ConfigSchema,
	FormattedRecord,
	Formatter,
	LogEvent,
	Sink,
} from '@logrelay/sdk';
import { backendSettings, checkConfig } from '@logrelay/sdk';
import { BufferedSink } from '../buffer.js';

export class MemorySink implements Sink {
	readonly id = 'memory';
	readonly store: FormattedRecord[];
	private readonly formatter: Formatter;

	constructor(formatter: Formatter, store: FormattedRecord[]) {
		this.formatter = formatter;
		this.store = store;
	}

	write(event: LogEvent): void {
		this.store.push(this.formatter.format(event));
	}

	bufferSize(): null {
		return null;
	}
}

export const MEMORY_CONFIG_SCHEMA: ConfigSchema = {
	type: 'object',
	properties: {
		store: {
			type: 'array',
			description: 'Array receiving the formatted records.',
		},
	},
	additionalProperties: false,
};

/**
 * Build a memory sink. With a flush_threshold, records are buffered and
 * appended to the store in batches.
 */
export function buildMemoryBackend(
	formatter: Formatter,
	config: BackendConfig,
	context: BackendContext,
): Sink {
	const { store = [] } = checkConfig<{ store?: FormattedRecord[] }>(
		MEMORY_CONFIG_SCHEMA,
		backendSettings(config),
		'memory',
	);
	if (config.flush_threshold === undefined) {
		return new MemorySink(formatter, store);
	}
	return new BufferedSink<FormattedRecord>({
		id: 'memory',
		threshold: config.flush_threshold,
		format: (event) => formatter.format(event),
		write: (records) => {
			store.push(...records);
		},
		diagnostics: context.diagnostics,
	});
}
