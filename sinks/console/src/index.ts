/**
 * @logrelay/sink-console — registration entry point.
 */

import type { SinkRegistration } from '@logrelay/sdk';
import { CONSOLE_CONFIG_SCHEMA, ConsoleSink, parseConsoleConfig } from './console-sink.js';

export function register(): SinkRegistration {
	return {
		id: 'console',
		create: (config) => new ConsoleSink(parseConsoleConfig(config)),
		configSchema: CONSOLE_CONFIG_SCHEMA,
	};
}

export {
	CONSOLE_CONFIG_SCHEMA,
	ConsoleSink,
	type ConsoleSinkConfig,
	consoleSink,
	parseConsoleConfig,
} from './console-sink.js';
export { formatCompact, formatTime, formatVerbose, shouldLog } from './format.js';
