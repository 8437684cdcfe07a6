/**
 * @logrelay/core — logger engine, buffering, async dispatch and backends.
 */

export {
	bufferStatus,
	type DrainOnExitOptions,
	drainAll,
	drainOnExit,
	type ExitTarget,
	flush,
	getSink,
	listSinks,
	type SinkInfo,
	type SinkSelector,
} from './admin.js';
export {
	AsyncSink,
	type AsyncSinkOptions,
	DEFAULT_ASYNC_FLUSH_THRESHOLD,
	DEFAULT_MAX_QUEUE_SIZE,
} from './async-sink.js';
export {
	buildLocalBackend,
	DEFAULT_MAX_FILES,
	DEFAULT_ROW_FLUSH_THRESHOLD,
	LOCAL_CONFIG_SCHEMA,
	LocalFile,
	type LocalFileOptions,
	LocalSink,
	toLine,
} from './backends/local.js';
export { buildMemoryBackend, MEMORY_CONFIG_SCHEMA, MemorySink } from './backends/memory.js';
export { type BatchWriter, BufferedSink, type BufferedSinkOptions } from './buffer.js';
export { ConfiguredSink, type ConfiguredSinkOptions } from './configured-sink.js';
export {
	getDefaultLogger,
	log,
	resetDefaultLogger,
	setDefaultLogger,
} from './default-logger.js';
export {
	CSV_COLUMNS,
	type CsvOptions,
	DEFAULT_TEXT_TEMPLATE,
	defineFormatter,
	isFormatter,
	toCsv,
	toJson,
	toRow,
	toText,
} from './formatters.js';
export { resolveLimits } from './limits.js';
export {
	chainLoggers,
	Logger,
	type LoggerOptions,
	SINK_ERROR_TAG,
	type SinkEntry,
	type SinkInput,
} from './logger.js';
export {
	BackendRegistry,
	createDefaultRegistry,
	defaultRegistry,
	isBackendFormatter,
	onBackend,
	onLocal,
	onMemory,
} from './registry.js';
export { rotatedPath, rotateFile, shouldRotate } from './rotation.js';
export { type Job, sharedWorkerPool, WorkerPool, type WorkerPoolOptions } from './worker-pool.js';
