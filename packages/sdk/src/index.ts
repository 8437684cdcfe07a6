/**
 * @logrelay/sdk — types, levels, events and plug-in contracts.
 */

export type { LevelBound, LimitAttachable, MiddlewareAttachable, Taggable } from './capabilities.js';
export {
	type Diagnostic,
	type DiagnosticCode,
	type DiagnosticListener,
	type DiagnosticSeverity,
	Diagnostics,
	diagnostics,
	type LineWriter,
} from './diagnostics.js';
export {
	BackendWriteError,
	BuiltinLevelError,
	ConfigurationError,
	describeCause,
	LogrelayError,
	SinkFailureError,
	SinkSelectionError,
	UnknownBackendError,
} from './errors.js';
export {
	type BuildEventOptions,
	buildEvent,
	isLogEvent,
	toFields,
	toFieldValue,
	toTags,
	type ValidationError,
	validateEvent,
	withEventFields,
	withEventTags,
	withMessage,
} from './event.js';
export {
	BUILTIN_LEVELS,
	CRITICAL,
	compareLevels,
	DEBUG,
	type DefineLevelOptions,
	defineLevel,
	ERROR,
	HIGHEST,
	type LevelCallOptions,
	type LevelConstructor,
	LOWEST,
	levelByName,
	MESSAGE,
	NOTE,
	resolveLevelNumber,
	TRACE,
	WARNING,
} from './level.js';
export {
	type Middleware,
	type MiddlewareRegistration,
	runMiddleware,
	toMiddlewareList,
} from './middleware.js';
export { type ConfigSchema, checkConfig, describeIssues } from './schema.js';
export {
	backendSettings,
	type BackendBuilder,
	type BackendConfig,
	type BackendContext,
	type BackendFormatter,
	type BackendRegistration,
	type Formatter,
	type FormatterKind,
	isSink,
	SHARED_BACKEND_KEYS,
	type Sink,
	type SinkFunction,
	type SinkRegistration,
	toSink,
} from './sink.js';
export {
	type CapturedDiagnostics,
	CaptureSink,
	captureDiagnostics,
	createTestEvent,
	FailingSink,
	recordingMiddleware,
} from './testing.js';
export {
	type ComposeOptions,
	type FieldMap,
	type FieldScalar,
	type FieldValue,
	type Fields,
	FULL_RANGE,
	type FormattedRecord,
	type FormattedRow,
	type LogEvent,
	inRange,
	type LevelRange,
	MAX_LEVEL,
	MIN_LEVEL,
	parseDuration,
	parseSize,
} from './types.js';
