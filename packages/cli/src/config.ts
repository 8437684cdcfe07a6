/**
 * Config loading — reads logrelay.yaml and builds a Logger from it.
 *
 * Resolution order for the file: --config, LOGRELAY_CONFIG, ./logrelay.yaml.
 * `${VAR}` references anywhere in a string value resolve from the
 * environment. Relative `path` settings resolve against the config file's
 * directory.
 */

import { readFile } from 'node:fs/promises';
import { dirname, isAbsolute, resolve } from 'node:path';
import * as webhookBackend from '@logrelay/backend-webhook';
import {
	type BackendRegistry,
	ConfiguredSink,
	createDefaultRegistry,
	Logger,
	onBackend,
	resolveLimits,
	toCsv,
	toJson,
	toRow,
	toText,
} from '@logrelay/core';
import * as enrichMiddleware from '@logrelay/middleware-enrich';
import * as redactMiddleware from '@logrelay/middleware-redact';
import * as sampleMiddleware from '@logrelay/middleware-sample';
import type {
	BackendConfig,
	ConfigSchema,
	Diagnostics,
	Formatter,
	LevelBound,
	Middleware,
	MiddlewareRegistration,
	Sink,
	SinkRegistration,
} from '@logrelay/sdk';
import { ConfigurationError, checkConfig, describeCause } from '@logrelay/sdk';
import * as consoleSink from '@logrelay/sink-console';
import yaml from 'js-yaml';

export const DEFAULT_CONFIG_FILE = 'logrelay.yaml';

// ─── Types ───────────────────────────────────────────────────────────────────

export interface MiddlewareConfig {
	kind: string;
	options: Record<string, unknown>;
}

export interface LimitsConfig {
	lower?: LevelBound;
	upper?: LevelBound;
}

/** Settings every sink accepts, whatever its kind */
interface CommonSinkConfig {
	limits: LimitsConfig;
	tags: string[];
	middleware: MiddlewareConfig[];
}

export interface FormatConfig {
	type: 'text' | 'json' | 'csv' | 'row';
	options: Record<string, unknown>;
}

export type SinkConfig =
	| (CommonSinkConfig & { type: 'direct'; kind: string; options: Record<string, unknown> })
	| (CommonSinkConfig & { type: 'backend'; format: FormatConfig; backend: BackendConfig });

export interface LogrelayConfig {
	/** Absolute path of the file this config came from */
	path: string;
	logger: {
		limits: LimitsConfig;
		tags: string[];
		middleware: MiddlewareConfig[];
	};
	sinks: Record<string, SinkConfig>;
}

export interface LoadConfigOptions {
	configPath?: string;
	env?: NodeJS.ProcessEnv;
	cwd?: string;
}

// ─── Loading ─────────────────────────────────────────────────────────────────

export function resolveConfigPath(options?: LoadConfigOptions): string {
	const env = options?.env ?? process.env;
	const cwd = options?.cwd ?? process.cwd();
	return resolve(cwd, options?.configPath || env.LOGRELAY_CONFIG || DEFAULT_CONFIG_FILE);
}

/** Read, resolve and validate a config file */
export async function loadCliConfig(options?: LoadConfigOptions): Promise<LogrelayConfig> {
	const path = resolveConfigPath(options);
	let content: string;
	try {
		content = await readFile(path, 'utf-8');
	} catch (err) {
		throw new ConfigurationError(`cannot read config file ${path}: ${describeCause(err)}`, {
			cause: err,
		});
	}
	return parseConfig(content, path, options?.env ?? process.env);
}

/** Parse YAML text into a validated config */
export function parseConfig(content: string, path: string, env: NodeJS.ProcessEnv = process.env): LogrelayConfig {
	let raw: unknown;
	try {
		raw = yaml.load(content);
	} catch (err) {
		throw new ConfigurationError(`invalid YAML in ${path}: ${describeCause(err)}`, { cause: err });
	}
	const document = checkConfig<RawConfig>(CONFIG_SCHEMA, resolveEnvRefs(raw ?? {}, env, ''), '');
	const logger = document.logger ?? {};
	const baseDir = dirname(path);

	return {
		path,
		logger: {
			limits: { lower: logger.limits?.lower, upper: logger.limits?.upper },
			tags: logger.tags ?? [],
			middleware: (logger.middleware ?? []).map(toMiddlewareConfig),
		},
		sinks: Object.fromEntries(
			Object.entries(document.sinks ?? {}).map(([name, sink]) => [
				name,
				readSink(sink, `sinks.${name}`, baseDir),
			]),
		),
	};
}

/** Replace `${VAR}` references in every string of a parsed document */
export function resolveEnvRefs(value: unknown, env: NodeJS.ProcessEnv, path: string): unknown {
	if (typeof value === 'string') {
		return value.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (_match, name: string) => {
			const resolved = env[name];
			if (resolved === undefined) {
				throw new ConfigurationError(`environment variable ${name} is not set`, {
					path: path || '(root)',
				});
			}
			return resolved;
		});
	}
	if (Array.isArray(value)) {
		return value.map((item, i) => resolveEnvRefs(item, env, `${path}[${i}]`));
	}
	if (isMap(value)) {
		return Object.fromEntries(
			Object.entries(value).map(([key, entry]) => [
				key,
				resolveEnvRefs(entry, env, path ? `${path}.${key}` : key),
			]),
		);
	}
	return value;
}

// ─── Document schema ─────────────────────────────────────────────────────────

const LEVEL_BOUND = { type: ['string', 'integer'] };
const TAG_LIST = { type: 'array', items: { type: 'string' } };
const MIDDLEWARE_LIST = {
	type: 'array',
	items: {
		type: 'object',
		required: ['kind'],
		properties: { kind: { type: 'string', minLength: 1 } },
	},
};

const CONFIG_SCHEMA: ConfigSchema = {
	type: 'object',
	properties: {
		logger: {
			type: 'object',
			properties: {
				limits: {
					type: 'object',
					properties: { lower: LEVEL_BOUND, upper: LEVEL_BOUND },
					additionalProperties: false,
				},
				tags: TAG_LIST,
				middleware: MIDDLEWARE_LIST,
			},
			additionalProperties: false,
		},
		sinks: {
			type: 'object',
			additionalProperties: {
				type: 'object',
				properties: {
					kind: { type: 'string', minLength: 1 },
					format: { type: ['string', 'object'] },
					backend: { type: 'string', minLength: 1 },
					lower: LEVEL_BOUND,
					upper: LEVEL_BOUND,
					tags: TAG_LIST,
					middleware: MIDDLEWARE_LIST,
					flush_threshold: { type: 'integer', minimum: 1 },
				},
			},
		},
	},
	additionalProperties: false,
};

interface RawMiddleware {
	kind: string;
	[key: string]: unknown;
}

interface RawSink {
	kind?: string;
	format?: string | Record<string, unknown>;
	backend?: string;
	lower?: string | number;
	upper?: string | number;
	tags?: string[];
	middleware?: RawMiddleware[];
	flush_threshold?: number;
	[key: string]: unknown;
}

interface RawConfig {
	logger?: {
		limits?: { lower?: string | number; upper?: string | number };
		tags?: string[];
		middleware?: RawMiddleware[];
	};
	sinks?: Record<string, RawSink>;
}

function isMap(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toMiddlewareConfig({ kind, ...options }: RawMiddleware): MiddlewareConfig {
	return { kind, options };
}

const FORMAT_TYPES = ['text', 'json', 'csv', 'row'] as const;

function isFormatType(value: unknown): value is FormatConfig['type'] {
	return FORMAT_TYPES.some((type) => type === value);
}

function readFormat(value: unknown, path: string): FormatConfig {
	if (isFormatType(value)) return { type: value, options: {} };
	if (isMap(value)) {
		const { type, ...options } = value;
		if (isFormatType(type)) return { type, options };
	}
	throw new ConfigurationError(`must be one of ${FORMAT_TYPES.join(', ')} (or a map with a type)`, {
		path,
	});
}

function readSink(raw: RawSink, path: string, baseDir: string): SinkConfig {
	const { lower, upper, tags = [], middleware = [], kind, format, backend, flush_threshold, ...options } = raw;
	const common: CommonSinkConfig = {
		limits: { lower, upper },
		tags,
		middleware: middleware.map(toMiddlewareConfig),
	};

	if (kind !== undefined) {
		if (format !== undefined || backend !== undefined) {
			throw new ConfigurationError('takes either kind or format + backend, not both', { path });
		}
		const sinkOptions = flush_threshold === undefined ? options : { ...options, flush_threshold };
		return { ...common, type: 'direct', kind, options: sinkOptions };
	}

	if (backend === undefined) {
		throw new ConfigurationError('needs a kind, or a format and a backend', { path });
	}
	if (typeof options.path === 'string' && !isAbsolute(options.path)) {
		options.path = resolve(baseDir, options.path);
	}
	return {
		...common,
		type: 'backend',
		format: readFormat(format ?? 'text', `${path}.format`),
		backend: { ...options, kind: backend, flush_threshold },
	};
}

// ─── Plug-ins ────────────────────────────────────────────────────────────────

export interface PluginSet {
	sinks: Map<string, SinkRegistration>;
	middleware: Map<string, MiddlewareRegistration>;
	backends: BackendRegistry;
}

/** Every plug-in that ships with the CLI */
export function defaultPlugins(): PluginSet {
	const backends = createDefaultRegistry().use(webhookBackend.register());
	const sink = consoleSink.register();
	const middleware = [redactMiddleware.register(), sampleMiddleware.register(), enrichMiddleware.register()];
	return {
		sinks: new Map([[sink.id, sink]]),
		middleware: new Map(middleware.map((registration) => [registration.id, registration])),
		backends,
	};
}

// ─── Building ────────────────────────────────────────────────────────────────

function buildFormatter(format: FormatConfig, path: string): Formatter {
	const { options } = format;
	const optionalString = (key: string): string | undefined => {
		const value = options[key];
		if (value === undefined || typeof value === 'string') return value;
		throw new ConfigurationError('must be a string', { path: `${path}.${key}` });
	};
	const optionalBoolean = (key: string): boolean | undefined => {
		const value = options[key];
		if (value === undefined || typeof value === 'boolean') return value;
		throw new ConfigurationError('must be true or false', { path: `${path}.${key}` });
	};

	switch (format.type) {
		case 'text':
			return toText(optionalString('template'));
		case 'json':
			return toJson({ pretty: optionalBoolean('pretty') });
		case 'csv':
			return toCsv({
				separator: optionalString('separator'),
				quote: optionalString('quote'),
				headers: optionalBoolean('headers'),
			});
		case 'row':
			return toRow();
	}
}

function buildMiddleware(configs: readonly MiddlewareConfig[], plugins: PluginSet, path: string): Middleware[] {
	return configs.map((config, i) => {
		const registration = plugins.middleware.get(config.kind);
		if (!registration) {
			throw new ConfigurationError(
				`unknown middleware "${config.kind}". Available: ${[...plugins.middleware.keys()].join(', ')}`,
				{ path: `${path}[${i}]` },
			);
		}
		if (registration.configSchema) {
			checkConfig(registration.configSchema, config.options, `${path}[${i}]`);
		}
		try {
			return registration.create(config.options);
		} catch (err) {
			throw new ConfigurationError(describeCause(err), { path: `${path}[${i}]`, cause: err });
		}
	});
}

function buildSink(name: string, config: SinkConfig, plugins: PluginSet, diagnostics?: Diagnostics): ConfiguredSink {
	const path = `sinks.${name}`;
	let sink: Sink;
	try {
		if (config.type === 'direct') {
			const registration = plugins.sinks.get(config.kind);
			if (!registration) {
				throw new ConfigurationError(
					`unknown sink kind "${config.kind}". Available: ${[...plugins.sinks.keys()].join(', ')}`,
				);
			}
			if (registration.configSchema) {
				checkConfig(registration.configSchema, config.options, path);
			}
			sink = registration.create(config.options);
		} else {
			const formatter = buildFormatter(config.format, `${path}.format`);
			sink = plugins.backends.build(onBackend(formatter, config.backend), { diagnostics });
		}
	} catch (err) {
		if (err instanceof ConfigurationError && err.path?.startsWith(path)) throw err;
		throw new ConfigurationError(describeCause(err), { path, cause: err });
	}

	return new ConfiguredSink(sink, {
		limits: resolveLimits(config.limits.lower, config.limits.upper),
		middleware: buildMiddleware(config.middleware, plugins, `${path}.middleware`),
		tags: config.tags,
	});
}

export interface BuildLoggerOptions {
	plugins?: PluginSet;
	diagnostics?: Diagnostics;
	/** Receives an ERROR event whenever a sink fails */
	fallback?: Sink;
}

/** Build the logger a config describes */
export function buildLogger(config: LogrelayConfig, options?: BuildLoggerOptions): Logger {
	const plugins = options?.plugins ?? defaultPlugins();
	let logger = new Logger({
		diagnostics: options?.diagnostics,
		fallback: options?.fallback,
		registry: plugins.backends,
	}).withLimits(config.logger.limits.lower, config.logger.limits.upper);

	if (config.logger.tags.length > 0) {
		logger = logger.withTags(config.logger.tags);
	}
	const middleware = buildMiddleware(config.logger.middleware, plugins, 'logger.middleware');
	if (middleware.length > 0) {
		logger = logger.withMiddleware(middleware);
	}

	const sinks = Object.entries(config.sinks).map(
		([name, sinkConfig]) => [name, buildSink(name, sinkConfig, plugins, options?.diagnostics)] as const,
	);
	return sinks.length > 0 ? logger.withSinks(Object.fromEntries(sinks)) : logger;
}
