/**
 * Backend registry — maps a backend kind to a sink builder.
 *
 * New kinds register without touching composition: a plug-in package
 * exports a BackendRegistration and the host calls registry.use(). Unknown
 * kinds and builder failures surface as ConfigurationError when the sink is
 * built, never at dispatch time.
 */

import type {
	BackendBuilder,
	BackendConfig,
	BackendFormatter,
	BackendRegistration,
	ConfigSchema,
	Diagnostics,
	Formatter,
	Sink,
} from '@logrelay/sdk';
import {
	backendSettings,
	ConfigurationError,
	checkConfig,
	describeCause,
	diagnostics as defaultDiagnostics,
	UnknownBackendError,
} from '@logrelay/sdk';
import { AsyncSink, type AsyncSinkOptions } from './async-sink.js';
import { buildLocalBackend, LOCAL_CONFIG_SCHEMA } from './backends/local.js';
import { buildMemoryBackend, MEMORY_CONFIG_SCHEMA } from './backends/memory.js';
import { isFormatter } from './formatters.js';

/** Settings every backend accepts, whatever its kind */
interface SharedBackendConfig {
	kind: string;
	flush_threshold?: number;
	async?: boolean | Pick<AsyncSinkOptions, 'flush_threshold' | 'max_queue_size'>;
}

const SHARED_BACKEND_SCHEMA: ConfigSchema = {
	type: 'object',
	required: ['kind'],
	properties: {
		kind: { type: 'string', minLength: 1 },
		flush_threshold: { type: 'integer', minimum: 1 },
		async: {
			type: ['boolean', 'object'],
			properties: {
				flush_threshold: { type: 'integer', minimum: 1 },
				max_queue_size: { type: 'integer', minimum: 1 },
			},
			additionalProperties: false,
		},
	},
};

export class BackendRegistry {
	private readonly builders = new Map<string, BackendBuilder>();
	private readonly schemas = new Map<string, ConfigSchema>();

	/**
	 * Register a builder for a kind. Each kind registers once. A config
	 * schema, when given, is enforced on the kind-specific settings.
	 */
	register(kind: string, builder: BackendBuilder, configSchema?: ConfigSchema): this {
		if (typeof kind !== 'string' || kind.length === 0) {
			throw new ConfigurationError('backend kind must be a non-empty string');
		}
		if (this.builders.has(kind)) {
			throw new ConfigurationError(`Backend kind "${kind}" is already registered`);
		}
		if (typeof builder !== 'function') {
			throw new ConfigurationError(`builder for backend kind "${kind}" must be a function`);
		}
		this.builders.set(kind, builder);
		if (configSchema) this.schemas.set(kind, configSchema);
		return this;
	}

	/** Register a plug-in's backend */
	use(registration: BackendRegistration): this {
		return this.register(registration.kind, registration.build, registration.configSchema);
	}

	has(kind: string): boolean {
		return this.builders.has(kind);
	}

	/** Registered kinds, in registration order */
	kinds(): string[] {
		return [...this.builders.keys()];
	}

	configSchema(kind: string): ConfigSchema | undefined {
		return this.schemas.get(kind);
	}

	/**
	 * Build the sink for a formatter + backend descriptor. An `async` block
	 * in the backend config wraps the result in an AsyncSink.
	 */
	build(target: BackendFormatter, options?: { diagnostics?: Diagnostics }): Sink {
		const { formatter, backend } = target;
		const builder = this.builders.get(backend.kind);
		if (!builder) {
			throw new UnknownBackendError(backend.kind, this.kinds());
		}
		const diagnostics = options?.diagnostics ?? defaultDiagnostics;
		const shared = checkConfig<SharedBackendConfig>(SHARED_BACKEND_SCHEMA, backend, backend.kind);
		const schema = this.schemas.get(backend.kind);
		if (schema) {
			checkConfig(schema, backendSettings(backend), backend.kind);
		}

		let sink: Sink;
		try {
			sink = builder(formatter, backend, { diagnostics });
		} catch (err) {
			if (err instanceof ConfigurationError) throw err;
			throw new ConfigurationError(`Failed to build "${backend.kind}" backend: ${describeCause(err)}`, {
				cause: err,
			});
		}

		if (shared.async === undefined || shared.async === false) return sink;
		const asyncOptions = shared.async === true ? {} : shared.async;
		return new AsyncSink(sink, { ...asyncOptions, diagnostics });
	}
}

// ─── Composition helpers ──────────────────────────────────────────────────────

/** Decorate a formatter with a backend descriptor */
export function onBackend(formatter: Formatter, backend: BackendConfig): BackendFormatter {
	if (!isFormatter(formatter)) {
		throw new ConfigurationError('onBackend() needs a formatter (see toText, toJson, toCsv, toRow)');
	}
	if (typeof backend?.kind !== 'string' || backend.kind.length === 0) {
		throw new ConfigurationError('backend config needs a kind');
	}
	return Object.freeze({ formatter, backend: { ...backend } });
}

/** Shorthand for the local file backend */
export function onLocal(
	formatter: Formatter,
	config: Omit<BackendConfig, 'kind'> & { path: string },
): BackendFormatter {
	return onBackend(formatter, { ...config, kind: 'local' });
}

/** Shorthand for the in-memory backend */
export function onMemory(
	formatter: Formatter,
	config?: Omit<BackendConfig, 'kind'>,
): BackendFormatter {
	return onBackend(formatter, { ...config, kind: 'memory' });
}

/** Check whether a value is a formatter decorated with a backend */
export function isBackendFormatter(value: unknown): value is BackendFormatter {
	return (
		typeof value === 'object' &&
		value !== null &&
		'formatter' in value &&
		isFormatter(value.formatter) &&
		'backend' in value &&
		typeof value.backend === 'object' &&
		value.backend !== null &&
		'kind' in value.backend &&
		typeof value.backend.kind === 'string'
	);
}

/** A registry with the built-in `local` and `memory` kinds */
export function createDefaultRegistry(): BackendRegistry {
	return new BackendRegistry()
		.register('local', buildLocalBackend, LOCAL_CONFIG_SCHEMA)
		.register('memory', buildMemoryBackend, MEMORY_CONFIG_SCHEMA);
}

let processRegistry: BackendRegistry | undefined;

/** Process-wide registry used by loggers given none */
export function defaultRegistry(): BackendRegistry {
	processRegistry ??= createDefaultRegistry();
	return processRegistry;
}
