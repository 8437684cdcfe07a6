/**
 * Error taxonomy.
 *
 * Configuration errors are thrown to whoever is building a logger, sink or
 * level. Sink and backend failures are never thrown to the logging caller:
 * the engine wraps them in these classes and reports them through
 * Diagnostics.
 */

export class LogrelayError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = 'LogrelayError';
	}
}

// ─── Construction-time errors ─────────────────────────────────────────────────

/** Invalid construction-time input. Always thrown immediately. */
export class ConfigurationError extends LogrelayError {
	/** Dotted path of the offending setting, when known */
	readonly path?: string;

	constructor(message: string, options?: ErrorOptions & { path?: string }) {
		super(options?.path ? `${options.path}: ${message}` : message, options);
		this.name = 'ConfigurationError';
		this.path = options?.path;
	}
}

export class BuiltinLevelError extends ConfigurationError {
	readonly levelName: string;

	constructor(levelName: string) {
		super(
			`Cannot add tags to built-in level "${levelName}". Define a custom level with defineLevel() instead.`,
		);
		this.name = 'BuiltinLevelError';
		this.levelName = levelName;
	}
}

export class UnknownBackendError extends ConfigurationError {
	readonly kind: string;
	readonly known: readonly string[];

	constructor(kind: string, known: readonly string[]) {
		super(
			`Unknown backend kind "${kind}". Available: ${known.length > 0 ? known.join(', ') : '(none)'}`,
		);
		this.name = 'UnknownBackendError';
		this.kind = kind;
		this.known = known;
	}
}

export class SinkSelectionError extends ConfigurationError {
	constructor(message: string) {
		super(message);
		this.name = 'SinkSelectionError';
	}
}

// ─── Runtime failures (reported, never thrown to the caller) ──────────────────

/** A sink threw (or rejected) while handling an event */
export class SinkFailureError extends LogrelayError {
	readonly index: number;
	readonly sinkName: string;
	readonly label: string;

	constructor(index: number, sinkName: string, label: string, options?: ErrorOptions) {
		super(`Sink #${index} "${sinkName}" failed: ${describeCause(options?.cause)}`, options);
		this.name = 'SinkFailureError';
		this.index = index;
		this.sinkName = sinkName;
		this.label = label;
	}
}

/** A bulk write failed; the records it carried were kept */
export class BackendWriteError extends LogrelayError {
	readonly sinkId: string;
	readonly records: number;

	constructor(sinkId: string, records: number, options?: ErrorOptions) {
		super(
			`Buffered write of ${records} record(s) to ${sinkId} failed: ${describeCause(options?.cause)}`,
			options,
		);
		this.name = 'BackendWriteError';
		this.sinkId = sinkId;
		this.records = records;
	}
}

/** Message of an unknown thrown value */
export function describeCause(cause: unknown): string {
	if (cause instanceof Error) return cause.message;
	return String(cause);
}
