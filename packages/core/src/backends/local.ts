/**
 * Local file backend.
 *
 * Line mode appends each record as it arrives, rotating by size first.
 * Row formatters and an explicit flush_threshold switch to buffered mode:
 * records collect in a BufferedSink and go out in one append per batch.
 * Row records are written as JSON lines.
 */

import { appendFileSync, mkdirSync, statSync } from 'node:fs';
import { dirname } from 'node:path';
import type {
	BackendConfig,
	BackendContext,
	ConfigSchema,
	FormattedRecord,
	Formatter,
	LogEvent,
	Sink,
} from '@logrelay/sdk';
import { backendSettings, ConfigurationError, checkConfig, describeCause, parseSize } from '@logrelay/sdk';
import { BufferedSink } from '../buffer.js';
import { rotateFile, shouldRotate } from '../rotation.js';

export const DEFAULT_MAX_FILES = 5;
/** Batch size used for row formatters when no flush_threshold is given */
export const DEFAULT_ROW_FLUSH_THRESHOLD = 1000;

export interface LocalFileOptions {
	path: string;
	/** Rotate once the file reaches this many bytes */
	maxSize?: number;
	/** Rotated files kept beside the current one */
	maxFiles?: number;
	/** Written first into every new (or freshly rotated) file */
	header?: string;
}

/**
 * Append-only file with size-based rotation.
 */
export class LocalFile {
	readonly path: string;
	readonly maxSize?: number;
	readonly maxFiles: number;
	private readonly header?: string;

	constructor(options: LocalFileOptions) {
		this.path = options.path;
		this.maxSize = options.maxSize;
		this.maxFiles = options.maxFiles ?? DEFAULT_MAX_FILES;
		this.header = options.header;
		mkdirSync(dirname(this.path), { recursive: true });
	}

	/** Append lines in one write, rotating first when the file is full */
	writeLines(lines: readonly string[]): void {
		if (lines.length === 0) return;
		if (this.maxSize !== undefined && shouldRotate(this.path, this.maxSize)) {
			rotateFile(this.path, this.maxFiles);
		}
		const body = lines.join('\n');
		const text = this.header && this.isEmpty() ? `${this.header}\n${body}\n` : `${body}\n`;
		appendFileSync(this.path, text, 'utf-8');
	}

	private isEmpty(): boolean {
		try {
			return statSync(this.path).size === 0;
		} catch {
			return true;
		}
	}
}

/** Serialize a formatted record as one line */
export function toLine(record: FormattedRecord): string {
	return typeof record === 'string' ? record : JSON.stringify(record);
}

/**
 * Unbuffered local sink: one append per event.
 */
export class LocalSink implements Sink {
	readonly id: string;
	readonly file: LocalFile;
	private readonly formatter: Formatter;

	constructor(formatter: Formatter, file: LocalFile) {
		this.formatter = formatter;
		this.file = file;
		this.id = `local:${file.path}`;
	}

	write(event: LogEvent): void {
		this.file.writeLines([toLine(this.formatter.format(event))]);
	}

	bufferSize(): null {
		return null;
	}
}

// ─── Config parsing ───────────────────────────────────────────────────────────

export const LOCAL_CONFIG_SCHEMA: ConfigSchema = {
	type: 'object',
	required: ['path'],
	properties: {
		path: {
			type: 'string',
			pattern: '\\S',
			description: 'File to append to. Parent directories are created.',
		},
		max_size: {
			type: ['string', 'number'],
			description: 'Rotate once the file reaches this size, e.g. "10mb".',
		},
		max_files: {
			type: 'integer',
			minimum: 0,
			description: 'Rotated files kept beside the current one.',
			default: DEFAULT_MAX_FILES,
		},
	},
	additionalProperties: false,
};

interface LocalConfig {
	path: string;
	max_size?: string | number;
	max_files?: number;
}

function readMaxSize(value: string | number | undefined): number | undefined {
	if (value === undefined) return undefined;
	try {
		return parseSize(value);
	} catch (err) {
		throw new ConfigurationError(describeCause(err), { path: 'local.max_size', cause: err });
	}
}

/**
 * Build a local file sink from a formatter and backend config.
 */
export function buildLocalBackend(
	formatter: Formatter,
	config: BackendConfig,
	context: BackendContext,
): Sink {
	const settings = checkConfig<LocalConfig>(LOCAL_CONFIG_SCHEMA, backendSettings(config), 'local');
	const file = new LocalFile({
		path: settings.path,
		maxSize: readMaxSize(settings.max_size),
		maxFiles: settings.max_files ?? DEFAULT_MAX_FILES,
		header: formatter.header,
	});

	const threshold =
		config.flush_threshold ??
		(formatter.kind === 'row' ? DEFAULT_ROW_FLUSH_THRESHOLD : undefined);
	if (threshold === undefined) {
		return new LocalSink(formatter, file);
	}

	return new BufferedSink<string>({
		id: `local:${file.path}`,
		threshold,
		format: (event) => toLine(formatter.format(event)),
		write: (lines) => file.writeLines(lines),
		diagnostics: context.diagnostics,
	});
}
