/**
 * Formatters turn an event into a formatted record.
 *
 * Line formatters return one string per event; row formatters return a row
 * object and need a buffering backend.
 */

import type {
	FieldValue,
	FormattedRecord,
	FormattedRow,
	Formatter,
	FormatterKind,
	LogEvent,
} from '@logrelay/sdk';
import { ConfigurationError } from '@logrelay/sdk';

export const DEFAULT_TEXT_TEMPLATE = '{time} [{level}:{level_number}] {message}';

// ─── Text ─────────────────────────────────────────────────────────────────────

function renderValue(value: FieldValue | undefined): string {
	if (value === undefined || value === null) return '';
	if (typeof value === 'string') return value;
	if (typeof value === 'number' || typeof value === 'boolean') return String(value);
	return JSON.stringify(value);
}

function placeholderValue(event: LogEvent, key: string): string {
	switch (key) {
		case 'time':
		case 'timestamp':
			return event.timestamp;
		case 'level':
			return event.level;
		case 'level_number':
			return String(event.level_number);
		case 'message':
			return event.message;
		case 'tags':
			return event.tags.length > 0 ? `[${event.tags.join(', ')}]` : '';
		default:
			return renderValue(event.fields[key]);
	}
}

/**
 * Plain text lines from a template.
 *
 * Placeholders: `{time}`, `{level}`, `{level_number}`, `{message}`,
 * `{tags}` and any field name. Unknown placeholders render empty.
 */
export function toText(template = DEFAULT_TEXT_TEMPLATE): Formatter {
	if (typeof template !== 'string' || template.length === 0) {
		throw new ConfigurationError('text template must be a non-empty string');
	}
	return {
		name: 'text',
		kind: 'line',
		format: (event) => template.replace(/\{(\w+)\}/g, (_, key: string) => placeholderValue(event, key)),
	};
}

// ─── JSON ─────────────────────────────────────────────────────────────────────

/** One JSON document per event */
export function toJson(options?: { pretty?: boolean }): Formatter {
	const indent = options?.pretty ? 2 : undefined;
	return {
		name: 'json',
		kind: 'line',
		format: (event) => JSON.stringify(event, null, indent),
	};
}

// ─── CSV ──────────────────────────────────────────────────────────────────────

export const CSV_COLUMNS = ['time', 'level', 'level_number', 'message', 'tags', 'fields'] as const;

export interface CsvOptions {
	separator?: string;
	quote?: string;
	/** Write a header line at the top of a new file (default true) */
	headers?: boolean;
}

/** CSV lines with fixed columns; tags joined by `|`, fields as JSON */
export function toCsv(options?: CsvOptions): Formatter {
	const separator = options?.separator ?? ',';
	const quote = options?.quote ?? '"';
	if (separator.length !== 1 || quote.length !== 1 || separator === quote) {
		throw new ConfigurationError('separator and quote must be two different single characters', {
			path: 'csv',
		});
	}

	const cell = (value: string): string => {
		if (value.includes(separator) || value.includes(quote) || /[\r\n]/.test(value)) {
			return `${quote}${value.split(quote).join(quote + quote)}${quote}`;
		}
		return value;
	};

	return {
		name: 'csv',
		kind: 'line',
		header: options?.headers === false ? undefined : CSV_COLUMNS.join(separator),
		format: (event) =>
			[
				event.timestamp,
				event.level,
				String(event.level_number),
				event.message,
				event.tags.join('|'),
				Object.keys(event.fields).length > 0 ? JSON.stringify(event.fields) : '',
			]
				.map(cell)
				.join(separator),
	};
}

// ─── Rows ─────────────────────────────────────────────────────────────────────

/** Row records for batched backends */
export function toRow(): Formatter {
	return {
		name: 'row',
		kind: 'row',
		format: (event): FormattedRow => ({
			time: event.timestamp,
			level: event.level,
			level_number: event.level_number,
			message: event.message,
			tags: event.tags,
			fields: event.fields,
		}),
	};
}

// ─── Custom ───────────────────────────────────────────────────────────────────

/**
 * Wrap a one-argument function as a formatter.
 */
export function defineFormatter(
	format: (event: LogEvent) => FormattedRecord,
	options?: { name?: string; kind?: FormatterKind; header?: string },
): Formatter {
	if (typeof format !== 'function' || format.length !== 1) {
		throw new ConfigurationError('formatter must be a function taking exactly one argument (the event)');
	}
	const kind = options?.kind ?? 'line';
	return {
		name: options?.name ?? (format.name || 'custom'),
		kind,
		header: options?.header,
		format: (event) => {
			const record = format(event);
			if (kind === 'line' && typeof record !== 'string') {
				throw new TypeError(`line formatter "${options?.name ?? 'custom'}" returned a non-string record`);
			}
			return record;
		},
	};
}

/** Check whether a value implements the Formatter contract */
export function isFormatter(value: unknown): value is Formatter {
	return (
		typeof value === 'object' &&
		value !== null &&
		'format' in value &&
		typeof value.format === 'function' &&
		'kind' in value &&
		(value.kind === 'line' || value.kind === 'row')
	);
}
