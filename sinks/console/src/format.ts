/**
 * Console line formatting with optional ANSI colors.
 */

import type { FieldValue, LogEvent } from '@logrelay/sdk';

// ANSI escape codes
const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';
const RED = '\x1b[31m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const CYAN = '\x1b[36m';

function levelColor(levelNumber: number): string {
	if (levelNumber >= 110) return BOLD + RED;
	if (levelNumber >= 100) return RED;
	if (levelNumber >= 80) return YELLOW;
	if (levelNumber >= 60) return CYAN;
	if (levelNumber >= 40) return GREEN;
	return DIM;
}

function paint(text: string, code: string, color: boolean): string {
	return color ? `${code}${text}${RESET}` : text;
}

/** HH:MM:SS.mmm from an ISO timestamp (UTC), or the raw value */
export function formatTime(timestamp: string): string {
	const match = timestamp.match(/T(\d{2}:\d{2}:\d{2}(?:\.\d{3})?)/);
	return match ? match[1] : timestamp;
}

function formatValue(value: FieldValue): string {
	if (typeof value === 'string') return /\s/.test(value) ? JSON.stringify(value) : value;
	return JSON.stringify(value);
}

/** Whether a level number falls in the sink's range */
export function shouldLog(levelNumber: number, lower: number, upper: number): boolean {
	return levelNumber >= lower && levelNumber <= upper;
}

/**
 * One line: `time LEVEL message [tags] key=value ...`
 */
export function formatCompact(event: LogEvent, color: boolean): string {
	const parts = [
		paint(formatTime(event.timestamp), DIM, color),
		paint(event.level.padEnd(8), levelColor(event.level_number), color),
		event.message,
	];
	if (event.tags.length > 0) {
		parts.push(paint(`[${event.tags.join(', ')}]`, DIM, color));
	}
	const fields = Object.entries(event.fields).map(([key, value]) => `${key}=${formatValue(value)}`);
	if (fields.length > 0) {
		parts.push(paint(fields.join(' '), DIM, color));
	}
	return parts.filter((p) => p.length > 0).join(' ');
}

/**
 * The compact line followed by the fields as indented JSON.
 */
export function formatVerbose(event: LogEvent, color: boolean): string {
	const header = formatCompact({ ...event, fields: {} }, color);
	if (Object.keys(event.fields).length === 0) return header;
	const body = JSON.stringify(event.fields, null, 2)
		.split('\n')
		.map((line) => `    ${line}`)
		.join('\n');
	return `${header}\n${paint(`  fields:\n${body}`, DIM, color)}`;
}
