/**
 * CLI output.
 *
 * Human-readable lines are suppressed by --json and --quiet. JSON documents
 * always print, and errors print unless --json is set (the exit code
 * carries the failure there).
 */

import chalk from 'chalk';

const mode = { json: false, quiet: false };

export function setJsonMode(enabled: boolean): void {
	mode.json = enabled;
}

export function setQuietMode(enabled: boolean): void {
	mode.quiet = enabled;
}

export function isJsonMode(): boolean {
	return mode.json;
}

function readable(): boolean {
	return !mode.json && !mode.quiet;
}

export function info(message: string): void {
	if (readable()) console.log(message);
}

export function success(message: string): void {
	if (readable()) console.log(chalk.green(`✓ ${message}`));
}

export function warn(message: string): void {
	if (readable()) console.warn(chalk.yellow(`! ${message}`));
}

export function error(message: string): void {
	if (!mode.json) console.error(chalk.red(`✗ ${message}`));
}

export function json(data: unknown): void {
	console.log(JSON.stringify(data, null, 2));
}

// ─── Tables ──────────────────────────────────────────────────────────────────

export interface Column<K extends string> {
	header: string;
	key: K;
	align?: 'left' | 'right';
}

/** Aligned columns, or the rows as a JSON array in JSON mode */
export function table<K extends string>(
	columns: readonly Column<K>[],
	rows: readonly Record<K, string>[],
): void {
	if (mode.json) {
		json(rows);
		return;
	}
	if (mode.quiet) return;

	const widths = columns.map((column) =>
		Math.max(column.header.length, ...rows.map((row) => row[column.key].length)),
	);
	const render = (cells: readonly string[]): string =>
		cells
			.map((cell, i) => (columns[i].align === 'right' ? cell.padStart(widths[i]) : cell.padEnd(widths[i])))
			.join('  ')
			.trimEnd();

	console.log(chalk.dim(render(columns.map((column) => column.header))));
	for (const row of rows) {
		console.log(render(columns.map((column) => row[column.key])));
	}
}
