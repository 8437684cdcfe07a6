/**
 * Enrich middleware — add, copy, and compute fields, and add tags.
 *
 * Four operations, applied in this order:
 * - set:     Static values written into fields (field dot-path → value)
 * - copy:    Copy a value from the event to a field (field dot-path → event dot-path)
 * - compute: Simple comparison evaluated against the event (field dot-path → expression)
 * - tags:    Tags appended to the event
 *
 * Source paths address the whole event, e.g. `level`, `message` or
 * `fields.request.id`. Target paths are relative to `fields`.
 */

import type { LogEvent, Middleware } from '@logrelay/sdk';
import { ConfigurationError, toFieldValue, toTags, withEventFields, withEventTags } from '@logrelay/sdk';

export interface EnrichOptions {
	set?: Readonly<Record<string, unknown>>;
	copy?: Readonly<Record<string, string>>;
	compute?: Readonly<Record<string, string>>;
	tags?: readonly string[];
}

type FieldRecord = Record<string, unknown>;

function isRecord(value: unknown): value is FieldRecord {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Get a value from a nested object using a dot-separated path.
 * Returns undefined for missing paths without throwing.
 */
export function getByPath(obj: unknown, path: string): unknown {
	let current: unknown = obj;
	for (const segment of path.split('.')) {
		if (!isRecord(current) || !Object.hasOwn(current, segment)) return undefined;
		current = current[segment];
	}
	return current;
}

function assign(target: FieldRecord, key: string, value: unknown): void {
	Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

/**
 * Set a value on a nested object using a dot-separated path.
 * Creates intermediate objects as needed. Only own properties are
 * followed or written.
 */
export function setByPath(obj: FieldRecord, path: string, value: unknown): void {
	const segments = path.split('.');
	let current = obj;
	for (const segment of segments.slice(0, -1)) {
		const next = Object.hasOwn(current, segment) ? current[segment] : undefined;
		if (isRecord(next)) {
			current = next;
		} else {
			const created: FieldRecord = {};
			assign(current, segment, created);
			current = created;
		}
	}
	assign(current, segments[segments.length - 1], value);
}

/** Throw for paths that are empty or step through `__proto__` */
export function checkPath(path: string, setting: string): void {
	for (const segment of path.split('.')) {
		if (segment.length === 0 || segment === '__proto__') {
			throw new ConfigurationError(`invalid path segment "${segment}" in "${path}"`, { path: setting });
		}
	}
}

/** Deep mutable copy of a field map */
function copyFields(value: unknown): unknown {
	if (Array.isArray(value)) return value.map(copyFields);
	if (!isRecord(value)) return value;
	return Object.fromEntries(Object.entries(value).map(([key, entry]) => [key, copyFields(entry)]));
}

/** 'value' or "value" as a string, otherwise a number when it parses as one */
function parseLiteral(value: string): string | number {
	const stringMatch = value.match(/^(['"])(.*)(\1)$/);
	if (stringMatch) return stringMatch[2];
	const num = Number(value);
	return Number.isNaN(num) ? value : num;
}

const EXPRESSION = /^([a-zA-Z_][\w.]*)\s*(===|!==|>=|<=|>|<)\s*(.+)$/;

/**
 * Parse and evaluate a simple comparison expression against an event.
 *
 * Supported formats:
 *   path === 'value'   (string equality)
 *   path !== 'value'
 *   path === value     (unquoted, tries numeric then string)
 *   path > N           (numeric comparison; also <, >=, <=)
 *
 * No eval(), just string parsing.
 */
export function evaluateExpression(expression: string, event: unknown): boolean {
	const match = expression.trim().match(EXPRESSION);
	if (!match) {
		throw new ConfigurationError(`cannot parse expression "${expression}"`);
	}

	const [, fieldPath, operator, rawValue] = match;
	const fieldValue = getByPath(event, fieldPath);

	const compareValue = parseLiteral(rawValue.trim());
	const numeric = typeof fieldValue === 'number' && typeof compareValue === 'number';
	switch (operator) {
		case '===':
			return fieldValue === compareValue || String(fieldValue) === String(compareValue);
		case '!==':
			return fieldValue !== compareValue && String(fieldValue) !== String(compareValue);
		case '>':
			return numeric && fieldValue > compareValue;
		case '<':
			return numeric && fieldValue < compareValue;
		case '>=':
			return numeric && fieldValue >= compareValue;
		case '<=':
			return numeric && fieldValue <= compareValue;
		default:
			return false;
	}
}

export function enrich(options: EnrichOptions): Middleware {
	const set = Object.entries(options.set ?? {});
	for (const [path, value] of set) {
		checkPath(path, `enrich.set.${path}`);
		toFieldValue(value, `enrich.set.${path}`);
	}
	const copy = Object.entries(options.copy ?? {});
	for (const [targetPath, sourcePath] of copy) {
		checkPath(targetPath, `enrich.copy.${targetPath}`);
		checkPath(sourcePath, `enrich.copy.${targetPath}`);
	}
	const compute = Object.entries(options.compute ?? {});
	for (const [path, expression] of compute) {
		checkPath(path, `enrich.compute.${path}`);
		if (!EXPRESSION.test(expression.trim())) {
			throw new ConfigurationError(`cannot parse expression "${expression}"`, {
				path: `enrich.compute.${path}`,
			});
		}
	}
	const tags = toTags(options.tags ?? []);

	return (event: LogEvent) => {
		const fields: FieldRecord = Object.fromEntries(
			Object.entries(event.fields).map(([key, value]) => [key, copyFields(value)]),
		);

		// 1. Static field setting
		for (const [path, value] of set) {
			setByPath(fields, path, copyFields(value));
		}

		// 2. Field copying
		const view = { ...event, fields };
		for (const [targetPath, sourcePath] of copy) {
			const value = getByPath(view, sourcePath);
			if (value !== undefined) {
				setByPath(fields, targetPath, copyFields(value));
			}
		}

		// 3. Computed fields
		for (const [targetPath, expression] of compute) {
			setByPath(fields, targetPath, evaluateExpression(expression, view));
		}

		return withEventTags(withEventFields(event, fields), tags);
	};
}
