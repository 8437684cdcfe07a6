/**
 * Redact middleware — scrub personal data from messages and fields before
 * any sink sees it.
 *
 * Patterns are applied to the message and to every string field value, at
 * any depth. Fields named in `fields` are replaced wholesale.
 */

import type { FieldMap, FieldValue, LogEvent, Middleware } from '@logrelay/sdk';
import { ConfigurationError, withEventFields, withMessage } from '@logrelay/sdk';

export const DEFAULT_REPLACEMENT = '[REDACTED]';

export interface RedactRule {
	pattern: string | RegExp;
	/** Replacement text; `$1`-style group references are honoured */
	replacement?: string;
}

export interface RedactOptions {
	patterns?: ReadonlyArray<string | RegExp | RedactRule>;
	/** Field names whose whole value is replaced */
	fields?: readonly string[];
	/** Default replacement for patterns and fields */
	replacement?: string;
}

interface CompiledRule {
	regex: RegExp;
	replacement: string;
}

/** Built-in patterns for common personal data */
export const PRESETS = {
	credit_card: {
		pattern: /\b(\d{4})[-\s]?(\d{4})[-\s]?(\d{4})[-\s]?(\d{4})\b/g,
		replacement: '****-****-****-$4',
	},
	ssn: { pattern: /\b\d{3}-?\d{2}-?\d{4}\b/g, replacement: '***-**-****' },
	email: {
		pattern: /\b[A-Za-z0-9._%+-]+@([A-Za-z0-9.-]+\.[A-Za-z]{2,})\b/g,
		replacement: '***@$1',
	},
	ipv4: { pattern: /\b(?:\d{1,3}\.){3}\d{1,3}\b/g, replacement: '***.***.***.***' },
} satisfies Record<string, RedactRule>;

export type PresetName = keyof typeof PRESETS;

function compile(rule: string | RegExp | RedactRule, fallback: string, path: string): CompiledRule {
	const { pattern, replacement } =
		typeof rule === 'string' || rule instanceof RegExp ? { pattern: rule, replacement: undefined } : rule;
	try {
		const regex =
			typeof pattern === 'string'
				? new RegExp(pattern, 'g')
				: new RegExp(pattern.source, pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`);
		return { regex, replacement: replacement ?? fallback };
	} catch (err) {
		throw new ConfigurationError(`invalid pattern ${String(pattern)}`, { path, cause: err });
	}
}

function scrub(text: string, rules: readonly CompiledRule[]): string {
	let result = text;
	for (const rule of rules) {
		result = result.replace(rule.regex, rule.replacement);
	}
	return result;
}

interface ScrubContext {
	rules: readonly CompiledRule[];
	fields: ReadonlySet<string>;
	replacement: string;
}

function scrubValue(value: FieldValue, context: ScrubContext): FieldValue {
	if (typeof value === 'string') return scrub(value, context.rules);
	if (value === null || typeof value !== 'object') return value;
	if (isFieldList(value)) return value.map((item) => scrubValue(item, context));
	return scrubMap(value, context);
}

function isFieldList(value: readonly FieldValue[] | FieldMap): value is readonly FieldValue[] {
	return Array.isArray(value);
}

function scrubMap(map: FieldMap, context: ScrubContext): Record<string, FieldValue> {
	return Object.fromEntries(
		Object.entries(map).map(([key, entry]) => [
			key,
			context.fields.has(key) ? context.replacement : scrubValue(entry, context),
		]),
	);
}

/**
 * Build a redacting middleware.
 *
 * ```ts
 * logger.withMiddleware(redact({ patterns: [/token=\w+/], fields: ['password'] }))
 * ```
 */
export function redact(options: RedactOptions): Middleware {
	const replacement = options.replacement ?? DEFAULT_REPLACEMENT;
	const rules = (options.patterns ?? []).map((rule, i) =>
		compile(rule, replacement, `redact.patterns[${i}]`),
	);
	const context: ScrubContext = { rules, fields: new Set(options.fields ?? []), replacement };
	if (rules.length === 0 && context.fields.size === 0) {
		throw new ConfigurationError('needs at least one pattern or field', { path: 'redact' });
	}

	return (event: LogEvent) => {
		const message = scrub(event.message, rules);
		const fields = scrubMap(event.fields, context);
		if (message === event.message && JSON.stringify(fields) === JSON.stringify(event.fields)) {
			return event;
		}
		return withEventFields(withMessage(event, message), fields);
	};
}

/** Redact credit card numbers, SSNs and email addresses (and IPv4 addresses when asked) */
export function redactPii(options?: { ips?: boolean }): Middleware {
	const presets: PresetName[] = ['credit_card', 'ssn', 'email'];
	if (options?.ips) presets.push('ipv4');
	return redact({ patterns: presets.map((name) => PRESETS[name]) });
}
