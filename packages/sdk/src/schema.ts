/**
 * Config validation against the JSON Schema a registration declares.
 *
 * Failures become one ConfigurationError naming the dotted path of the
 * first offending setting; further issues follow in the message.
 */

import { Ajv, type ErrorObject, type SchemaObject } from 'ajv';
import { ConfigurationError } from './errors.js';

export type ConfigSchema = SchemaObject;

// Compiled validators are cached by schema object
const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });

function locate(base: string, instancePath: string): string {
	let result = base;
	for (const segment of instancePath.split('/').slice(1)) {
		const key = segment.replace(/~1/g, '/').replace(/~0/g, '~');
		if (/^\d+$/.test(key)) {
			result = `${result}[${key}]`;
		} else {
			result = result ? `${result}.${key}` : key;
		}
	}
	return result;
}

function issuePath(base: string, error: ErrorObject): string {
	const at = locate(base, error.instancePath);
	if (error.keyword === 'required') {
		const missing = String(error.params.missingProperty);
		return at ? `${at}.${missing}` : missing;
	}
	return at || '(root)';
}

function describeIssue(error: ErrorObject): string {
	const { params } = error;
	switch (error.keyword) {
		case 'additionalProperties':
			return `unknown key "${String(params.additionalProperty)}"`;
		case 'required':
			return 'is required';
		case 'enum':
			return `must be one of ${[params.allowedValues].flat().join(', ')}`;
		case 'type':
			return `must be ${[params.type].flat().join(',').split(',').join(' or ')}`;
		default:
			return error.message ?? `fails the "${error.keyword}" check`;
	}
}

/** Render validation errors as `path: issue` strings */
export function describeIssues(errors: readonly ErrorObject[], path: string): string[] {
	return errors.map((error) => `${issuePath(path, error)}: ${describeIssue(error)}`);
}

/**
 * Validate a config block against a schema.
 * Returns the block typed as T, or throws ConfigurationError.
 */
export function checkConfig<T = Record<string, unknown>>(
	schema: ConfigSchema,
	config: unknown,
	path: string,
): T {
	const validate = ajv.compile<T>(schema);
	if (validate(config)) return config;

	const [first, ...rest] = validate.errors ?? [];
	if (!first) {
		throw new ConfigurationError('invalid config', { path: path || undefined });
	}
	const message = [describeIssue(first), ...describeIssues(rest, path)].join('; ');
	throw new ConfigurationError(message, { path: issuePath(path, first) });
}
