import { ConfigurationError, createTestEvent } from '@logrelay/sdk';
import { describe, expect, it } from 'vitest';
import { enrich, evaluateExpression } from '../enrich.js';
import { parseEnrichConfig, register } from '../index.js';

describe('enrich', () => {
	// ─── Static field setting (set) ─────────────────────────────────────────────

	describe('set', () => {
		it('sets top-level fields', () => {
			const mw = enrich({ set: { service: 'api', region: 'eu' } });
			const result = mw(createTestEvent({ fields: { id: 1 } }));
			expect(result?.fields).toEqual({ id: 1, service: 'api', region: 'eu' });
		});

		it('creates intermediate maps for nested dot-paths', () => {
			const mw = enrich({ set: { 'meta.build.sha': 'abc123' } });
			const result = mw(createTestEvent());
			expect(result?.fields).toEqual({ meta: { build: { sha: 'abc123' } } });
		});

		it('merges into existing nested maps', () => {
			const mw = enrich({ set: { 'meta.env': 'prod' } });
			const result = mw(createTestEvent({ fields: { meta: { host: 'web-1' } } }));
			expect(result?.fields).toEqual({ meta: { host: 'web-1', env: 'prod' } });
		});

		it('rejects values a field cannot hold', () => {
			expect(() => enrich({ set: { started: new Date(0) } })).toThrow(ConfigurationError);
		});

		it('does not mutate the input event', () => {
			const event = createTestEvent({ fields: { meta: { host: 'web-1' } } });
			enrich({ set: { 'meta.env': 'prod' } })(event);
			expect(event.fields).toEqual({ meta: { host: 'web-1' } });
		});
	});

	// ─── Copying (copy) ─────────────────────────────────────────────────────────

	describe('copy', () => {
		it('copies event properties and nested fields', () => {
			const mw = enrich({ copy: { severity: 'level', request_id: 'fields.request.id' } });
			const result = mw(createTestEvent({ fields: { request: { id: 'r-9' } } }));
			expect(result?.fields).toEqual({
				request: { id: 'r-9' },
				severity: 'MESSAGE',
				request_id: 'r-9',
			});
		});

		it('skips missing sources', () => {
			const mw = enrich({ copy: { user: 'fields.user.name' } });
			expect(mw(createTestEvent())?.fields).toEqual({});
		});
	});

	// ─── Computed fields (compute) ──────────────────────────────────────────────

	describe('compute', () => {
		it('evaluates comparisons against the event', () => {
			const mw = enrich({
				compute: {
					severe: 'level_number >= 80',
					slow: 'fields.duration_ms > 500',
					from_api: "fields.source === 'api'",
				},
			});
			const result = mw(createTestEvent({ fields: { duration_ms: 900, source: 'api' } }));
			expect(result?.fields).toEqual({
				duration_ms: 900,
				source: 'api',
				severe: false,
				slow: true,
				from_api: true,
			});
		});

		it('rejects expressions it cannot parse at construction', () => {
			expect(() => enrich({ compute: { bad: 'level ~ 3' } })).toThrow(
				'enrich.compute.bad: cannot parse expression "level ~ 3"',
			);
		});
	});

	describe('evaluateExpression', () => {
		const event = { level: 'WARNING', level_number: 80, fields: { count: '3' } };

		it('compares unquoted values as numbers or strings', () => {
			expect(evaluateExpression('level === WARNING', event)).toBe(true);
			expect(evaluateExpression('fields.count === 3', event)).toBe(true);
			expect(evaluateExpression('level !== ERROR', event)).toBe(true);
		});

		it('only orders numbers', () => {
			expect(evaluateExpression('level_number < 100', event)).toBe(true);
			expect(evaluateExpression('fields.count > 1', event)).toBe(false);
		});
	});

	// ─── Tags ───────────────────────────────────────────────────────────────────

	it('appends tags after existing ones', () => {
		const mw = enrich({ tags: ['enriched'] });
		expect(mw(createTestEvent({ tags: ['api'] }))?.tags).toEqual(['api', 'enriched']);
	});

	it('applies set, copy and compute in order', () => {
		const mw = enrich({
			set: { team: 'core' },
			copy: { owner: 'fields.team' },
			compute: { owned: "fields.owner === 'core'" },
		});
		expect(mw(createTestEvent())?.fields).toEqual({ team: 'core', owner: 'core', owned: true });
	});

	it('refuses paths that step through __proto__', () => {
		expect(() => enrich({ set: { '__proto__.x': 1 } })).toThrow(
			'enrich.set.__proto__.x: invalid path segment "__proto__" in "__proto__.x"',
		);
		expect(() => enrich({ copy: { a: 'fields.__proto__' } })).toThrow(ConfigurationError);
		expect(() => enrich({ compute: { '__proto__.x': 'level_number > 1' } })).toThrow(ConfigurationError);
		expect(() => enrich({ set: { 'a..b': 1 } })).toThrow('enrich.set.a..b: invalid path segment ""');
		expect(Object.hasOwn(Object.prototype, 'x')).toBe(false);
	});

	it('carries a __proto__ field through as data', () => {
		const mw = enrich({ set: { service: 'api' }, copy: { copied: 'fields.user' } });
		const result = mw(createTestEvent({ fields: JSON.parse('{"__proto__": {"injected": 1}, "user": "ann"}') }));

		expect(Object.keys(result?.fields ?? {})).toEqual(['__proto__', 'user', 'service', 'copied']);
		expect(Object.getOwnPropertyDescriptor(result?.fields, '__proto__')?.value).toEqual({ injected: 1 });
		expect('injected' in {}).toBe(false);
	});
});

describe('config', () => {
	it('parses every operation', () => {
		expect(
			parseEnrichConfig({ set: { a: 1 }, copy: { b: 'level' }, compute: { c: 'level_number > 1' }, tags: ['x'] }),
		).toEqual({ set: { a: 1 }, copy: { b: 'level' }, compute: { c: 'level_number > 1' }, tags: ['x'] });
	});

	it('names the offending setting', () => {
		expect(() => parseEnrichConfig({ set: ['a'] })).toThrow('enrich.set: must be object');
		expect(() => parseEnrichConfig({ copy: { b: 3 } })).toThrow('enrich.copy.b: must be string');
		expect(() => parseEnrichConfig({ tags: 'x' })).toThrow('enrich.tags: must be array');
	});

	it('registers the enrich middleware', () => {
		const registration = register();
		expect(registration.id).toBe('enrich');
		expect(registration.create({ tags: ['t'] })(createTestEvent())?.tags).toEqual(['t']);
	});
});
