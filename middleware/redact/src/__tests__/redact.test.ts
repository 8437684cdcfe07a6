import { ConfigurationError, createTestEvent } from '@logrelay/sdk';
import { describe, expect, it } from 'vitest';
import { parseRedactConfig, register } from '../index.js';
import { redact, redactPii } from '../redact.js';

describe('redact', () => {
	// ─── Patterns ───────────────────────────────────────────────────────────────

	describe('patterns', () => {
		it('replaces matches in the message', () => {
			const mw = redact({ patterns: [/token=\w+/] });
			const result = mw(createTestEvent({ message: 'login token=abc123 ok' }));
			expect(result?.message).toBe('login [REDACTED] ok');
		});

		it('replaces every match, not just the first', () => {
			const mw = redact({ patterns: ['\\d+'], replacement: '#' });
			expect(mw(createTestEvent({ message: 'a1 b22 c333' }))?.message).toBe('a# b# c#');
		});

		it('scrubs string fields at any depth', () => {
			const mw = redact({ patterns: [{ pattern: 'secret-\\w+', replacement: '***' }] });
			const result = mw(
				createTestEvent({
					fields: { note: 'uses secret-abc', nested: { list: ['secret-x', 3] }, count: 2 },
				}),
			);
			expect(result?.fields).toEqual({
				note: 'uses ***',
				nested: { list: ['***', 3] },
				count: 2,
			});
		});

		it('returns the same event when nothing matches', () => {
			const mw = redact({ patterns: [/nope/] });
			const event = createTestEvent();
			expect(mw(event)).toBe(event);
		});

		it('rejects invalid regular expressions', () => {
			expect(() => redact({ patterns: ['('] })).toThrow(ConfigurationError);
			expect(() => redact({ patterns: ['ok', '('] })).toThrow(/^redact\.patterns\[1\]: invalid pattern \(/);
		});

		it('requires a pattern or a field', () => {
			expect(() => redact({})).toThrow('redact: needs at least one pattern or field');
		});
	});

	// ─── Fields ─────────────────────────────────────────────────────────────────

	describe('fields', () => {
		it('replaces named fields wholesale, nested too', () => {
			const mw = redact({ fields: ['password'] });
			const result = mw(
				createTestEvent({ fields: { user: 'ada', password: 'test-secret', db: { password: 42 } } }),
			);
			expect(result?.fields).toEqual({
				user: 'ada',
				password: '[REDACTED]',
				db: { password: '[REDACTED]' },
			});
		});

		it('leaves the input event untouched', () => {
			const event = createTestEvent({ fields: { password: 'test-secret' } });
			redact({ fields: ['password'] })(event);
			expect(event.fields.password).toBe('test-secret');
		});

		it('scrubs inside a field named __proto__', () => {
			const mw = redact({ fields: ['password'] });
			const result = mw(createTestEvent({ fields: JSON.parse('{"__proto__": {"password": "test-secret"}}') }));
			expect(JSON.stringify(result?.fields)).toBe('{"__proto__":{"password":"[REDACTED]"}}');
			expect('password' in {}).toBe(false);
		});
	});

	// ─── PII presets ────────────────────────────────────────────────────────────

	describe('redactPii', () => {
		it('masks cards, SSNs and emails', () => {
			const mw = redactPii();
			expect(mw(createTestEvent({ message: 'card 4532-1234-5678-9010' }))?.message).toBe(
				'card ****-****-****-9010',
			);
			expect(mw(createTestEvent({ message: 'ssn 123-45-6789' }))?.message).toBe('ssn ***-**-****');
			expect(mw(createTestEvent({ message: 'from user.name@example.com' }))?.message).toBe(
				'from ***@example.com',
			);
		});

		it('masks IPv4 addresses only when asked', () => {
			const message = 'client 10.0.0.12';
			expect(redactPii()(createTestEvent({ message }))?.message).toBe(message);
			expect(redactPii({ ips: true })(createTestEvent({ message }))?.message).toBe(
				'client ***.***.***.***',
			);
		});
	});
});

describe('config', () => {
	it('builds from presets, patterns and fields', () => {
		const mw = register().create({ presets: ['email'], patterns: ['id-\\d+'], fields: ['token'] });
		const result = mw(
			createTestEvent({ message: 'ada@example.com id-7', fields: { token: 'test-secret' } }),
		);
		expect(result?.message).toBe('***@example.com [REDACTED]');
		expect(result?.fields).toEqual({ token: '[REDACTED]' });
	});

	it('rejects unknown presets with the list of known ones', () => {
		expect(() => parseRedactConfig({ presets: ['phone'] })).toThrow(
			'redact.presets[0]: must be one of credit_card, ssn, email, ipv4',
		);
	});

	it('rejects non-string lists', () => {
		expect(() => parseRedactConfig({ fields: 'password' })).toThrow(
			'redact.fields: must be array',
		);
		expect(() => parseRedactConfig({ feilds: ['password'] })).toThrow('redact: unknown key "feilds"');
	});
});
