import { Logger, toJson, toRow, toText } from '@logrelay/core';
import { ConfigurationError, captureDiagnostics, createTestEvent } from '@logrelay/sdk';
import { afterEach, describe, expect, it, vi } from 'vitest';
import type { WebhookFetch } from '../http.js';
import { buildWebhookBackend, register } from '../index.js';
import { parseWebhookConfig, WebhookSink } from '../webhook-sink.js';

// ─── Helpers ──────────────────────────────────────────────────────────────────

function respondWith(status: number, statusText = 'OK') {
	return vi.fn<WebhookFetch>(async () => ({ ok: status >= 200 && status < 300, status, statusText }));
}

function requestOf(fetchMock: ReturnType<typeof respondWith>, call = 0) {
	const [url, init] = fetchMock.mock.calls[call];
	return { url, ...init };
}

const sinks: WebhookSink[] = [];

function createSink(options: ConstructorParameters<typeof WebhookSink>[1], formatter = toJson()) {
	const sink = new WebhookSink(formatter, options);
	sinks.push(sink);
	return sink;
}

afterEach(async () => {
	await Promise.all(sinks.splice(0).map((sink) => sink.close()));
	vi.unstubAllEnvs();
});

// ─── WebhookSink ──────────────────────────────────────────────────────────────

describe('WebhookSink', () => {
	it('POSTs JSON records unchanged', async () => {
		const fetchMock = respondWith(200);
		const sink = createSink({ url: 'https://hooks.example.com/logs', fetch: fetchMock });
		const event = createTestEvent({ fields: { user: 'ada' } });

		await sink.write(event);

		const request = requestOf(fetchMock);
		expect(request.url).toBe('https://hooks.example.com/logs');
		expect(request.method).toBe('POST');
		expect(request.headers['Content-Type']).toBe('application/json');
		expect(JSON.parse(request.body)).toEqual(event);
		expect(sink.deliveredCount).toBe(1);
	});

	it('wraps non-JSON lines in a record field', async () => {
		const fetchMock = respondWith(200);
		const sink = createSink({ url: 'https://hooks.example.com/logs', fetch: fetchMock }, toText());

		await sink.write(createTestEvent());

		expect(JSON.parse(requestOf(fetchMock).body)).toEqual({
			record: '2026-01-01T00:00:00.000Z [MESSAGE:60] test message',
		});
	});

	it('uses the host as part of its id', () => {
		const sink = createSink({ url: 'https://hooks.example.com:8443/x', fetch: respondWith(200) });
		expect(sink.id).toBe('webhook:hooks.example.com:8443');
	});

	it('rejects on non-2xx responses', async () => {
		const sink = createSink({ url: 'https://hooks.example.com', fetch: respondWith(500, 'Server Error') });
		await expect(sink.write(createTestEvent())).rejects.toThrow('Webhook error: 500 Server Error');

		const rejected = createSink({ url: 'https://hooks.example.com', fetch: respondWith(403, 'Forbidden') });
		await expect(rejected.write(createTestEvent())).rejects.toThrow('Webhook rejected: 403 Forbidden');

		const limited = createSink({ url: 'https://hooks.example.com', fetch: respondWith(429) });
		await expect(limited.write(createTestEvent())).rejects.toThrow('Webhook rate limited (429)');
	});

	it('adds bearer auth resolved from the environment', async () => {
		vi.stubEnv('HOOK_TOKEN', 'test-secret');
		const fetchMock = respondWith(200);
		const sink = createSink({
			url: 'https://hooks.example.com',
			auth: { type: 'bearer', token: '${HOOK_TOKEN}' },
			fetch: fetchMock,
		});

		await sink.write(createTestEvent());

		expect(requestOf(fetchMock).headers.Authorization).toBe('Bearer test-secret');
	});

	it('adds basic auth', async () => {
		const fetchMock = respondWith(200);
		const sink = createSink({
			url: 'https://hooks.example.com',
			auth: { type: 'basic', username: 'svc', password: 'test-secret' },
			fetch: fetchMock,
		});

		await sink.write(createTestEvent());

		const expected = Buffer.from('svc:test-secret').toString('base64');
		expect(requestOf(fetchMock).headers.Authorization).toBe(`Basic ${expected}`);
	});

	it('fails construction when an env var is missing', () => {
		expect(
			() =>
				new WebhookSink(toJson(), {
					url: 'https://hooks.example.com',
					auth: { type: 'bearer', token: '${LOGRELAY_TEST_UNSET_TOKEN}' },
				}),
		).toThrow('Environment variable LOGRELAY_TEST_UNSET_TOKEN is not set');
	});

	it('refuses row formatters', () => {
		expect(() => new WebhookSink(toRow(), { url: 'https://hooks.example.com' })).toThrow(
			ConfigurationError,
		);
	});

	it('flush() waits for requests in flight', async () => {
		let release: () => void = () => {};
		const fetchMock = vi.fn<WebhookFetch>(
			() =>
				new Promise((resolve) => {
					release = () => resolve({ ok: true, status: 200, statusText: 'OK' });
				}),
		);
		const sink = createSink({ url: 'https://hooks.example.com', fetch: fetchMock });

		const write = sink.write(createTestEvent());
		expect(sink.pending).toBe(1);
		const flushed = sink.flush();
		release();
		await flushed;
		await write;
		expect(sink.pending).toBe(0);
		expect(sink.deliveredCount).toBe(1);
	});
});

// ─── Through a logger ─────────────────────────────────────────────────────────

describe('webhook sink in a logger', () => {
	it('reports failed requests as sink failures', async () => {
		const { diagnostics, records } = captureDiagnostics();
		const sink = createSink({ url: 'https://hooks.example.com', fetch: respondWith(503, 'Unavailable') });
		const logger = new Logger({ diagnostics }).withSinks({ hook: sink });

		expect(logger.log(createTestEvent())).not.toBeNull();

		await vi.waitFor(() => expect(records).toHaveLength(1));
		expect(records[0].code).toBe('sink.failed');
		expect(records[0].message).toBe('Sink #0 "hook" failed: Webhook error: 503 Unavailable');
	});
});

// ─── Config ───────────────────────────────────────────────────────────────────

describe('config parsing', () => {
	it('reads url, method, headers, auth and timeout', () => {
		expect(
			parseWebhookConfig({
				kind: 'webhook',
				url: 'https://hooks.example.com',
				method: 'PUT',
				headers: { 'X-Source': 'api' },
				auth: { type: 'bearer', token: 'test-secret' },
				timeout: '5s',
			}),
		).toEqual({
			url: 'https://hooks.example.com',
			method: 'PUT',
			headers: { 'X-Source': 'api' },
			auth: { type: 'bearer', token: 'test-secret', username: undefined, password: undefined },
			timeout: '5s',
		});
	});

	it('names the offending setting', () => {
		expect(() => parseWebhookConfig({ kind: 'webhook' })).toThrow('webhook.url: is required');
		expect(() => parseWebhookConfig({ kind: 'webhook', url: 'https://x', method: 'GET' })).toThrow(
			'webhook.method: must be one of POST, PUT',
		);
		expect(() =>
			parseWebhookConfig({ kind: 'webhook', url: 'https://x', auth: { type: 'digest' } }),
		).toThrow('webhook.auth.type: must be one of bearer, basic');
		expect(() => parseWebhookConfig({ kind: 'webhook', url: 'https://x', header: {} })).toThrow(
			'webhook: unknown key "header"',
		);
	});

	it('rejects a bad timeout', () => {
		expect(() => new WebhookSink(toJson(), { url: 'https://x', timeout: 'soon' })).toThrow(
			'webhook.timeout: invalid timeout "soon"',
		);
	});

	it('registers the webhook kind', () => {
		const registration = register();
		expect(registration.kind).toBe('webhook');
		expect(registration.build).toBe(buildWebhookBackend);
	});
});
