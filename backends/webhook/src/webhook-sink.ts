/**
 * Webhook sink — POSTs each formatted record to a configured URL.
 *
 * JSON formatter output is sent as the request body unchanged; any other
 * line is wrapped as `{"record": "<line>"}`. A non-2xx response rejects the
 * write, which the logger reports as a sink failure.
 */

import type { BackendConfig, ConfigSchema, Formatter, LogEvent, Sink } from '@logrelay/sdk';
import { backendSettings, ConfigurationError, checkConfig, parseDuration } from '@logrelay/sdk';
import type { Dispatcher } from 'undici';
import { createHttpAgent, defaultFetch, type WebhookFetch } from './http.js';

export const DEFAULT_TIMEOUT = '10s';

export interface WebhookAuth {
	type: 'basic' | 'bearer';
	token?: string;
	username?: string;
	password?: string;
}

export interface WebhookSinkOptions {
	url: string;
	method?: 'POST' | 'PUT';
	headers?: Record<string, string>;
	auth?: WebhookAuth;
	/** Per-request timeout, e.g. "5s" */
	timeout?: string;
	/** Replaces the undici fetch (tests) */
	fetch?: WebhookFetch;
	/** Supply a dispatcher instead of the sink's own keep-alive agent */
	agent?: Dispatcher;
}

/** Resolve a `${VAR}` reference from the environment */
export function resolveEnvVar(value: string): string {
	const match = value.match(/^\$\{(.+)\}$/);
	if (match) {
		const envValue = process.env[match[1]];
		if (!envValue) {
			throw new ConfigurationError(`Environment variable ${match[1]} is not set`);
		}
		return envValue;
	}
	return value;
}

function authHeader(auth: WebhookAuth): string {
	if (auth.type === 'bearer') {
		if (!auth.token) {
			throw new ConfigurationError('bearer auth needs a token', { path: 'webhook.auth.token' });
		}
		return `Bearer ${resolveEnvVar(auth.token)}`;
	}
	if (!auth.username || !auth.password) {
		throw new ConfigurationError('basic auth needs a username and password', {
			path: 'webhook.auth',
		});
	}
	const credentials = Buffer.from(
		`${resolveEnvVar(auth.username)}:${resolveEnvVar(auth.password)}`,
	).toString('base64');
	return `Basic ${credentials}`;
}

export class WebhookSink implements Sink {
	readonly id: string;
	readonly url: string;
	readonly timeoutMs: number;
	private readonly formatter: Formatter;
	private readonly method: 'POST' | 'PUT';
	private readonly headers: Record<string, string>;
	private readonly fetch: WebhookFetch;
	private readonly agent: Dispatcher;
	private readonly ownsAgent: boolean;
	private readonly inFlight = new Set<Promise<void>>();
	private delivered = 0;

	constructor(formatter: Formatter, options: WebhookSinkOptions) {
		if (formatter.kind !== 'line') {
			throw new ConfigurationError(
				`formatter "${formatter.name}" produces rows; the webhook backend needs a line formatter`,
				{ path: 'webhook' },
			);
		}
		let parsed: URL;
		try {
			parsed = new URL(resolveEnvVar(options.url));
		} catch (err) {
			if (err instanceof ConfigurationError) throw err;
			throw new ConfigurationError(`invalid URL "${options.url}"`, { path: 'webhook.url', cause: err });
		}
		try {
			this.timeoutMs = parseDuration(options.timeout ?? DEFAULT_TIMEOUT);
		} catch (err) {
			throw new ConfigurationError(`invalid timeout "${options.timeout}"`, {
				path: 'webhook.timeout',
				cause: err,
			});
		}

		this.url = parsed.href;
		this.id = `webhook:${parsed.host}`;
		this.formatter = formatter;
		this.method = options.method ?? 'POST';
		this.headers = {
			'Content-Type': 'application/json',
			...options.headers,
		};
		if (options.auth) {
			this.headers.Authorization = authHeader(options.auth);
		}
		this.fetch = options.fetch ?? defaultFetch;
		this.ownsAgent = options.agent === undefined;
		this.agent = options.agent ?? createHttpAgent();
	}

	/** Requests sent and answered with a 2xx status */
	get deliveredCount(): number {
		return this.delivered;
	}

	/** Requests still waiting for a response */
	get pending(): number {
		return this.inFlight.size;
	}

	write(event: LogEvent): Promise<void> {
		const request = this.send(this.body(event));
		this.inFlight.add(request);
		const settle = () => {
			this.inFlight.delete(request);
		};
		request.then(settle, settle);
		return request;
	}

	/** Wait for every request in flight to settle */
	async flush(): Promise<void> {
		await Promise.allSettled([...this.inFlight]);
	}

	bufferSize(): null {
		return null;
	}

	async close(): Promise<void> {
		await this.flush();
		if (this.ownsAgent) {
			await this.agent.close();
		}
	}

	private body(event: LogEvent): string {
		const record = this.formatter.format(event);
		const line = typeof record === 'string' ? record : JSON.stringify(record);
		return this.formatter.name === 'json' ? line : JSON.stringify({ record: line });
	}

	private async send(body: string): Promise<void> {
		const response = await this.fetch(this.url, {
			method: this.method,
			headers: this.headers,
			body,
			dispatcher: this.agent,
			signal: AbortSignal.timeout(this.timeoutMs),
		});

		if (response.status === 429) {
			throw new Error('Webhook rate limited (429)');
		}
		if (response.status >= 400 && response.status < 500) {
			throw new Error(`Webhook rejected: ${response.status} ${response.statusText}`);
		}
		if (!response.ok) {
			throw new Error(`Webhook error: ${response.status} ${response.statusText}`);
		}
		this.delivered++;
	}
}

// ─── Config parsing ───────────────────────────────────────────────────────────

export const WEBHOOK_CONFIG_SCHEMA: ConfigSchema = {
	type: 'object',
	required: ['url'],
	properties: {
		url: {
			type: 'string',
			minLength: 1,
			description: 'Endpoint receiving one request per record. Supports ${ENV_VAR}.',
		},
		method: {
			type: 'string',
			enum: ['POST', 'PUT'],
			default: 'POST',
		},
		headers: {
			type: 'object',
			additionalProperties: { type: 'string' },
		},
		auth: {
			type: 'object',
			required: ['type'],
			properties: {
				type: { type: 'string', enum: ['bearer', 'basic'] },
				token: { type: 'string' },
				username: { type: 'string' },
				password: { type: 'string' },
			},
			additionalProperties: false,
		},
		timeout: {
			type: 'string',
			description: 'Per-request timeout, e.g. "5s".',
			default: DEFAULT_TIMEOUT,
		},
	},
	additionalProperties: false,
};

type WebhookConfig = Pick<WebhookSinkOptions, 'url' | 'method' | 'headers' | 'auth' | 'timeout'>;

/** Validate a backend config block into WebhookSinkOptions */
export function parseWebhookConfig(config: BackendConfig): WebhookSinkOptions {
	const settings = checkConfig<WebhookConfig>(WEBHOOK_CONFIG_SCHEMA, backendSettings(config), 'webhook');
	const headers = settings.headers
		? Object.fromEntries(
				Object.entries(settings.headers).map(([name, value]) => [name, resolveEnvVar(value)]),
			)
		: undefined;
	return { ...settings, headers };
}
