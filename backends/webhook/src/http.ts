/**
 * HTTP connection management for the webhook backend.
 *
 * Keep-alive connection pooling via an undici Agent. Each webhook sink owns
 * its agent and closes it in close().
 */

import { Agent, type Dispatcher, fetch } from 'undici';

/** Options for creating an HTTP agent with connection pooling */
export interface HttpAgentOptions {
	/** Max connections per origin (default: 10) */
	connections?: number;
	/** Keep-alive timeout in milliseconds (default: 30000) */
	keepAliveTimeout?: number;
	/** Max keep-alive timeout in milliseconds (default: 60000) */
	keepAliveMaxTimeout?: number;
}

const DEFAULTS: Required<HttpAgentOptions> = {
	connections: 10,
	keepAliveTimeout: 30_000,
	keepAliveMaxTimeout: 60_000,
};

export function createHttpAgent(options?: HttpAgentOptions): Dispatcher {
	const opts = { ...DEFAULTS, ...options };
	return new Agent({
		keepAliveTimeout: opts.keepAliveTimeout,
		keepAliveMaxTimeout: opts.keepAliveMaxTimeout,
		pipelining: 1,
		connections: opts.connections,
	});
}

/** The part of a fetch request the webhook sink sends */
export interface WebhookRequest {
	method: 'POST' | 'PUT';
	headers: Record<string, string>;
	body: string;
	dispatcher?: Dispatcher;
	signal?: AbortSignal;
}

/** The part of a fetch response the webhook sink reads */
export interface WebhookResponse {
	ok: boolean;
	status: number;
	statusText: string;
}

export type WebhookFetch = (url: string, init: WebhookRequest) => Promise<WebhookResponse>;

/** undici's fetch, which honours the per-request dispatcher */
export const defaultFetch: WebhookFetch = (url, init) => fetch(url, init);
