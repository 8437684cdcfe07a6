/**
 * @logrelay/backend-webhook — registration entry point.
 */

import type { BackendConfig, BackendRegistration, Formatter } from '@logrelay/sdk';
import { parseWebhookConfig, WEBHOOK_CONFIG_SCHEMA, WebhookSink } from './webhook-sink.js';

/** Build a webhook sink from a backend config block */
export function buildWebhookBackend(formatter: Formatter, config: BackendConfig): WebhookSink {
	return new WebhookSink(formatter, parseWebhookConfig(config));
}

export function register(): BackendRegistration {
	return {
		kind: 'webhook',
		build: buildWebhookBackend,
		configSchema: WEBHOOK_CONFIG_SCHEMA,
	};
}

export { createHttpAgent, type HttpAgentOptions, type WebhookFetch } from './http.js';
export {
	parseWebhookConfig,
	resolveEnvVar,
	WEBHOOK_CONFIG_SCHEMA,
	type WebhookAuth,
	WebhookSink,
	type WebhookSinkOptions,
} from './webhook-sink.js';
