/**
 * Test harness for logrelay plugin authors.
 *
 * Provides capturing and failing sinks, an event factory and a diagnostics
 * recorder for testing sinks, backends and middleware in isolation.
 */

import { type Diagnostic, type DiagnosticCode, Diagnostics } from './diagnostics.js';
import { type BuildEventOptions, buildEvent } from './event.js';
import type { Middleware } from './middleware.js';
import type { Sink } from './sink.js';
import type { LogEvent } from './types.js';

// ─── Capture Sink ─────────────────────────────────────────────────────────────

/**
 * Sink that records every event it receives.
 */
export class CaptureSink implements Sink {
	readonly id: string;
	readonly events: LogEvent[] = [];
	flushCount = 0;
	closed = false;

	constructor(id = 'capture') {
		this.id = id;
	}

	write(event: LogEvent): void {
		this.events.push(event);
	}

	flush(): void {
		this.flushCount++;
	}

	close(): void {
		this.closed = true;
	}

	/** Messages received, in order */
	get messages(): string[] {
		return this.events.map((e) => e.message);
	}

	/** Level numbers received, in order */
	get levelNumbers(): number[] {
		return this.events.map((e) => e.level_number);
	}

	clear(): void {
		this.events.length = 0;
	}
}

// ─── Failing Sink ─────────────────────────────────────────────────────────────

/**
 * Sink that fails on every write, either by throwing or by rejecting.
 */
export class FailingSink implements Sink {
	readonly id: string;
	private readonly mode: 'throw' | 'reject';
	private readonly message: string;
	attempts = 0;

	constructor(options?: { id?: string; mode?: 'throw' | 'reject'; message?: string }) {
		this.id = options?.id ?? 'failing';
		this.mode = options?.mode ?? 'throw';
		this.message = options?.message ?? 'sink exploded';
	}

	write(_event: LogEvent): void | Promise<void> {
		this.attempts++;
		if (this.mode === 'reject') {
			return Promise.reject(new Error(this.message));
		}
		throw new Error(this.message);
	}
}

// ─── Mock Middleware ──────────────────────────────────────────────────────────

/**
 * Middleware that records what it sees and can be told to drop.
 */
export function recordingMiddleware(options?: {
	drop?: boolean;
	modify?: (event: LogEvent) => LogEvent;
}): Middleware & { seen: LogEvent[] } {
	const seen: LogEvent[] = [];
	const middleware: Middleware = (event) => {
		seen.push(event);
		if (options?.drop) return null;
		return options?.modify ? options.modify(event) : event;
	};
	return Object.assign(middleware, { seen });
}

// ─── Diagnostics Recorder ─────────────────────────────────────────────────────

export interface CapturedDiagnostics {
	diagnostics: Diagnostics;
	records: Diagnostic[];
	/** Diagnostic codes in the order they were reported */
	codes(): DiagnosticCode[];
	/** Lines written to the stderr fallback */
	fallbackLines: string[];
}

/**
 * Create an isolated Diagnostics instance that records everything reported.
 * Pass `listen: false` to exercise the stderr fallback instead.
 */
export function captureDiagnostics(options?: { listen?: boolean }): CapturedDiagnostics {
	const fallbackLines: string[] = [];
	const diagnostics = new Diagnostics({
		fallback: {
			write: (chunk: string) => fallbackLines.push(chunk),
		},
	});
	const records: Diagnostic[] = [];
	if (options?.listen !== false) {
		diagnostics.onDiagnostic((d) => records.push(d));
	}
	return {
		diagnostics,
		records,
		codes: () => records.map((r) => r.code),
		fallbackLines,
	};
}

// ─── Test Event Factory ───────────────────────────────────────────────────────

/**
 * Create a test event with sensible defaults.
 */
export function createTestEvent(overrides?: Partial<BuildEventOptions>): LogEvent {
	return buildEvent({
		level: 'MESSAGE',
		level_number: 60,
		message: 'test message',
		timestamp: '2026-01-01T00:00:00.000Z',
		...overrides,
	});
}
