/**
 * Administration surface — inspect, flush and drain a logger's sinks.
 *
 * Sinks are selected by name or by 0-based index. Selection errors throw
 * SinkSelectionError; flush and close failures become warnings.
 */

import type { LevelRange, Sink } from '@logrelay/sdk';
import { describeCause, SinkSelectionError } from '@logrelay/sdk';
import type { Logger, SinkEntry } from './logger.js';

/** A sink name, a 0-based index, or a list of either */
export type SinkSelector = string | number | readonly (string | number)[];

export interface SinkInfo {
	index: number;
	name: string;
	label: string;
	limits: LevelRange;
	middleware: number;
	/** Buffered record count, or null when the sink does not buffer */
	buffered: number | null;
	flushable: boolean;
}

// ─── Selection ────────────────────────────────────────────────────────────────

function selectEntry(logger: Logger, selector: string | number): SinkEntry {
	const sinks = logger.sinks;
	if (typeof selector === 'number') {
		if (!Number.isInteger(selector) || selector < 0 || selector >= sinks.length) {
			throw new SinkSelectionError(
				`sink index ${selector} is out of range (logger has ${sinks.length} sink(s))`,
			);
		}
		return sinks[selector];
	}
	const entry = sinks.find((s) => s.name === selector);
	if (!entry) {
		const names = sinks.map((s) => s.name);
		throw new SinkSelectionError(
			`no sink named "${selector}". Available: ${names.length > 0 ? names.join(', ') : '(none)'}`,
		);
	}
	return entry;
}

function selectEntries(logger: Logger, selector?: SinkSelector): SinkEntry[] {
	if (selector === undefined) return [...logger.sinks];
	const list = typeof selector === 'string' || typeof selector === 'number' ? [selector] : selector;
	return list.map((s) => selectEntry(logger, s));
}

function bufferSizeOf(sink: Sink): number | null {
	return sink.bufferSize?.() ?? null;
}

// ─── Inspection ───────────────────────────────────────────────────────────────

/** Describe every sink, in invocation order */
export function listSinks(logger: Logger): SinkInfo[] {
	return logger.sinks.map((entry, index) => ({
		index,
		name: entry.name,
		label: entry.label,
		limits: entry.sink.limits,
		middleware: entry.sink.middleware.length,
		buffered: bufferSizeOf(entry.sink.sink),
		flushable: typeof entry.sink.sink.flush === 'function',
	}));
}

/** The underlying sink for a name or 0-based index */
export function getSink(logger: Logger, selector: string | number): Sink {
	return selectEntry(logger, selector).sink.sink;
}

/** Buffered record count per sink name (null for sinks that do not buffer) */
export function bufferStatus(logger: Logger): Record<string, number | null> {
	return Object.fromEntries(logger.sinks.map((entry) => [entry.name, bufferSizeOf(entry.sink.sink)]));
}

// ─── Flush & drain ────────────────────────────────────────────────────────────

async function settle(
	logger: Logger,
	entry: SinkEntry,
	action: () => void | Promise<void>,
	code: 'sink.flush_failed' | 'sink.close_failed',
): Promise<void> {
	try {
		await action();
	} catch (err) {
		logger.diagnostics.warn(code, `${entry.name}: ${describeCause(err)}`, {
			source: entry.name,
			error: err instanceof Error ? err : undefined,
		});
	}
}

/**
 * Flush all flushable sinks, or the selected ones.
 * Throws SinkSelectionError synchronously for a bad selector.
 */
export function flush(logger: Logger, selector?: SinkSelector): Promise<void> {
	const entries = selectEntries(logger, selector);
	return Promise.all(
		entries.map((entry) => {
			const sink = entry.sink.sink;
			if (!sink.flush) return Promise.resolve();
			return settle(logger, entry, () => sink.flush?.(), 'sink.flush_failed');
		}),
	).then(() => undefined);
}

/**
 * Flush and close every sink, awaiting async ones. Sinks without close()
 * are flushed.
 */
export async function drainAll(logger: Logger): Promise<void> {
	for (const entry of logger.sinks) {
		const sink = entry.sink.sink;
		if (sink.close) {
			await settle(logger, entry, () => sink.close?.(), 'sink.close_failed');
		} else if (sink.flush) {
			await settle(logger, entry, () => sink.flush?.(), 'sink.flush_failed');
		}
	}
}

/** Process-like target for exit hooks */
export interface ExitTarget {
	on(event: string, listener: (...args: unknown[]) => void): unknown;
	off(event: string, listener: (...args: unknown[]) => void): unknown;
}

export interface DrainOnExitOptions {
	/** Signals that trigger a drain and exit (default SIGINT, SIGTERM) */
	signals?: readonly NodeJS.Signals[];
	/** Defaults to the current process */
	target?: ExitTarget;
	/** Called after a signal-triggered drain (default process.exit) */
	exit?: (code: number) => void;
}

const SIGNAL_EXIT_CODES: Partial<Record<NodeJS.Signals, number>> = {
	SIGHUP: 129,
	SIGINT: 130,
	SIGTERM: 143,
};

/**
 * Drain the logger when the process is about to exit. Returns a function
 * that removes the hooks again.
 */
export function drainOnExit(logger: Logger, options?: DrainOnExitOptions): () => void {
	const target = options?.target ?? process;
	const exit = options?.exit ?? ((code: number) => process.exit(code));
	const signals = options?.signals ?? ['SIGINT', 'SIGTERM'];
	let drained = false;

	const onBeforeExit = (): void => {
		if (drained) return;
		drained = true;
		void drainAll(logger);
	};

	const signalHandlers = signals.map((signal) => {
		const handler = (): void => {
			void drainAll(logger).then(() => exit(SIGNAL_EXIT_CODES[signal] ?? 1));
		};
		target.on(signal, handler);
		return { signal, handler };
	});
	target.on('beforeExit', onBeforeExit);

	return () => {
		target.off('beforeExit', onBeforeExit);
		for (const { signal, handler } of signalHandlers) {
			target.off(signal, handler);
		}
	};
}
