/**
 * Async dispatch — a bounded queue in front of a sink.
 *
 * Events queue on the caller's path and go to the wrapped sink in batches on
 * a worker pool. When the queue is full the caller pays instead: the queue
 * is written through synchronously and an `async.backpressure` warning is
 * raised, which bounds memory at the cost of a latency spike.
 */

import type { Diagnostics, LogEvent, Sink } from '@logrelay/sdk';
import { ConfigurationError, describeCause, diagnostics as defaultDiagnostics } from '@logrelay/sdk';
import { type WorkerPool, sharedWorkerPool } from './worker-pool.js';

export const DEFAULT_ASYNC_FLUSH_THRESHOLD = 100;
export const DEFAULT_MAX_QUEUE_SIZE = 10_000;

export interface AsyncSinkOptions {
	/** Queued events that trigger a batch hand-off (default 100) */
	flush_threshold?: number;
	/** Queue depth that triggers the synchronous fallback (default 10000) */
	max_queue_size?: number;
	/** Pool running the batches (default: a shared pool of one worker) */
	pool?: WorkerPool;
	diagnostics?: Diagnostics;
}

export class AsyncSink implements Sink {
	readonly id: string;
	readonly flushThreshold: number;
	readonly maxQueueSize: number;
	private readonly inner: Sink;
	private readonly pool: WorkerPool;
	private readonly diagnostics: Diagnostics;
	private queue: LogEvent[] = [];
	private dispatched = 0;
	private fallbacks = 0;

	constructor(inner: Sink, options?: AsyncSinkOptions) {
		this.inner = inner;
		this.id = `async:${inner.id}`;
		this.flushThreshold = positiveInteger(
			options?.flush_threshold ?? DEFAULT_ASYNC_FLUSH_THRESHOLD,
			'async.flush_threshold',
		);
		this.maxQueueSize = positiveInteger(
			options?.max_queue_size ?? DEFAULT_MAX_QUEUE_SIZE,
			'async.max_queue_size',
		);
		this.pool = options?.pool ?? sharedWorkerPool();
		this.diagnostics = options?.diagnostics ?? defaultDiagnostics;
	}

	/** Current queue depth */
	get depth(): number {
		return this.queue.length;
	}

	/** Batches handed to the pool so far */
	get batchesDispatched(): number {
		return this.dispatched;
	}

	/** Times the synchronous fallback ran */
	get backpressureCount(): number {
		return this.fallbacks;
	}

	/** The wrapped sink */
	get wrapped(): Sink {
		return this.inner;
	}

	write(event: LogEvent): void {
		if (this.queue.length >= this.maxQueueSize) {
			this.fallbacks++;
			this.diagnostics.warn(
				'async.backpressure',
				`queue full (${this.queue.length}/${this.maxQueueSize}), writing synchronously`,
				{ source: this.inner.id },
			);
			this.writeThrough(this.takeQueue());
		}

		this.queue.push(event);
		if (this.queue.length >= this.flushThreshold) {
			this.dispatch(this.takeQueue());
		}
	}

	/**
	 * Hand whatever is queued to the pool, wait for the pool, then flush the
	 * wrapped sink.
	 */
	async flush(): Promise<void> {
		if (this.queue.length > 0) {
			this.dispatch(this.takeQueue());
		}
		await this.pool.drain();
		await this.inner.flush?.();
	}

	bufferSize(): number {
		return this.queue.length;
	}

	/** Drain the queue, then flush and close the wrapped sink */
	async close(): Promise<void> {
		await this.flush();
		await this.inner.close?.();
	}

	private takeQueue(): LogEvent[] {
		const batch = this.queue;
		this.queue = [];
		return batch;
	}

	private dispatch(batch: LogEvent[]): void {
		this.dispatched++;
		this.pool.submit(() => this.writeBatch(batch), this.inner.id);
	}

	/** Worker side: write a batch in order, isolating each event */
	private async writeBatch(batch: readonly LogEvent[]): Promise<void> {
		for (const event of batch) {
			try {
				await this.inner.write(event);
			} catch (err) {
				this.reportFailure(err);
			}
		}
	}

	/** Caller side: write a batch synchronously */
	private writeThrough(batch: readonly LogEvent[]): void {
		for (const event of batch) {
			try {
				const result = this.inner.write(event);
				if (result instanceof Promise) {
					void result.catch((err: unknown) => this.reportFailure(err));
				}
			} catch (err) {
				this.reportFailure(err);
			}
		}
	}

	private reportFailure(err: unknown): void {
		this.diagnostics.warn('async.batch_failed', `write to ${this.inner.id} failed: ${describeCause(err)}`, {
			source: this.inner.id,
			error: err instanceof Error ? err : undefined,
		});
	}
}

function positiveInteger(value: number, path: string): number {
	if (!Number.isInteger(value) || value < 1) {
		throw new ConfigurationError(`must be a positive integer, got ${value}`, { path });
	}
	return value;
}
