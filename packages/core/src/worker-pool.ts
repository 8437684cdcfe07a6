/**
 * Bounded-concurrency job runner for async sinks.
 *
 * Jobs run off the caller's path (scheduled with setImmediate) in FIFO
 * order, at most `size` at a time. A failing job becomes an
 * `async.batch_failed` warning; the pool keeps going.
 */

import type { Diagnostics } from '@logrelay/sdk';
import { ConfigurationError, diagnostics as defaultDiagnostics } from '@logrelay/sdk';

export type Job = () => void | Promise<void>;

interface QueuedJob {
	label: string;
	run: Job;
}

export interface WorkerPoolOptions {
	/** Maximum number of jobs running at once (default 1) */
	size?: number;
	diagnostics?: Diagnostics;
}

export class WorkerPool {
	readonly size: number;
	private readonly queue: QueuedJob[] = [];
	private readonly diagnostics: Diagnostics;
	private active = 0;
	private scheduled = false;
	private idleWaiters: Array<() => void> = [];
	private completed = 0;

	constructor(options?: WorkerPoolOptions) {
		const size = options?.size ?? 1;
		if (!Number.isInteger(size) || size < 1) {
			throw new ConfigurationError(`must be a positive integer, got ${size}`, { path: 'workers' });
		}
		this.size = size;
		this.diagnostics = options?.diagnostics ?? defaultDiagnostics;
	}

	/**
	 * Queue a job. It starts on a later turn of the event loop.
	 */
	submit(run: Job, label = 'job'): void {
		this.queue.push({ label, run });
		this.schedule();
	}

	/** Jobs waiting to start */
	get pending(): number {
		return this.queue.length;
	}

	/** Jobs currently running */
	get running(): number {
		return this.active;
	}

	/** Jobs finished so far, successful or not */
	get completedJobs(): number {
		return this.completed;
	}

	get idle(): boolean {
		return this.active === 0 && this.queue.length === 0;
	}

	/**
	 * Resolve once every queued and running job has finished.
	 */
	drain(): Promise<void> {
		if (this.idle) return Promise.resolve();
		return new Promise((resolve) => {
			this.idleWaiters.push(resolve);
		});
	}

	private schedule(): void {
		if (this.scheduled) return;
		this.scheduled = true;
		setImmediate(() => {
			this.scheduled = false;
			this.pump();
		});
	}

	private pump(): void {
		while (this.active < this.size) {
			const job = this.queue.shift();
			if (!job) break;
			this.active++;
			void this.runJob(job);
		}
	}

	private async runJob(job: QueuedJob): Promise<void> {
		try {
			await job.run();
		} catch (err) {
			this.diagnostics.warn(
				'async.batch_failed',
				`${job.label} failed: ${err instanceof Error ? err.message : String(err)}`,
				{ source: job.label, error: err instanceof Error ? err : undefined },
			);
		} finally {
			this.active--;
			this.completed++;
			if (this.queue.length > 0) {
				this.schedule();
			} else if (this.active === 0) {
				const waiters = this.idleWaiters;
				this.idleWaiters = [];
				for (const resolve of waiters) resolve();
			}
		}
	}
}

let sharedPool: WorkerPool | undefined;

/** Process-wide pool with one worker, shared by async sinks given no pool */
export function sharedWorkerPool(): WorkerPool {
	sharedPool ??= new WorkerPool({ size: 1 });
	return sharedPool;
}
