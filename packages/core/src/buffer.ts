/**
 * Threshold-based batching for sinks that write in bulk.
 *
 * Formatted records accumulate until the threshold is reached, then go out
 * in one bulk write. A failed write keeps every record and raises a
 * `buffer.write_failed` warning; there is no automatic retry. The next
 * threshold crossing or an explicit flush() tries again.
 */

import type { Diagnostics, LogEvent, Sink } from '@logrelay/sdk';
import { BackendWriteError, ConfigurationError, diagnostics as defaultDiagnostics } from '@logrelay/sdk';

/** Writes a whole batch at once. Must throw on failure. */
export type BatchWriter<R> = (records: readonly R[]) => void;

export interface BufferedSinkOptions<R> {
	id: string;
	/** Number of records that triggers a bulk write */
	threshold: number;
	/** Turn an event into a buffered record */
	format: (event: LogEvent) => R;
	write: BatchWriter<R>;
	/** Called after a failed bulk write, with the records still buffered */
	onWriteFailure?: (error: BackendWriteError, records: readonly R[]) => void;
	/** Release backend resources after the final flush */
	close?: () => void;
	diagnostics?: Diagnostics;
}

export class BufferedSink<R> implements Sink {
	readonly id: string;
	readonly threshold: number;
	private readonly records: R[] = [];
	private readonly options: BufferedSinkOptions<R>;
	private readonly diagnostics: Diagnostics;
	private flushes = 0;

	constructor(options: BufferedSinkOptions<R>) {
		if (!Number.isInteger(options.threshold) || options.threshold < 1) {
			throw new ConfigurationError(`must be a positive integer, got ${options.threshold}`, {
				path: 'flush_threshold',
			});
		}
		this.id = options.id;
		this.threshold = options.threshold;
		this.options = options;
		this.diagnostics = options.diagnostics ?? defaultDiagnostics;
	}

	write(event: LogEvent): void {
		this.append(this.options.format(event));
	}

	/** Buffer one record, flushing before returning once the threshold is reached */
	append(record: R): void {
		this.records.push(record);
		if (this.records.length >= this.threshold) {
			this.flush();
		}
	}

	/** One bulk write of everything buffered. No-op when empty. */
	flush(): void {
		if (this.records.length === 0) return;
		const batch = this.records.slice();
		try {
			this.options.write(batch);
		} catch (err) {
			const error = new BackendWriteError(this.id, batch.length, { cause: err });
			this.diagnostics.warn('buffer.write_failed', error.message, { source: this.id, error });
			this.options.onWriteFailure?.(error, this.records.slice());
			return;
		}
		this.records.splice(0, batch.length);
		this.flushes++;
	}

	bufferSize(): number {
		return this.records.length;
	}

	/** Successful bulk writes so far */
	get flushCount(): number {
		return this.flushes;
	}

	close(): void {
		this.flush();
		this.options.close?.();
	}
}
