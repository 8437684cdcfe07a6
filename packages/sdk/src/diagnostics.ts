/**
 * Diagnostics — the observable surface for warnings and isolated failures.
 *
 * Buffer write failures, backpressure, level rounding and sink failures are
 * reported here instead of being thrown at the logging caller. Subscribe with
 * onDiagnostic(); with nobody listening (or a listener that throws) each
 * diagnostic goes to stderr as one line, so nothing is lost silently.
 */

import { EventEmitter } from 'node:events';

export type DiagnosticSeverity = 'warn' | 'error';

export type DiagnosticCode =
	| 'level.rounded'
	| 'logger.empty_sinks'
	| 'logger.empty_tags'
	| 'sink.failed'
	| 'sink.fallback_failed'
	| 'sink.flush_failed'
	| 'sink.close_failed'
	| 'buffer.write_failed'
	| 'async.backpressure'
	| 'async.batch_failed'
	| 'diagnostics.listener_failed';

export interface Diagnostic {
	severity: DiagnosticSeverity;
	code: DiagnosticCode;
	message: string;
	/** Sink or component the diagnostic is about */
	source?: string;
	error?: Error;
}

export type DiagnosticListener = (diagnostic: Diagnostic) => void;

/** Minimal writable used for the stderr fallback */
export interface LineWriter {
	write(chunk: string): unknown;
}

const DIAGNOSTIC_EVENT = 'diagnostic';

export class Diagnostics extends EventEmitter {
	private readonly fallback: LineWriter;

	constructor(options?: { fallback?: LineWriter }) {
		super();
		this.fallback = options?.fallback ?? process.stderr;
	}

	warn(code: DiagnosticCode, message: string, extra?: Pick<Diagnostic, 'source' | 'error'>): void {
		this.report({ severity: 'warn', code, message, ...extra });
	}

	error(code: DiagnosticCode, message: string, extra?: Pick<Diagnostic, 'source' | 'error'>): void {
		this.report({ severity: 'error', code, message, ...extra });
	}

	report(diagnostic: Diagnostic): void {
		if (this.listenerCount(DIAGNOSTIC_EVENT) === 0) {
			this.writeLine(diagnostic);
			return;
		}
		try {
			this.emit(DIAGNOSTIC_EVENT, diagnostic);
		} catch (err) {
			this.writeLine(diagnostic);
			this.writeLine({
				severity: 'error',
				code: 'diagnostics.listener_failed',
				message: err instanceof Error ? err.message : String(err),
			});
		}
	}

	/** Subscribe to diagnostics. Returns an unsubscribe function. */
	onDiagnostic(listener: DiagnosticListener): () => void {
		this.on(DIAGNOSTIC_EVENT, listener);
		return () => {
			this.off(DIAGNOSTIC_EVENT, listener);
		};
	}

	private writeLine(diagnostic: Diagnostic): void {
		const source = diagnostic.source ? ` [${diagnostic.source}]` : '';
		this.fallback.write(
			`logrelay ${diagnostic.severity.toUpperCase()} ${diagnostic.code}${source}: ${diagnostic.message}\n`,
		);
	}
}

/** Process-wide diagnostics channel, used when a component is given none */
export const diagnostics = new Diagnostics();
