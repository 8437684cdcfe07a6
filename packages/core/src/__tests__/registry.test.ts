import {
	type BackendRegistration,
	CaptureSink,
	ConfigurationError,
	createTestEvent,
	type FormattedRecord,
	UnknownBackendError,
} from '@logrelay/sdk';
import { describe, expect, it, vi } from 'vitest';
import { AsyncSink } from '../async-sink.js';
import { MemorySink } from '../backends/memory.js';
import { BufferedSink } from '../buffer.js';
import { toJson, toRow, toText } from '../formatters.js';
import { Logger } from '../logger.js';
import {
	BackendRegistry,
	createDefaultRegistry,
	isBackendFormatter,
	onBackend,
	onMemory,
} from '../registry.js';

describe('BackendRegistry', () => {
	it('starts with local and memory', () => {
		expect(createDefaultRegistry().kinds()).toEqual(['local', 'memory']);
	});

	it('rejects duplicate kinds', () => {
		const registry = createDefaultRegistry();
		expect(() => registry.register('local', () => new CaptureSink())).toThrow(
			'Backend kind "local" is already registered',
		);
	});

	it('lists known kinds for an unknown kind', () => {
		const registry = createDefaultRegistry();
		const target = onBackend(toText(), { kind: 's3', bucket: 'logs' });

		expect(() => registry.build(target)).toThrow(UnknownBackendError);
		expect(() => registry.build(target)).toThrow('Unknown backend kind "s3". Available: local, memory');
	});

	it('registers plug-in backends through use()', () => {
		const built: Array<{ kind: string; bucket: unknown }> = [];
		const registration: BackendRegistration = {
			kind: 'bucket',
			build: (_formatter, config) => {
				built.push({ kind: config.kind, bucket: config.bucket });
				return new CaptureSink('bucket');
			},
			configSchema: { type: 'object' },
		};
		const registry = new BackendRegistry().use(registration);
		const sink = registry.build(onBackend(toJson(), { kind: 'bucket', bucket: 'logs' }));

		expect(sink.id).toBe('bucket');
		expect(built).toEqual([{ kind: 'bucket', bucket: 'logs' }]);
		expect(registry.configSchema('bucket')).toEqual({ type: 'object' });
	});

	it('enforces a plug-in config schema on the kind-specific settings', () => {
		const build = vi.fn(() => new CaptureSink('bucket'));
		const registry = new BackendRegistry().use({
			kind: 'bucket',
			build,
			configSchema: {
				type: 'object',
				required: ['bucket'],
				properties: { bucket: { type: 'string' } },
				additionalProperties: false,
			},
		});

		expect(() =>
			registry.build(onBackend(toText(), { kind: 'bucket', bucket: 'logs', regoin: 'eu' })),
		).toThrow('bucket: unknown key "regoin"');
		expect(() => registry.build(onBackend(toText(), { kind: 'bucket' }))).toThrow(
			'bucket.bucket: is required',
		);
		expect(build).not.toHaveBeenCalled();

		const sink = registry.build(
			onBackend(toText(), { kind: 'bucket', bucket: 'logs', flush_threshold: 5, async: false }),
		);
		expect(sink.id).toBe('bucket');
	});

	it('validates the shared settings of every kind', () => {
		const registry = createDefaultRegistry();
		expect(() => registry.build(onMemory(toText(), { flush_threshold: 0 }))).toThrow(
			'memory.flush_threshold: must be >= 1',
		);
		expect(() => registry.build(onMemory(toText(), { async: { max_queue: 5 } }))).toThrow(
			'memory.async: unknown key "max_queue"',
		);
	});

	it('turns builder failures into configuration errors', () => {
		const registry = new BackendRegistry().register('broken', () => {
			throw new Error('no credentials');
		});
		expect(() => registry.build(onBackend(toText(), { kind: 'broken' }))).toThrow(
			ConfigurationError,
		);
		expect(() => registry.build(onBackend(toText(), { kind: 'broken' }))).toThrow(
			'Failed to build "broken" backend: no credentials',
		);
	});

	it('wraps the sink in an AsyncSink when async is set', () => {
		const registry = createDefaultRegistry();
		const sink = registry.build(
			onMemory(toText(), { async: { flush_threshold: 5, max_queue_size: 50 } }),
		);

		expect(sink).toBeInstanceOf(AsyncSink);
		if (sink instanceof AsyncSink) {
			expect(sink.flushThreshold).toBe(5);
			expect(sink.maxQueueSize).toBe(50);
			expect(sink.wrapped).toBeInstanceOf(MemorySink);
		}
	});

	it('rejects a malformed async block', () => {
		const registry = createDefaultRegistry();
		expect(() => registry.build(onMemory(toText(), { async: 'yes' }))).toThrow(
			'memory.async: must be boolean or object',
		);
		expect(() => registry.build(onMemory(toText(), { async: { flush_threshold: 'ten' } }))).toThrow(
			'memory.async.flush_threshold: must be integer',
		);
	});
});

describe('memory backend', () => {
	it('stores formatted records as they arrive', () => {
		const store: FormattedRecord[] = [];
		const logger = new Logger().withSinks({ mem: onMemory(toText('{message}'), { store }) });

		logger.log(createTestEvent({ message: 'one' }));
		logger.log(createTestEvent({ message: 'two' }));

		expect(store).toEqual(['one', 'two']);
	});

	it('buffers with a flush threshold', () => {
		const store: FormattedRecord[] = [];
		const sink = createDefaultRegistry().build(onMemory(toRow(), { store, flush_threshold: 2 }));

		expect(sink).toBeInstanceOf(BufferedSink);
		sink.write(createTestEvent({ message: 'a' }));
		expect(store).toHaveLength(0);
		expect(sink.bufferSize?.()).toBe(1);
		sink.write(createTestEvent({ message: 'b' }));
		expect(store).toHaveLength(2);
	});

	it('rejects a store that is not an array', () => {
		expect(() => createDefaultRegistry().build(onMemory(toText(), { store: 'nope' }))).toThrow(
			'memory.store: must be array',
		);
	});
});

describe('composition helpers', () => {
	it('onBackend requires a formatter and a kind', () => {
		const notFormatter = { format: 'nope' } as unknown as ReturnType<typeof toText>;
		expect(() => onBackend(notFormatter, { kind: 'local' })).toThrow(
			'onBackend() needs a formatter',
		);
		expect(() => onBackend(toText(), { kind: '' })).toThrow('backend config needs a kind');
	});

	it('recognizes backend formatters', () => {
		expect(isBackendFormatter(onMemory(toText()))).toBe(true);
		expect(isBackendFormatter(toText())).toBe(false);
		expect(isBackendFormatter(new CaptureSink())).toBe(false);
	});
});
