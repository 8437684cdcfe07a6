import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { drainAll } from '@logrelay/core';
import { ConfigurationError, captureDiagnostics, DEBUG, ERROR, WARNING } from '@logrelay/sdk';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { buildLogger, loadCliConfig, parseConfig, resolveConfigPath, resolveEnvRefs } from '../config.js';

describe('resolveConfigPath', () => {
	it('prefers --config, then LOGRELAY_CONFIG, then logrelay.yaml', () => {
		const env = { LOGRELAY_CONFIG: 'env.yaml' };
		expect(resolveConfigPath({ configPath: 'flag.yaml', env, cwd: '/work' })).toBe('/work/flag.yaml');
		expect(resolveConfigPath({ env, cwd: '/work' })).toBe('/work/env.yaml');
		expect(resolveConfigPath({ env: {}, cwd: '/work' })).toBe('/work/logrelay.yaml');
	});
});

describe('resolveEnvRefs', () => {
	it('replaces references inside strings at any depth', () => {
		expect(
			resolveEnvRefs({ a: 'x-${HOST}-y', list: ['${HOST}'], n: 3 }, { HOST: 'web' }, ''),
		).toEqual({ a: 'x-web-y', list: ['web'], n: 3 });
	});

	it('names the setting when a variable is missing', () => {
		expect(() => resolveEnvRefs({ sinks: { hook: { url: '${HOOK_URL}' } } }, {}, '')).toThrow(
			'sinks.hook.url: environment variable HOOK_URL is not set',
		);
	});
});

describe('parseConfig', () => {
	it('reads logger settings and both sink forms', () => {
		const config = parseConfig(
			`logger:
  limits: { lower: NOTE, upper: HIGHEST }
  tags: [api]
  middleware:
    - { kind: sample, rate: 0.5 }
sinks:
  console: { kind: console, lower: WARNING, color: false }
  app: { format: text, backend: local, path: logs/app.log, max_size: 1mb }
`,
			'/etc/logrelay/logrelay.yaml',
		);

		expect(config.logger).toEqual({
			limits: { lower: 'NOTE', upper: 'HIGHEST' },
			tags: ['api'],
			middleware: [{ kind: 'sample', options: { rate: 0.5 } }],
		});
		expect(config.sinks.console).toEqual({
			type: 'direct',
			kind: 'console',
			options: { color: false },
			limits: { lower: 'WARNING' },
			tags: [],
			middleware: [],
		});
		expect(config.sinks.app).toEqual({
			type: 'backend',
			format: { type: 'text', options: {} },
			backend: { kind: 'local', path: '/etc/logrelay/logs/app.log', max_size: '1mb' },
			limits: {},
			tags: [],
			middleware: [],
		});
	});

	it('resolves environment references', () => {
		const config = parseConfig(
			'sinks:\n  hook: { format: json, backend: webhook, url: "${HOOK_URL}/logs" }\n',
			'/tmp/logrelay.yaml',
			{ HOOK_URL: 'https://hooks.example.com' },
		);
		const hook = config.sinks.hook;
		expect(hook.type === 'backend' && hook.backend.url).toBe('https://hooks.example.com/logs');
	});

	it('accepts an empty file', () => {
		expect(parseConfig('', '/tmp/logrelay.yaml').sinks).toEqual({});
	});

	it('names the offending setting', () => {
		const parse = (text: string) => () => parseConfig(text, '/tmp/logrelay.yaml');
		expect(parse('sinks:\n  bad: { format: text }\n')).toThrow(
			'sinks.bad: needs a kind, or a format and a backend',
		);
		expect(parse('sinks:\n  x: { format: xml, backend: local, path: a.log }\n')).toThrow(
			'sinks.x.format: must be one of text, json, csv, row (or a map with a type)',
		);
		expect(parse('logger:\n  tags: api\n')).toThrow('logger.tags: must be array');
		expect(parse('sink:\n  x: { kind: console }\n')).toThrow('(root): unknown key "sink"');
		expect(parse('sinks:\n  x: { kind: console, backend: local }\n')).toThrow(
			'sinks.x: takes either kind or format + backend, not both',
		);
		expect(parse('logger:\n  middleware:\n    - { rate: 1 }\n')).toThrow(
			'logger.middleware[0].kind: is required',
		);
	});

	it('reports YAML syntax errors', () => {
		expect(() => parseConfig('sinks: [', '/tmp/logrelay.yaml')).toThrow(/^invalid YAML in \/tmp\/logrelay\.yaml/);
	});
});

describe('loading and building', () => {
	let tempDir: string;

	beforeEach(async () => {
		tempDir = await mkdtemp(join(tmpdir(), 'logrelay-cli-'));
	});

	afterEach(async () => {
		await rm(tempDir, { recursive: true, force: true });
	});

	it('fails clearly when the file is missing', async () => {
		await expect(loadCliConfig({ configPath: join(tempDir, 'none.yaml') })).rejects.toThrow(
			ConfigurationError,
		);
	});

	it('builds a logger that routes by level', async () => {
		const configPath = join(tempDir, 'logrelay.yaml');
		await writeFile(
			configPath,
			`logger:
  limits: { lower: NOTE }
  tags: [cli]
  middleware:
    - { kind: redact, fields: [password] }
sinks:
  app:
    format: { type: text, template: "{level} {message} {tags} {password}" }
    backend: local
    path: app.log
  errors: { format: json, backend: local, path: errors.log, lower: ERROR }
`,
		);

		const config = await loadCliConfig({ configPath });
		const { diagnostics } = captureDiagnostics();
		const logger = buildLogger(config, { diagnostics });

		logger.log(WARNING('disk low', { fields: { password: 'test-secret' } }));
		logger.log(DEBUG('hidden'));
		logger.log(ERROR('boom'));
		await drainAll(logger);

		expect(await readFile(join(tempDir, 'app.log'), 'utf-8')).toBe(
			'WARNING disk low [cli] [REDACTED]\nERROR boom [cli] \n',
		);
		const errors = (await readFile(join(tempDir, 'errors.log'), 'utf-8')).trim().split('\n');
		expect(errors).toHaveLength(1);
		expect(JSON.parse(errors[0])).toMatchObject({ level: 'ERROR', message: 'boom', tags: ['cli'] });
	});

	it('prefixes backend errors with the sink path', () => {
		const config = parseConfig(
			'sinks:\n  app: { format: text, backend: local, path: a.log, max_files: -1 }\n',
			join(tempDir, 'logrelay.yaml'),
		);
		expect(() => buildLogger(config)).toThrow(
			'sinks.app: local.max_files: must be >= 0',
		);
	});

	it('rejects unknown sink kinds and middleware', () => {
		const unknownSink = parseConfig('sinks:\n  x: { kind: syslog }\n', '/tmp/logrelay.yaml');
		expect(() => buildLogger(unknownSink)).toThrow(
			'sinks.x: unknown sink kind "syslog". Available: console',
		);

		const unknownMiddleware = parseConfig(
			'logger:\n  middleware:\n    - { kind: dedup }\n',
			'/tmp/logrelay.yaml',
		);
		expect(() => buildLogger(unknownMiddleware)).toThrow(
			'logger.middleware[0]: unknown middleware "dedup". Available: redact, sample, enrich',
		);
	});

	it('wraps middleware config errors with their position', () => {
		const config = parseConfig(
			'sinks:\n  x:\n    kind: console\n    middleware:\n      - { kind: sample, rate: 2 }\n',
			'/tmp/logrelay.yaml',
		);
		expect(() => buildLogger(config)).toThrow(
			'sinks.x.middleware[0].rate: must be <= 1',
		);
	});

	it('rejects misspelled plug-in settings', () => {
		const sink = parseConfig(
			'sinks:\n  console: { kind: console, colour: false, strem: stderr }\n',
			'/tmp/logrelay.yaml',
		);
		expect(() => buildLogger(sink)).toThrow(
			'sinks.console: unknown key "colour"; sinks.console: unknown key "strem"',
		);

		const middleware = parseConfig(
			'logger:\n  middleware:\n    - { kind: redact, feilds: [password] }\n',
			'/tmp/logrelay.yaml',
		);
		expect(() => buildLogger(middleware)).toThrow('logger.middleware[0]: unknown key "feilds"');

		const backend = parseConfig(
			'sinks:\n  hook: { format: json, backend: webhook, url: "https://hooks.example.com", methd: PUT }\n',
			'/tmp/logrelay.yaml',
		);
		expect(() => buildLogger(backend)).toThrow('sinks.hook: webhook: unknown key "methd"');
	});
});
