/**
 * logrelay emit — Dispatch one event through the configured logger.
 *
 * Waits for every sink to flush and close before exiting.
 */

import { drainAll, type Logger } from '@logrelay/core';
import type { FieldValue, LevelConstructor, LogEvent } from '@logrelay/sdk';
import { ConfigurationError, defineLevel, levelByName } from '@logrelay/sdk';
import type { Command } from 'commander';
import * as output from '../output.js';
import { failed, globalOptions, loadLogger } from './shared.js';

export interface EmitOptions {
	field: string[];
	tag: string[];
}

function collect(value: string, previous: string[]): string[] {
	return [...previous, value];
}

/** A built-in level by name, or a custom level for a bare number */
export function resolveLevel(input: string): LevelConstructor {
	const level = levelByName(input);
	if (level) return level;
	if (/^\d+$/.test(input)) {
		return defineLevel(`LEVEL_${input}`, Number.parseInt(input, 10));
	}
	throw new ConfigurationError(`unknown level "${input}"`, { path: 'level' });
}

/** Parse `key=value`; values that read as JSON scalars keep their type */
export function parseField(input: string): [string, FieldValue] {
	const eq = input.indexOf('=');
	if (eq <= 0) {
		throw new ConfigurationError(`expected key=value, got "${input}"`, { path: '--field' });
	}
	const key = input.slice(0, eq);
	const raw = input.slice(eq + 1);
	if (raw === 'true') return [key, true];
	if (raw === 'false') return [key, false];
	if (raw === 'null') return [key, null];
	if (raw.trim() !== '' && Number.isFinite(Number(raw))) return [key, Number(raw)];
	return [key, raw];
}

/** Build and dispatch one event, then drain the logger */
export async function emitEvent(
	logger: Logger,
	level: string,
	message: string,
	options: EmitOptions,
): Promise<LogEvent | null> {
	const makeEvent = resolveLevel(level);
	const event = makeEvent(message, {
		fields: Object.fromEntries(options.field.map(parseField)),
		tags: options.tag,
	});
	try {
		return logger.log(event);
	} finally {
		await drainAll(logger);
	}
}

export function registerEmitCommand(program: Command): void {
	program
		.command('emit <level> <message>')
		.description('Send one event through the configured sinks')
		.option('-f, --field <key=value>', 'Field to attach (repeatable)', collect, [])
		.option('-t, --tag <tag>', 'Tag to attach (repeatable)', collect, [])
		.action(async (level: string, message: string, opts: EmitOptions, cmd: Command) => {
			try {
				const { logger } = await loadLogger(globalOptions(cmd).config);
				const result = await emitEvent(logger, level, message, opts);

				if (output.isJsonMode()) {
					output.json({ dispatched: result !== null, event: result });
					return;
				}
				if (result === null) {
					output.warn('Event dropped by logger middleware');
					return;
				}
				output.success(`${result.level} event sent to ${logger.sinks.length} sink(s)`);
			} catch (err) {
				failed('Emit failed', err);
			}
		});
}
