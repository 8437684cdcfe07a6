/**
 * logrelay validate — Load the config, build every sink and list them.
 */

import { drainAll, listSinks, type SinkInfo } from '@logrelay/core';
import type { Command } from 'commander';
import * as output from '../output.js';
import { failed, globalOptions, loadLogger } from './shared.js';

function describeLimits(info: SinkInfo): string {
	return `${info.limits.lower}-${info.limits.upper}`;
}

export function registerValidateCommand(program: Command): void {
	program
		.command('validate')
		.description('Check the config file and list the sinks it builds')
		.action(async (_opts, cmd: Command) => {
			try {
				const { config, logger } = await loadLogger(globalOptions(cmd).config);
				const sinks = listSinks(logger);
				await drainAll(logger);

				if (output.isJsonMode()) {
					output.json({ config: config.path, limits: logger.limits, tags: logger.tags, sinks });
					return;
				}

				output.success(`${config.path} is valid`);
				output.info(
					`  logger: levels ${logger.limits.lower}-${logger.limits.upper}, ` +
						`${logger.middleware.length} middleware, tags [${logger.tags.join(', ')}]`,
				);
				if (sinks.length === 0) {
					output.warn('No sinks configured; events go nowhere.');
					return;
				}
				output.table(
					[
						{ header: 'NAME', key: 'name' },
						{ header: 'SINK', key: 'label' },
						{ header: 'LEVELS', key: 'limits' },
						{ header: 'MIDDLEWARE', key: 'middleware', align: 'right' },
						{ header: 'BUFFERED', key: 'buffered', align: 'right' },
					],
					sinks.map((info) => ({
						name: info.name,
						label: info.label,
						limits: describeLimits(info),
						middleware: String(info.middleware),
						buffered: info.buffered === null ? '-' : 'yes',
					})),
				);
			} catch (err) {
				failed('Validation failed', err);
			}
		});
}
