/**
 * logrelay levels — List the built-in levels.
 */

import { BUILTIN_LEVELS } from '@logrelay/sdk';
import type { Command } from 'commander';
import * as output from '../output.js';

export function registerLevelsCommand(program: Command): void {
	program
		.command('levels')
		.description('List built-in levels and their numbers')
		.action(() => {
			output.table(
				[
					{ header: 'LEVEL', key: 'name' },
					{ header: 'NUMBER', key: 'number', align: 'right' },
				],
				BUILTIN_LEVELS.map((level) => ({ name: level.levelName, number: String(level.levelNumber) })),
			);
		});
}
