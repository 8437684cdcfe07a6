/**
 * Program setup — global options and command registration.
 */

import { Command } from 'commander';
import { registerEmitCommand } from './commands/emit.js';
import { registerLevelsCommand } from './commands/levels.js';
import { registerValidateCommand } from './commands/validate.js';
import { registerVersionCommand } from './commands/version.js';
import * as output from './output.js';

export function createProgram(): Command {
	const program = new Command();
	program
		.name('logrelay')
		.description('Structured event logging: check configs and send events')
		.option('-c, --config <path>', 'Config file (default: $LOGRELAY_CONFIG or ./logrelay.yaml)')
		.option('--json', 'Machine-readable output')
		.option('-q, --quiet', 'Only print errors')
		.hook('preAction', (thisCommand) => {
			const opts = thisCommand.opts();
			output.setJsonMode(opts.json === true);
			output.setQuietMode(opts.quiet === true);
		});

	registerValidateCommand(program);
	registerEmitCommand(program);
	registerLevelsCommand(program);
	registerVersionCommand(program);
	return program;
}
