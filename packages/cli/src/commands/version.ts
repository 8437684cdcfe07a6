/**
 * logrelay version — Print the CLI version and what it ships with.
 */

import { createRequire } from 'node:module';
import { BUILTIN_LEVELS } from '@logrelay/sdk';
import type { Command } from 'commander';
import { defaultPlugins, type PluginSet } from '../config.js';
import * as output from '../output.js';

export interface About {
	logrelay: string;
	node: string;
	levels: number;
	sinks: string[];
	backends: string[];
	middleware: string[];
}

const requirePackage = createRequire(import.meta.url);

/** Version of the @logrelay/cli package */
export function readCliVersion(): string {
	const pkg: unknown = requirePackage('@logrelay/cli/package.json');
	if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
		return pkg.version;
	}
	throw new Error('package.json has no version');
}

export function describePlugins(plugins: PluginSet): Omit<About, 'logrelay' | 'node'> {
	return {
		levels: BUILTIN_LEVELS.length,
		sinks: [...plugins.sinks.keys()],
		backends: plugins.backends.kinds(),
		middleware: [...plugins.middleware.keys()],
	};
}

export function registerVersionCommand(program: Command): void {
	program
		.command('version')
		.description('Print the version and the bundled sinks, backends and middleware')
		.action(() => {
			const about: About = {
				logrelay: readCliVersion(),
				node: process.version,
				...describePlugins(defaultPlugins()),
			};

			if (output.isJsonMode()) {
				output.json(about);
				return;
			}
			output.info(`logrelay ${about.logrelay} (node ${about.node})`);
			output.info(`  levels      ${about.levels} built-in`);
			output.info(`  sinks       ${about.sinks.join(', ')}`);
			output.info(`  backends    ${about.backends.join(', ')}`);
			output.info(`  middleware  ${about.middleware.join(', ')}`);
		});
}
