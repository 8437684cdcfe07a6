/**
 * Helpers shared by the commands that load a config.
 */

import type { Logger } from '@logrelay/core';
import { Diagnostics } from '@logrelay/sdk';
import type { Command } from 'commander';
import { buildLogger, loadCliConfig, type LogrelayConfig } from '../config.js';
import * as output from '../output.js';

export interface GlobalOptions {
	config?: string;
	json?: boolean;
	quiet?: boolean;
}

/** Walk up to the root program and read its options */
export function globalOptions(cmd: Command): GlobalOptions {
	let root = cmd;
	while (root.parent) root = root.parent;
	const opts = root.opts();
	return {
		config: typeof opts.config === 'string' ? opts.config : undefined,
		json: opts.json === true,
		quiet: opts.quiet === true,
	};
}

/** Diagnostics printed as CLI warnings */
export function cliDiagnostics(): Diagnostics {
	const diagnostics = new Diagnostics();
	diagnostics.onDiagnostic((d) => {
		const source = d.source ? ` [${d.source}]` : '';
		output.warn(`${d.code}${source}: ${d.message}`);
	});
	return diagnostics;
}

/** Load the config and build its logger */
export async function loadLogger(
	configPath?: string,
): Promise<{ config: LogrelayConfig; logger: Logger; diagnostics: Diagnostics }> {
	const config = await loadCliConfig({ configPath });
	const diagnostics = cliDiagnostics();
	return { config, logger: buildLogger(config, { diagnostics }), diagnostics };
}

export function failed(prefix: string, err: unknown): void {
	output.error(`${prefix}: ${err instanceof Error ? err.message : String(err)}`);
	process.exitCode = 1;
}
