#!/usr/bin/env node
/**
 * logrelay CLI entry point.
 */

import { createProgram } from './program.js';

createProgram()
	.parseAsync(process.argv)
	.catch((err: unknown) => {
		console.error(err instanceof Error ? err.message : String(err));
		process.exit(1);
	});
