/**
 * Size-based file rotation: `path`, `path.1` … `path.N`.
 *
 * Checked on the write path before each write, never on a timer.
 */

import { existsSync, renameSync, rmSync, statSync } from 'node:fs';

/** Path of the nth rotated file */
export function rotatedPath(path: string, n: number): string {
	return `${path}.${n}`;
}

/** True when the file exists and has reached maxSize bytes */
export function shouldRotate(path: string, maxSize: number): boolean {
	try {
		return statSync(path).size >= maxSize;
	} catch (err) {
		if (isNotFound(err)) return false;
		throw err;
	}
}

/**
 * Shift `path.1..N-1` to `path.2..N` (dropping what was at `path.N`), then
 * move `path` to `path.1`. With maxFiles 0 the current file is deleted.
 */
export function rotateFile(path: string, maxFiles: number): void {
	if (maxFiles <= 0) {
		rmSync(path, { force: true });
		return;
	}
	rmSync(rotatedPath(path, maxFiles), { force: true });
	for (let i = maxFiles - 1; i >= 1; i--) {
		const from = rotatedPath(path, i);
		if (existsSync(from)) {
			renameSync(from, rotatedPath(path, i + 1));
		}
	}
	if (existsSync(path)) {
		renameSync(path, rotatedPath(path, 1));
	}
}

function isNotFound(err: unknown): boolean {
	return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
