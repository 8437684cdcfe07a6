import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { rotatedPath, rotateFile, shouldRotate } from '../rotation.js';

describe('rotation', () => {
	let dir: string;
	let path: string;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), 'logrelay-rotation-'));
		path = join(dir, 'app.log');
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it('shouldRotate is false for a missing file and true at max size', () => {
		expect(shouldRotate(path, 10)).toBe(false);
		writeFileSync(path, '123456789');
		expect(shouldRotate(path, 10)).toBe(false);
		writeFileSync(path, '1234567890');
		expect(shouldRotate(path, 10)).toBe(true);
	});

	it('moves the current file to path.1', () => {
		writeFileSync(path, 'first');
		rotateFile(path, 3);

		expect(existsSync(path)).toBe(false);
		expect(readFileSync(rotatedPath(path, 1), 'utf-8')).toBe('first');
	});

	it('shifts path.1 to path.2 on the second rotation', () => {
		writeFileSync(path, 'first');
		rotateFile(path, 3);
		writeFileSync(path, 'second');
		rotateFile(path, 3);

		expect(readFileSync(`${path}.1`, 'utf-8')).toBe('second');
		expect(readFileSync(`${path}.2`, 'utf-8')).toBe('first');
	});

	it('never keeps more than maxFiles rotated files', () => {
		for (const content of ['a', 'b', 'c', 'd', 'e']) {
			writeFileSync(path, content);
			rotateFile(path, 2);
		}

		expect(readFileSync(`${path}.1`, 'utf-8')).toBe('e');
		expect(readFileSync(`${path}.2`, 'utf-8')).toBe('d');
		expect(existsSync(`${path}.3`)).toBe(false);
	});

	it('deletes the file when maxFiles is 0', () => {
		writeFileSync(path, 'gone');
		rotateFile(path, 0);
		expect(existsSync(path)).toBe(false);
		expect(existsSync(`${path}.1`)).toBe(false);
	});
});
