import { mkdir, mkdtemp, rm, symlink, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { IoError } from '@sealfile/core';
import { DirectoryWalker } from '../directory-walker.js';

describe('DirectoryWalker', () => {
	let tempDir: string;

	beforeEach(async () => {
		tempDir = await mkdtemp(join(tmpdir(), 'sealfile-walk-test-'));
	});

	afterEach(async () => {
		await rm(tempDir, { recursive: true, force: true });
	});

	it('lists regular files depth-first in name order', async () => {
		await mkdir(join(tempDir, 'a', 'y'), { recursive: true });
		await mkdir(join(tempDir, 'c'));
		await writeFile(join(tempDir, 'b.txt'), 'b');
		await writeFile(join(tempDir, 'a', 'z.txt'), 'z');
		await writeFile(join(tempDir, 'a', 'y', 'x.txt'), 'x');
		await writeFile(join(tempDir, 'B.txt'), 'upper');

		const files = await new DirectoryWalker().listFiles(tempDir);

		expect(files).toEqual([
			join(tempDir, 'B.txt'),
			join(tempDir, 'a', 'y', 'x.txt'),
			join(tempDir, 'a', 'z.txt'),
			join(tempDir, 'b.txt'),
		]);
	});

	it('skips symbolic links to files and directories', async () => {
		await mkdir(join(tempDir, 'dir'));
		await writeFile(join(tempDir, 'dir', 'real.txt'), 'real');
		await symlink(join(tempDir, 'dir', 'real.txt'), join(tempDir, 'file-link'));
		await symlink(join(tempDir, 'dir'), join(tempDir, 'dir-link'));

		const files = await new DirectoryWalker().listFiles(tempDir);

		expect(files).toEqual([join(tempDir, 'dir', 'real.txt')]);
	});

	it('returns nothing for an empty tree', async () => {
		await mkdir(join(tempDir, 'empty', 'nested'), { recursive: true });

		expect(await new DirectoryWalker().listFiles(tempDir)).toEqual([]);
	});

	it('wraps an unreadable root in IoError', async () => {
		const root = join(tempDir, 'missing');

		await expect(new DirectoryWalker().listFiles(root)).rejects.toBeInstanceOf(IoError);
		await expect(new DirectoryWalker().listFiles(root)).rejects.toMatchObject({ path: root });
	});
});
