import type { Dirent } from 'node:fs';
import { readdir } from 'node:fs/promises';
import { join } from 'node:path';

import { type IFileEnumerator, IoError } from '@sealfile/core';

/**
 * Depth-first walk returning regular files only. Entries are visited in
 * code-unit order of their names so a batch always runs in the same order.
 * Symbolic links (to files or directories) are skipped, as are sockets,
 * FIFOs and devices.
 */
export class DirectoryWalker implements IFileEnumerator {
	async listFiles(root: string): Promise<string[]> {
		const files: string[] = [];
		await this.walk(root, files);
		return files;
	}

	private async walk(dir: string, out: string[]): Promise<void> {
		let entries: Dirent[];
		try {
			entries = await readdir(dir, { withFileTypes: true });
		} catch (err: unknown) {
			throw new IoError(dir, 'read directory', err);
		}

		entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

		for (const entry of entries) {
			const path = join(dir, entry.name);
			if (entry.isDirectory()) {
				await this.walk(path, out);
			} else if (entry.isFile()) {
				out.push(path);
			}
		}
	}
}
