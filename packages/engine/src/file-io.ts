import { randomBytes } from 'node:crypto';
import { type FileHandle, mkdir, open, rename, rm, stat } from 'node:fs/promises';
import { dirname, join } from 'node:path';

import { IO_CHUNK_SIZE, IoError } from '@sealfile/core';
import type { ByteProgress } from './progress.js';

/**
 * Read a whole file into memory in {@link IO_CHUNK_SIZE} chunks, reporting
 * `(bytesRead, fileSize)` after each chunk.
 */
export async function readFileBytes(path: string, onProgress?: ByteProgress): Promise<Buffer> {
	let handle: FileHandle | undefined;
	try {
		handle = await open(path, 'r');
		const { size } = await handle.stat();

		const chunks: Buffer[] = [];
		let completed = 0;
		for (;;) {
			const chunk = Buffer.allocUnsafe(IO_CHUNK_SIZE);
			const { bytesRead } = await handle.read(chunk, 0, IO_CHUNK_SIZE, null);
			if (bytesRead === 0) break;
			chunks.push(chunk.subarray(0, bytesRead));
			completed += bytesRead;
			onProgress?.(completed, Math.max(size, completed));
		}
		return Buffer.concat(chunks, completed);
	} catch (err: unknown) {
		throw new IoError(path, 'read file', err);
	} finally {
		await handle?.close();
	}
}

/**
 * Write `data` to `path` so that `path` either keeps its old content or holds
 * all of `data`: bytes go to a temporary sibling first, which is renamed over
 * the destination once fully written. On failure the temporary file is removed.
 */
export async function writeFileAtomic(
	path: string,
	data: Uint8Array,
	onProgress?: ByteProgress,
): Promise<void> {
	// Fixed-length name: a long destination name must not push the temporary one past NAME_MAX.
	const tmpPath = join(dirname(path), `.${randomBytes(6).toString('hex')}.tmp`);
	let handle: FileHandle | undefined;
	try {
		handle = await open(tmpPath, 'wx');

		let written = 0;
		while (written < data.length) {
			const length = Math.min(IO_CHUNK_SIZE, data.length - written);
			const { bytesWritten } = await handle.write(data, written, length);
			written += bytesWritten;
			onProgress?.(written, data.length);
		}
		if (data.length === 0) {
			onProgress?.(0, 0);
		}

		await handle.close();
		handle = undefined;
		await rename(tmpPath, path);
	} catch (err: unknown) {
		await discardTemporary(tmpPath, handle);
		throw new IoError(path, 'write file', err);
	}
}

/** mkdir -p */
export async function ensureDirectory(path: string): Promise<void> {
	try {
		await mkdir(path, { recursive: true });
	} catch (err: unknown) {
		throw new IoError(path, 'create directory', err);
	}
}

/** Follows symlinks, like the input checks of the CLI. Missing paths are not directories. */
export async function isDirectory(path: string): Promise<boolean> {
	try {
		return (await stat(path)).isDirectory();
	} catch (err: unknown) {
		if (isNotFound(err)) return false;
		throw new IoError(path, 'inspect path', err);
	}
}

async function discardTemporary(tmpPath: string, handle: FileHandle | undefined): Promise<void> {
	try {
		await handle?.close();
		await rm(tmpPath, { force: true });
	} catch (err: unknown) {
		process.emitWarning(
			`Could not remove temporary file ${tmpPath}: ${err instanceof Error ? err.message : String(err)}`,
			'SealfileCleanupWarning',
		);
	}
}

function isNotFound(err: unknown): boolean {
	return (
		typeof err === 'object' &&
		err !== null &&
		'code' in err &&
		(err.code === 'ENOENT' || err.code === 'ENOTDIR')
	);
}
