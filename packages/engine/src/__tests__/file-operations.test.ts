import { mkdir, mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ArgumentError, CryptoError, type ProgressEvent } from '@sealfile/core';
import { decryptFile, encryptFile } from '../file-operations.js';
import { isContainer } from '../container-codec.js';

describe('file-operations', () => {
	let tempDir: string;
	const passwordSource = () => 'test-secret';

	beforeEach(async () => {
		tempDir = await mkdtemp(join(tmpdir(), 'sealfile-file-test-'));
	});

	afterEach(async () => {
		await rm(tempDir, { recursive: true, force: true });
	});

	it('encrypts next to the input and decrypts back to the original name', async () => {
		const input = join(tempDir, 'notes.txt');
		await writeFile(input, 'hello world');

		const sealed = await encryptFile({ input, passwordSource });

		expect(sealed).toEqual({
			source: input,
			destination: join(tempDir, 'notes.txt.encrypted'),
			bytes: 76,
		});
		expect(isContainer(await readFile(sealed.destination))).toBe(true);

		await rm(input);
		const opened = await decryptFile({ input: sealed.destination, passwordSource });

		expect(opened).toEqual({ source: sealed.destination, destination: input, bytes: 11 });
		expect(await readFile(input, 'utf-8')).toBe('hello world');
	});

	it('appends .decrypted when the input lacks the .encrypted extension', async () => {
		const input = join(tempDir, 'blob.bin');
		await writeFile(input, 'payload');
		const sealed = await encryptFile({ input, output: join(tempDir, 'sealed.dat'), passwordSource });

		const opened = await decryptFile({ input: sealed.destination, passwordSource });

		expect(opened.destination).toBe(join(tempDir, 'sealed.dat.decrypted'));
		expect(await readFile(opened.destination, 'utf-8')).toBe('payload');
	});

	it('creates missing parent directories of an explicit output', async () => {
		const input = join(tempDir, 'a.txt');
		await writeFile(input, 'a');
		const output = join(tempDir, 'out', 'deep', 'a.sealed');

		await encryptFile({ input, output, passwordSource });

		expect((await stat(output)).isFile()).toBe(true);
	});

	it('reports read and write byte progress', async () => {
		const input = join(tempDir, 'small.txt');
		await writeFile(input, 'x'.repeat(100));
		const events: ProgressEvent[] = [];

		await encryptFile({ input, passwordSource, progress: (event) => events.push(event) });

		expect(events).toEqual([
			{ phase: 'read', path: input, completed: 100, total: 100 },
			{ phase: 'write', path: `${input}.encrypted`, completed: 165, total: 165 },
		]);
	});

	it('asks for the password once', async () => {
		const input = join(tempDir, 'once.txt');
		await writeFile(input, 'once');
		const source = vi.fn(() => 'test-secret');

		await encryptFile({ input, passwordSource: source });

		expect(source).toHaveBeenCalledTimes(1);
	});

	it('rejects a wrong password without writing output', async () => {
		const input = join(tempDir, 'secret.txt');
		await writeFile(input, 'secret');
		const sealed = await encryptFile({ input, passwordSource });
		const output = join(tempDir, 'restored.txt');

		await expect(
			decryptFile({ input: sealed.destination, output, passwordSource: () => 'wrong-secret' }),
		).rejects.toBeInstanceOf(CryptoError);
		await expect(stat(output)).rejects.toMatchObject({ code: 'ENOENT' });
	});

	it('refuses a directory as input', async () => {
		const input = join(tempDir, 'folder');
		await mkdir(input);
		const source = vi.fn(() => 'test-secret');

		await expect(encryptFile({ input, passwordSource: source })).rejects.toBeInstanceOf(
			ArgumentError,
		);
		await expect(decryptFile({ input, passwordSource: source })).rejects.toBeInstanceOf(
			ArgumentError,
		);
		expect(source).not.toHaveBeenCalled();
	});
});
