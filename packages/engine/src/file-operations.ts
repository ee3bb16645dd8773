import { dirname } from 'node:path';

import {
	ArgumentError,
	type FileResult,
	type PasswordSource,
	type ProgressSink,
} from '@sealfile/core';
import { ensureDirectory, isDirectory, readFileBytes, writeFileAtomic } from './file-io.js';
import { toDecryptedName, toEncryptedName } from './output-paths.js';
import { byteProgress } from './progress.js';
import { decryptBytes, encryptBytes } from './sealed-bytes.js';

export interface FileOperationOptions {
	readonly input: string;
	/** Defaults to `<input>.encrypted` (encrypt) or the input minus `.encrypted` (decrypt). */
	readonly output?: string;
	readonly passwordSource: PasswordSource;
	/** Receives `read` and `write` byte events. */
	readonly progress?: ProgressSink;
}

export async function encryptFile(options: FileOperationOptions): Promise<FileResult> {
	const { input, passwordSource, progress } = options;
	await assertNotDirectory(input);

	const output = options.output ?? toEncryptedName(input);
	const password = await passwordSource();

	const plaintext = await readFileBytes(input, byteProgress(progress, 'read', input));
	let sealed: Uint8Array;
	try {
		sealed = encryptBytes(password, plaintext);
	} finally {
		plaintext.fill(0);
	}

	await ensureDirectory(dirname(output));
	await writeFileAtomic(output, sealed, byteProgress(progress, 'write', output));

	return { source: input, destination: output, bytes: sealed.length };
}

export async function decryptFile(options: FileOperationOptions): Promise<FileResult> {
	const { input, passwordSource, progress } = options;
	await assertNotDirectory(input);

	const output = options.output ?? toDecryptedName(input);
	const password = await passwordSource();

	const container = await readFileBytes(input, byteProgress(progress, 'read', input));
	const plaintext = decryptBytes(password, container);
	const bytes = plaintext.length;

	try {
		await ensureDirectory(dirname(output));
		await writeFileAtomic(output, plaintext, byteProgress(progress, 'write', output));
	} finally {
		plaintext.fill(0);
	}

	return { source: input, destination: output, bytes };
}

async function assertNotDirectory(input: string): Promise<void> {
	if (await isDirectory(input)) {
		throw new ArgumentError(
			`Input is a directory: ${input}. Use the directory commands for directory trees.`,
		);
	}
}
