import { dirname, isAbsolute, join, relative, sep } from 'node:path';

import {
	ArgumentError,
	BatchError,
	BatchOperation,
	type BatchReport,
	type FileResult,
	type IFileEnumerator,
	type PasswordSource,
	type ProgressSink,
	SaltPolicy,
} from '@sealfile/core';
import { AeadCipher } from './aead-cipher.js';
import { encodeContainer } from './container-codec.js';
import { DirectoryWalker } from './directory-walker.js';
import { ensureDirectory, isDirectory, readFileBytes, writeFileAtomic } from './file-io.js';
import { generateSalt } from './key-derivation.js';
import {
	defaultDecryptedDirectory,
	defaultEncryptedDirectory,
	hasEncryptedExtension,
	toDecryptedName,
	toEncryptedName,
} from './output-paths.js';
import { notify } from './progress.js';
import { decryptBytes, encryptBytes } from './sealed-bytes.js';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface DirectoryOperationOptions {
	readonly input: string;
	/** Defaults to `<input>.encrypted` / the input minus `.encrypted` (or `<input>_decrypted`). */
	readonly output?: string;
	readonly passwordSource: PasswordSource;
	/** Receives one `file` event after each file. */
	readonly progress?: ProgressSink;
	readonly enumerator?: IFileEnumerator;
}

export interface EncryptDirectoryOptions extends DirectoryOperationOptions {
	/** Defaults to {@link SaltPolicy.BATCH}. */
	readonly saltPolicy?: SaltPolicy;
}

/** Salt and cipher shared by every file of a {@link SaltPolicy.BATCH} run. */
interface BatchKey {
	readonly salt: Uint8Array;
	readonly cipher: AeadCipher;
}

// ---------------------------------------------------------------------------
// Encrypt
// ---------------------------------------------------------------------------

/**
 * Encrypt every regular file below `input` into a mirrored tree, appending
 * `.encrypted` to each file name.
 *
 * With the default batch salt policy the password is stretched once and the
 * resulting key seals every file; each file still gets its own random nonce.
 *
 * Fail-fast and not transactional: the first failing file raises a
 * {@link BatchError} and files written before it stay on disk.
 */
export async function encryptDirectory(options: EncryptDirectoryOptions): Promise<BatchReport> {
	const { input, passwordSource, progress } = options;
	const saltPolicy = options.saltPolicy ?? SaltPolicy.BATCH;
	await assertDirectory(input);

	const outputRoot = options.output ?? defaultEncryptedDirectory(input);
	const sources = await (options.enumerator ?? new DirectoryWalker()).listFiles(input);
	await ensureDirectory(outputRoot);

	const report = (files: FileResult[]): BatchReport => ({
		operation: BatchOperation.ENCRYPT,
		inputRoot: input,
		outputRoot,
		files,
		saltPolicy,
	});

	if (sources.length === 0) {
		return report([]);
	}

	const password = await passwordSource();
	const batchKey = saltPolicy === SaltPolicy.BATCH ? createBatchKey(password) : undefined;

	const files: FileResult[] = [];
	try {
		for (const source of sources) {
			try {
				const destination = join(outputRoot, toEncryptedName(relativeTo(input, source)));
				const plaintext = await readFileBytes(source);
				let sealed: Uint8Array;
				try {
					sealed = batchKey
						? encodeContainer(batchKey.salt, batchKey.cipher.encrypt(plaintext))
						: encryptBytes(password, plaintext);
				} finally {
					plaintext.fill(0);
				}

				await ensureDirectory(dirname(destination));
				await writeFileAtomic(destination, sealed);
				files.push({ source, destination, bytes: sealed.length });
			} catch (err: unknown) {
				throw new BatchError(BatchOperation.ENCRYPT, source, files.length, err);
			}

			notify(progress, {
				phase: 'file',
				path: source,
				completed: files.length,
				total: sources.length,
			});
		}
	} finally {
		batchKey?.cipher.destroy();
	}

	return report(files);
}

// ---------------------------------------------------------------------------
// Decrypt
// ---------------------------------------------------------------------------

/**
 * Decrypt every `*.encrypted` file below `input` into a mirrored tree, removing
 * the `.encrypted` extension. Other files are ignored.
 *
 * Each container's own salt is authoritative: the key is derived per file even
 * when the files came from one batch and share a salt.
 */
export async function decryptDirectory(options: DirectoryOperationOptions): Promise<BatchReport> {
	const { input, passwordSource, progress } = options;
	await assertDirectory(input);

	const outputRoot = options.output ?? defaultDecryptedDirectory(input);
	const sources = (await (options.enumerator ?? new DirectoryWalker()).listFiles(input)).filter(
		hasEncryptedExtension,
	);
	await ensureDirectory(outputRoot);

	const report = (files: FileResult[]): BatchReport => ({
		operation: BatchOperation.DECRYPT,
		inputRoot: input,
		outputRoot,
		files,
	});

	if (sources.length === 0) {
		return report([]);
	}

	const password = await passwordSource();

	const files: FileResult[] = [];
	for (const source of sources) {
		try {
			const destination = join(outputRoot, toDecryptedName(relativeTo(input, source)));
			const container = await readFileBytes(source);
			const plaintext = decryptBytes(password, container);
			const bytes = plaintext.length;

			try {
				await ensureDirectory(dirname(destination));
				await writeFileAtomic(destination, plaintext);
			} finally {
				plaintext.fill(0);
			}
			files.push({ source, destination, bytes });
		} catch (err: unknown) {
			throw new BatchError(BatchOperation.DECRYPT, source, files.length, err);
		}

		notify(progress, {
			phase: 'file',
			path: source,
			completed: files.length,
			total: sources.length,
		});
	}

	return report(files);
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function createBatchKey(password: string): BatchKey {
	const salt = generateSalt();
	return { salt, cipher: AeadCipher.fromPassword(password, salt) };
}

async function assertDirectory(input: string): Promise<void> {
	if (!(await isDirectory(input))) {
		throw new ArgumentError(`Input is not a directory: ${input}`);
	}
}

/** Path of `file` below `root`; refuses anything that would escape the output tree. */
function relativeTo(root: string, file: string): string {
	const rel = relative(root, file);
	if (rel === '' || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
		throw new ArgumentError(`File is outside the input directory: ${file}`);
	}
	return rel;
}
