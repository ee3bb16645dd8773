import {
	ARGON2_PARAMS,
	AUTH_TAG_LENGTH,
	FormatError,
	NONCE_LENGTH,
} from '@sealfile/core';
import { decodeContainer, isContainer, readFileBytes } from '@sealfile/engine';
import { Command } from 'commander';
import { formatBytes } from '../progress.js';
import { reportError } from '../run.js';
import { bold, failMark, row } from '../theme.js';

export interface ContainerSummary {
	readonly version: number;
	readonly saltHex: string;
	readonly nonceHex: string;
	/** Ciphertext length without the authentication tag. */
	readonly ciphertextBytes: number;
	readonly totalBytes: number;
}

/** Header fields of a container, read without a password. */
export function summarizeContainer(bytes: Uint8Array): ContainerSummary {
	const { version, salt, payload } = decodeContainer(bytes);
	if (payload.length < NONCE_LENGTH + AUTH_TAG_LENGTH) {
		throw new FormatError(
			'INVALID_INPUT',
			`Encrypted payload too short (${payload.length} bytes). Expected at least ${NONCE_LENGTH + AUTH_TAG_LENGTH} bytes.`,
		);
	}

	return {
		version,
		saltHex: Buffer.from(salt).toString('hex'),
		nonceHex: Buffer.from(payload.subarray(0, NONCE_LENGTH)).toString('hex'),
		ciphertextBytes: payload.length - NONCE_LENGTH - AUTH_TAG_LENGTH,
		totalBytes: bytes.length,
	};
}

export const inspectCommand = new Command('inspect')
	.description('Show the header of an encrypted file (no password needed)')
	.argument('<file>', 'Encrypted file')
	.action(async (file: string) => {
		let summary: ContainerSummary;
		try {
			const bytes = await readFileBytes(file);
			if (!isContainer(bytes)) {
				console.error(`\n  ${failMark(`Not an encrypted file: ${file}`)}\n`);
				process.exitCode = 1;
				return;
			}
			summary = summarizeContainer(bytes);
		} catch (error: unknown) {
			reportError(error);
			return;
		}

		console.log('');
		console.log(`  ${bold(file)}`);
		console.log('');
		console.log(row('Version', String(summary.version)));
		console.log(row('Salt', summary.saltHex));
		console.log(row('Nonce', summary.nonceHex));
		console.log(row('Ciphertext', formatBytes(summary.ciphertextBytes)));
		console.log(row('Size', formatBytes(summary.totalBytes)));
		console.log(
			row(
				'KDF',
				`Argon2id v${ARGON2_PARAMS.version}, m=${ARGON2_PARAMS.memory} KiB, t=${ARGON2_PARAMS.iterations}, p=${ARGON2_PARAMS.parallelism}`,
			),
		);
		console.log(row('Cipher', 'AES-256-GCM'));
		console.log('');
	});
