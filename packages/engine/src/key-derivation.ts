import { randomBytes } from 'node:crypto';
import { argon2id } from '@noble/hashes/argon2.js';

import { ARGON2_PARAMS, CryptoError, SALT_LENGTH } from '@sealfile/core';

/**
 * Derive the 32-byte container key from a password and a 32-byte salt.
 *
 * Argon2id v0x13 with m = 64 MiB, t = 3, p = 4. The parameters are fixed so that
 * any implementation of the format derives the same key from the same inputs.
 */
export function deriveKey(password: string | Uint8Array, salt: Uint8Array): Uint8Array {
	if (salt.length !== SALT_LENGTH) {
		throw new CryptoError(
			'KEY_DERIVATION',
			`Salt must be ${SALT_LENGTH} bytes, got ${salt.length}`,
		);
	}

	const passwordBytes =
		typeof password === 'string' ? Buffer.from(password, 'utf-8') : password;

	try {
		return argon2id(passwordBytes, salt, {
			t: ARGON2_PARAMS.iterations,
			m: ARGON2_PARAMS.memory,
			p: ARGON2_PARAMS.parallelism,
			dkLen: ARGON2_PARAMS.keyLength,
			version: ARGON2_PARAMS.version,
		});
	} catch (err: unknown) {
		throw new CryptoError(
			'KEY_DERIVATION',
			`Failed to derive key from password: ${err instanceof Error ? err.message : String(err)}`,
			{ cause: err },
		);
	} finally {
		// Only wipe the copy made here; caller-owned bytes are left alone.
		if (typeof password === 'string') {
			passwordBytes.fill(0);
		}
	}
}

/** 32 bytes from the OS CSPRNG. */
export function generateSalt(): Uint8Array {
	return randomBytes(SALT_LENGTH);
}
