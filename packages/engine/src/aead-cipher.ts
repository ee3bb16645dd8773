import { createCipheriv, createDecipheriv, randomBytes } from 'node:crypto';

import {
	ArgumentError,
	AUTH_TAG_LENGTH,
	CryptoError,
	FormatError,
	KEY_LENGTH,
	NONCE_LENGTH,
} from '@sealfile/core';
import { deriveKey } from './key-derivation.js';

const ALGORITHM = 'aes-256-gcm';

/**
 * AES-256-GCM bound to a single derived key.
 *
 * Output layout of {@link AeadCipher.encrypt}:
 * ```
 * [nonce — 12 bytes][ciphertext — variable][authTag — 16 bytes]
 * ```
 *
 * Every call draws a fresh random nonce, so one instance may seal any number of
 * files. The key is copied on construction and wiped by {@link AeadCipher.destroy}.
 */
export class AeadCipher {
	private readonly key: Buffer;
	private destroyed = false;

	constructor(key: Uint8Array) {
		if (key.length !== KEY_LENGTH) {
			throw new ArgumentError(`Key must be ${KEY_LENGTH} bytes, got ${key.length}`);
		}
		this.key = Buffer.from(key);
	}

	/** Derive a key with Argon2id and wrap it. The intermediate key bytes are wiped. */
	static fromPassword(password: string | Uint8Array, salt: Uint8Array): AeadCipher {
		const key = deriveKey(password, salt);
		try {
			return new AeadCipher(key);
		} finally {
			key.fill(0);
		}
	}

	get isDestroyed(): boolean {
		return this.destroyed;
	}

	encrypt(plaintext: Uint8Array): Uint8Array {
		this.assertUsable();

		const nonce = randomBytes(NONCE_LENGTH);
		const cipher = createCipheriv(ALGORITHM, this.key, nonce, { authTagLength: AUTH_TAG_LENGTH });
		const encrypted = Buffer.concat([cipher.update(plaintext), cipher.final()]);
		const authTag = cipher.getAuthTag();

		return Buffer.concat([nonce, encrypted, authTag]);
	}

	/**
	 * Verify and decrypt `nonce ‖ ciphertext ‖ tag`.
	 *
	 * @throws FormatError `INVALID_INPUT` when the input cannot hold a nonce.
	 * @throws CryptoError `AUTHENTICATION` when the tag does not verify. Nothing
	 * decrypted before verification is returned.
	 */
	decrypt(input: Uint8Array): Uint8Array {
		this.assertUsable();

		if (input.length < NONCE_LENGTH) {
			throw new FormatError(
				'INVALID_INPUT',
				`Encrypted payload too short (${input.length} bytes). Expected at least ${NONCE_LENGTH} bytes.`,
			);
		}
		if (input.length < NONCE_LENGTH + AUTH_TAG_LENGTH) {
			throw authenticationFailure();
		}

		const nonce = input.subarray(0, NONCE_LENGTH);
		const ciphertext = input.subarray(NONCE_LENGTH, input.length - AUTH_TAG_LENGTH);
		const authTag = input.subarray(input.length - AUTH_TAG_LENGTH);

		const decipher = createDecipheriv(ALGORITHM, this.key, nonce, {
			authTagLength: AUTH_TAG_LENGTH,
		});
		decipher.setAuthTag(authTag);

		const head = decipher.update(ciphertext);
		try {
			return Buffer.concat([head, decipher.final()]);
		} catch (err: unknown) {
			throw authenticationFailure(err);
		} finally {
			// `head` is unauthenticated until final() succeeds; the returned
			// plaintext is a separate buffer produced by concat.
			head.fill(0);
		}
	}

	/** Zero-fill the key. The instance is unusable afterwards. */
	destroy(): void {
		this.key.fill(0);
		this.destroyed = true;
	}

	private assertUsable(): void {
		if (this.destroyed) {
			throw new ArgumentError('Cipher has been destroyed');
		}
	}
}

function authenticationFailure(cause?: unknown): CryptoError {
	return new CryptoError(
		'AUTHENTICATION',
		'Decryption failed. Wrong password or corrupted data.',
		cause === undefined ? undefined : { cause },
	);
}
