import { AeadCipher } from './aead-cipher.js';
import { decodeContainer, encodeContainer } from './container-codec.js';
import { generateSalt } from './key-derivation.js';

/**
 * Seal `plaintext` under `password` into a complete container with a fresh salt.
 * Any failure is thrown; nothing partial is returned.
 */
export function encryptBytes(password: string, plaintext: Uint8Array): Uint8Array {
	const salt = generateSalt();
	const cipher = AeadCipher.fromPassword(password, salt);
	try {
		return encodeContainer(salt, cipher.encrypt(plaintext));
	} finally {
		cipher.destroy();
	}
}

/** Open a container produced by {@link encryptBytes} (or any version-1 writer). */
export function decryptBytes(password: string, container: Uint8Array): Uint8Array {
	const { salt, payload } = decodeContainer(container);
	const cipher = AeadCipher.fromPassword(password, salt);
	try {
		return cipher.decrypt(payload);
	} finally {
		cipher.destroy();
	}
}
