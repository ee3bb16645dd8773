import {
	ArgumentError,
	CONTAINER_MAGIC,
	CONTAINER_VERSION,
	type DecodedContainer,
	FormatError,
	HEADER_LENGTH,
	MAGIC_LENGTH,
	SALT_LENGTH,
	SUPPORTED_VERSIONS,
} from '@sealfile/core';

const SALT_OFFSET = MAGIC_LENGTH + 1;

/**
 * Wrap a sealed payload in the on-disk envelope.
 *
 * Binary layout:
 * ```
 * ["ENCR" — 4 bytes][version — 1 byte][salt — 32 bytes][payload — variable]
 * ```
 */
export function encodeContainer(salt: Uint8Array, payload: Uint8Array): Uint8Array {
	if (salt.length !== SALT_LENGTH) {
		throw new ArgumentError(`Salt must be ${SALT_LENGTH} bytes, got ${salt.length}`);
	}

	const out = new Uint8Array(HEADER_LENGTH + payload.length);
	out.set(CONTAINER_MAGIC, 0);
	out[MAGIC_LENGTH] = CONTAINER_VERSION;
	out.set(salt, SALT_OFFSET);
	out.set(payload, HEADER_LENGTH);
	return out;
}

/**
 * Split a container into its salt and payload. Only the envelope is checked;
 * the payload is authenticated later by the cipher.
 */
export function decodeContainer(bytes: Uint8Array): DecodedContainer {
	if (bytes.length < HEADER_LENGTH) {
		throw new FormatError(
			'TOO_SHORT',
			`Invalid encrypted file: too short (${bytes.length} bytes). Expected at least ${HEADER_LENGTH} bytes.`,
		);
	}

	if (!hasMagic(bytes)) {
		throw new FormatError('BAD_MAGIC', 'Invalid encrypted file: wrong magic bytes');
	}

	const version = bytes[MAGIC_LENGTH] ?? 0;
	if (!SUPPORTED_VERSIONS.includes(version)) {
		throw new FormatError('UNSUPPORTED_VERSION', `Unsupported file version: ${version}`);
	}

	return {
		version,
		salt: bytes.slice(SALT_OFFSET, HEADER_LENGTH),
		payload: bytes.subarray(HEADER_LENGTH),
	};
}

/** Cheap sniff: long enough for a header and starts with the magic. */
export function isContainer(bytes: Uint8Array): boolean {
	return bytes.length >= HEADER_LENGTH && hasMagic(bytes);
}

function hasMagic(bytes: Uint8Array): boolean {
	return CONTAINER_MAGIC.every((b, i) => bytes[i] === b);
}
