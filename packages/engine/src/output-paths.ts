import { extname } from 'node:path';

import { DECRYPTED_DIR_SUFFIX, DECRYPTED_EXTENSION, ENCRYPTED_EXTENSION } from '@sealfile/core';

// ---------------------------------------------------------------------------
// File names
// ---------------------------------------------------------------------------

/** `report.txt` → `report.txt.encrypted`, `README` → `README.encrypted`. */
export function toEncryptedName(path: string): string {
	return `${path}${ENCRYPTED_EXTENSION}`;
}

/**
 * `report.txt.encrypted` → `report.txt`. A path whose final extension is not
 * `.encrypted` gets `.decrypted` appended instead.
 */
export function toDecryptedName(path: string): string {
	if (hasEncryptedExtension(path)) {
		return path.slice(0, -ENCRYPTED_EXTENSION.length);
	}
	return `${path}${DECRYPTED_EXTENSION}`;
}

/**
 * True when the final extension is exactly `.encrypted`. A bare dotfile named
 * `.encrypted` has no extension and does not match.
 */
export function hasEncryptedExtension(path: string): boolean {
	return extname(path) === ENCRYPTED_EXTENSION;
}

// ---------------------------------------------------------------------------
// Directory roots
// ---------------------------------------------------------------------------

/** `photos` → `photos.encrypted` */
export function defaultEncryptedDirectory(input: string): string {
	return `${trimTrailingSeparators(input)}${ENCRYPTED_EXTENSION}`;
}

/** `photos.encrypted` → `photos`; anything else → `<input>_decrypted`. */
export function defaultDecryptedDirectory(input: string): string {
	const trimmed = trimTrailingSeparators(input);
	if (trimmed.endsWith(ENCRYPTED_EXTENSION) && trimmed.length > ENCRYPTED_EXTENSION.length) {
		return trimmed.slice(0, -ENCRYPTED_EXTENSION.length);
	}
	return `${trimmed}${DECRYPTED_DIR_SUFFIX}`;
}

function trimTrailingSeparators(path: string): string {
	const trimmed = path.replace(/[\\/]+$/, '');
	return trimmed.length > 0 ? trimmed : path;
}
