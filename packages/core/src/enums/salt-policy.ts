/**
 * How salts (and therefore keys) are assigned when a directory is encrypted.
 *
 * `BATCH` pays the Argon2id cost once and seals every file with the same key;
 * each file still gets its own random nonce. `PER_FILE` derives a fresh key for
 * every file.
 */
export enum SaltPolicy {
	BATCH = 'batch',
	PER_FILE = 'per-file',
}
