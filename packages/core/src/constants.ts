// ---------------------------------------------------------------------------
// Container format (version 1)
//
//   offset  size  field
//   0       4     magic "ENCR"
//   4       1     version
//   5       32    salt
//   37      12    nonce
//   49      ...   AES-256-GCM ciphertext + 16-byte tag
// ---------------------------------------------------------------------------

/** "ENCR" */
export const CONTAINER_MAGIC = Object.freeze([0x45, 0x4e, 0x43, 0x52] as const);
export const CONTAINER_VERSION = 1;
export const SUPPORTED_VERSIONS: readonly number[] = [CONTAINER_VERSION];

export const MAGIC_LENGTH = 4;
export const VERSION_LENGTH = 1;
/** Salt length in bytes. */
export const SALT_LENGTH = 32;
/** Derived key length in bytes (AES-256). */
export const KEY_LENGTH = 32;
/** AES-GCM nonce length in bytes. */
export const NONCE_LENGTH = 12;
/** AES-GCM authentication tag length in bytes. */
export const AUTH_TAG_LENGTH = 16;

/** magic + version + salt */
export const HEADER_LENGTH = MAGIC_LENGTH + VERSION_LENGTH + SALT_LENGTH;

/** Argon2id parameters. Part of the format: changing any of them makes existing containers undecryptable. */
export const ARGON2_PARAMS = {
	/** Memory cost in KiB (64 MiB). */
	memory: 65_536,
	/** Passes over memory. */
	iterations: 3,
	parallelism: 4,
	/** Argon2 version 0x13. */
	version: 0x13,
	keyLength: KEY_LENGTH,
} as const;

// ---------------------------------------------------------------------------
// File naming
// ---------------------------------------------------------------------------

export const ENCRYPTED_EXTENSION = '.encrypted';
export const DECRYPTED_EXTENSION = '.decrypted';
export const DECRYPTED_DIR_SUFFIX = '_decrypted';

/** Chunk size for reads and writes that report byte progress. */
export const IO_CHUNK_SIZE = 64 * 1024;
