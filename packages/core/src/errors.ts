import type { BatchOperation } from './enums/batch-operation.js';

export type FormatErrorCode = 'TOO_SHORT' | 'BAD_MAGIC' | 'UNSUPPORTED_VERSION' | 'INVALID_INPUT';

export type CryptoErrorCode = 'KEY_DERIVATION' | 'AUTHENTICATION';

export type SealErrorCode = 'IO' | 'ARGUMENT' | 'CONFIG' | 'BATCH' | FormatErrorCode | CryptoErrorCode;

// ---------------------------------------------------------------------------
// Base
// ---------------------------------------------------------------------------

export class SealError extends Error {
	constructor(
		public readonly code: SealErrorCode,
		message: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = 'SealError';
	}
}

// ---------------------------------------------------------------------------
// Taxonomy
// ---------------------------------------------------------------------------

/** Open, read, write or rename failure. */
export class IoError extends SealError {
	constructor(
		public readonly path: string,
		action: string,
		cause: unknown,
	) {
		super('IO', `Failed to ${action}: ${path} (${describeCause(cause)})`, { cause });
		this.name = 'IoError';
	}
}

/** The bytes are not a container this implementation can read. */
export class FormatError extends SealError {
	constructor(
		public override readonly code: FormatErrorCode,
		message: string,
	) {
		super(code, message);
		this.name = 'FormatError';
	}
}

/**
 * Key derivation or authentication failure. `AUTHENTICATION` deliberately does
 * not say whether the password was wrong or the data was modified.
 */
export class CryptoError extends SealError {
	constructor(
		public override readonly code: CryptoErrorCode,
		message: string,
		options?: { cause?: unknown },
	) {
		super(code, message, options);
		this.name = 'CryptoError';
	}
}

export class ArgumentError extends SealError {
	constructor(message: string) {
		super('ARGUMENT', message);
		this.name = 'ArgumentError';
	}
}

/** The user config file cannot be parsed or fails validation. */
export class ConfigError extends SealError {
	constructor(
		public readonly path: string,
		detail: string,
		options?: { cause?: unknown },
	) {
		super('CONFIG', `Invalid config file at ${path}: ${detail}`, options);
		this.name = 'ConfigError';
	}
}

/** Raised when a file inside a directory operation fails; the batch stops there. */
export class BatchError extends SealError {
	constructor(
		public readonly operation: BatchOperation,
		public readonly failedPath: string,
		public readonly completed: number,
		cause: unknown,
	) {
		super(
			'BATCH',
			`Directory ${operation} failed at ${failedPath} after ${completed} file(s): ${describeCause(cause)}`,
			{ cause },
		);
		this.name = 'BatchError';
	}
}

function describeCause(cause: unknown): string {
	return cause instanceof Error ? cause.message : String(cause);
}
