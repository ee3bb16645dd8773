import { describe, expect, it } from 'vitest';
import { BatchError, BatchOperation, CryptoError, FormatError } from '@sealfile/core';
import { describeError } from '../errors.js';

describe('describeError', () => {
	it('prints one Error line for single-file failures', () => {
		expect(describeError(new FormatError('BAD_MAGIC', 'Invalid encrypted file: wrong magic bytes'))).toEqual([
			'Error: Invalid encrypted file: wrong magic bytes',
		]);
	});

	it('adds the failing path and completed count for batches', () => {
		const cause = new CryptoError('AUTHENTICATION', 'Decryption failed. Wrong password or corrupted data.');
		const error = new BatchError(BatchOperation.DECRYPT, '/vault/b.txt.encrypted', 3, cause);

		expect(describeError(error)).toEqual([
			'Error: Decryption failed. Wrong password or corrupted data.',
			'failed at /vault/b.txt.encrypted after 3 file(s)',
		]);
	});

	it('handles thrown non-errors', () => {
		expect(describeError('boom')).toEqual(['Error: boom']);
		expect(describeError(undefined)).toEqual(['Error: Unknown error']);
	});
});
