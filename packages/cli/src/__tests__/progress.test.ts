import { describe, expect, it } from 'vitest';
import { formatBytes, formatProgressText, spinnerProgress } from '../progress.js';

describe('progress', () => {
	describe('formatBytes', () => {
		it.each([
			[0, '0 B'],
			[1023, '1023 B'],
			[1024, '1.0 KiB'],
			[1536, '1.5 KiB'],
			[5 * 1024 * 1024, '5.0 MiB'],
			[2 * 1024 ** 3, '2.0 GiB'],
		])('%i → %s', (bytes, expected) => {
			expect(formatBytes(bytes)).toBe(expected);
		});
	});

	describe('formatProgressText', () => {
		it('shows percent and sizes for byte events', () => {
			expect(
				formatProgressText('Encrypting', {
					phase: 'read',
					path: '/data/a.bin',
					completed: 1024,
					total: 2048,
				}),
			).toBe('Encrypting: reading a.bin 50% (1.0 KiB / 2.0 KiB)');
		});

		it('treats an empty write as complete', () => {
			expect(
				formatProgressText('Encrypting', { phase: 'write', path: 'e', completed: 0, total: 0 }),
			).toBe('Encrypting: writing e 100% (0 B / 0 B)');
		});

		it('counts files for batch events', () => {
			expect(
				formatProgressText('Decrypting', {
					phase: 'file',
					path: '/vault/b.txt.encrypted',
					completed: 2,
					total: 5,
				}),
			).toBe('Decrypting 2/5 files (b.txt.encrypted)');
		});
	});

	describe('spinnerProgress', () => {
		it('ignores byte events below the threshold', () => {
			const target = { text: 'Encrypting...' };
			const sink = spinnerProgress(target, 'Encrypting', 1024);

			sink({ phase: 'read', path: 'small', completed: 100, total: 100 });

			expect(target.text).toBe('Encrypting...');
		});

		it('updates the text for large files and for every batch file', () => {
			const target = { text: '' };
			const sink = spinnerProgress(target, 'Encrypting', 1024);

			sink({ phase: 'write', path: 'big', completed: 512, total: 2048 });
			expect(target.text).toBe('Encrypting: writing big 25% (512 B / 2.0 KiB)');

			sink({ phase: 'file', path: 'tiny', completed: 1, total: 3 });
			expect(target.text).toBe('Encrypting 1/3 files (tiny)');
		});
	});
});
