import { randomBytes } from 'node:crypto';

/** Copy of `bytes` with the lowest bit of `index` inverted. */
export function flipBit(bytes: Uint8Array, index: number): Uint8Array {
	const copy = new Uint8Array(bytes);
	copy[index] = (copy[index] ?? 0) ^ 0x01;
	return copy;
}

export function randomKey(): Uint8Array {
	return randomBytes(32);
}

export function hex(bytes: Uint8Array): string {
	return Buffer.from(bytes).toString('hex');
}
