export interface DecodedContainer {
	readonly version: number;
	/** 32 bytes. */
	readonly salt: Uint8Array;
	/** nonce ‖ ciphertext ‖ tag, exactly as the cipher produced it. */
	readonly payload: Uint8Array;
}
