import type { BatchOperation } from '../enums/batch-operation.js';
import type { SaltPolicy } from '../enums/salt-policy.js';

export interface FileResult {
	readonly source: string;
	readonly destination: string;
	/** Bytes written to `destination`. */
	readonly bytes: number;
}

export interface BatchReport {
	readonly operation: BatchOperation;
	readonly inputRoot: string;
	readonly outputRoot: string;
	readonly files: readonly FileResult[];
	/** Only set for encryption. */
	readonly saltPolicy?: SaltPolicy;
}
