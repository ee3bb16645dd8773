export * from './constants.js';

export { BatchOperation } from './enums/batch-operation.js';
export { SaltPolicy } from './enums/salt-policy.js';

export {
	ArgumentError,
	BatchError,
	ConfigError,
	CryptoError,
	FormatError,
	IoError,
	SealError,
} from './errors.js';
export type { CryptoErrorCode, FormatErrorCode, SealErrorCode } from './errors.js';

export type { BatchReport, DecodedContainer, FileResult, ProgressEvent, ProgressPhase } from './types/index.js';
export type { IFileEnumerator, PasswordSource, ProgressSink } from './interfaces/index.js';
