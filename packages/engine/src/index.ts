// Primitives
export { deriveKey, generateSalt } from './key-derivation.js';
export { AeadCipher } from './aead-cipher.js';
export { decodeContainer, encodeContainer, isContainer } from './container-codec.js';

// Byte-level API
export { decryptBytes, encryptBytes } from './sealed-bytes.js';

// Files and directories
export { decryptFile, encryptFile } from './file-operations.js';
export { decryptDirectory, encryptDirectory } from './batch-processor.js';
export { DirectoryWalker } from './directory-walker.js';
export { readFileBytes, writeFileAtomic } from './file-io.js';
export {
	defaultDecryptedDirectory,
	defaultEncryptedDirectory,
	hasEncryptedExtension,
	toDecryptedName,
	toEncryptedName,
} from './output-paths.js';

export type { FileOperationOptions } from './file-operations.js';
export type { DirectoryOperationOptions, EncryptDirectoryOptions } from './batch-processor.js';
