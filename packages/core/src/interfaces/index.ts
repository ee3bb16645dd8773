export type { IFileEnumerator } from './file-enumerator.interface.js';
export type { PasswordSource } from './password-source.interface.js';
export type { ProgressSink } from './progress-sink.interface.js';
