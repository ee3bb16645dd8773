import type { ProgressEvent } from '../types/progress.js';

/**
 * One-way observer. Called synchronously; it must not block, and anything it
 * throws is reported as a process warning without affecting the operation.
 */
export type ProgressSink = (event: ProgressEvent) => void;
