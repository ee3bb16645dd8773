export type { DecodedContainer } from './container.js';
export type { ProgressEvent, ProgressPhase } from './progress.js';
export type { BatchReport, FileResult } from './result.js';
