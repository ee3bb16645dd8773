/**
 * `read` / `write` events report bytes of a single file; `file` events report
 * files completed within a batch.
 */
export type ProgressPhase = 'read' | 'write' | 'file';

export interface ProgressEvent {
	readonly phase: ProgressPhase;
	/** File the event refers to. */
	readonly path: string;
	readonly completed: number;
	readonly total: number;
}
