import type { ProgressEvent, ProgressPhase, ProgressSink } from '@sealfile/core';

/** Deliver an event; a throwing sink becomes a process warning. */
export function notify(sink: ProgressSink | undefined, event: ProgressEvent): void {
	if (!sink) return;
	try {
		sink(event);
	} catch (err: unknown) {
		process.emitWarning(
			`Progress observer failed: ${err instanceof Error ? err.message : String(err)}`,
			'SealfileProgressWarning',
		);
	}
}

export type ByteProgress = (completed: number, total: number) => void;

/** Adapt a sink to the byte counters reported by the file I/O helpers. */
export function byteProgress(
	sink: ProgressSink | undefined,
	phase: Exclude<ProgressPhase, 'file'>,
	path: string,
): ByteProgress | undefined {
	if (!sink) return undefined;
	return (completed, total) => notify(sink, { phase, path, completed, total });
}
