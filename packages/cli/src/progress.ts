import { basename } from 'node:path';
import type { ProgressEvent, ProgressSink } from '@sealfile/core';

const UNITS = ['KiB', 'MiB', 'GiB', 'TiB'] as const;

/** `512 B`, `1.5 KiB`, `3.0 MiB` */
export function formatBytes(bytes: number): string {
	if (bytes < 1024) return `${bytes} B`;

	let value = bytes / 1024;
	let unit: (typeof UNITS)[number] = 'KiB';
	for (const next of UNITS.slice(1)) {
		if (value < 1024) break;
		value /= 1024;
		unit = next;
	}
	return `${value.toFixed(1)} ${unit}`;
}

export function formatProgressText(label: string, event: ProgressEvent): string {
	const name = basename(event.path);
	if (event.phase === 'file') {
		return `${label} ${event.completed}/${event.total} files (${name})`;
	}

	const percent = event.total === 0 ? 100 : Math.floor((event.completed * 100) / event.total);
	const verb = event.phase === 'read' ? 'reading' : 'writing';
	return `${label}: ${verb} ${name} ${percent}% (${formatBytes(event.completed)} / ${formatBytes(event.total)})`;
}

/** Anything with a mutable `text`, such as an ora spinner. */
export interface TextTarget {
	text: string;
}

/**
 * Progress sink that rewrites the spinner text. Byte events for files smaller
 * than `threshold` are ignored; per-file batch events always show.
 */
export function spinnerProgress(target: TextTarget, label: string, threshold: number): ProgressSink {
	return (event) => {
		if (event.phase !== 'file' && event.total < threshold) return;
		target.text = formatProgressText(label, event);
	};
}
