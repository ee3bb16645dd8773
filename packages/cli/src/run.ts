import type { BatchReport, PasswordSource, ProgressSink } from '@sealfile/core';
import ora, { type Ora } from 'ora';
import { type SealfileConfig, loadConfig } from './config.js';
import { describeError } from './errors.js';
import { spinnerProgress } from './progress.js';
import { createPasswordSource } from './prompt.js';
import { danger, dim } from './theme.js';

export interface OperationContext {
	readonly config: SealfileConfig;
	readonly spinner: Ora;
	/** Spinner-driven progress display, labelled like the spinner. */
	readonly progress: ProgressSink;
	/** Password source that pauses the spinner while prompting. */
	passwordSource(confirm: boolean): PasswordSource;
}

/**
 * Load config, start a spinner labelled `label`, run `body`, and turn any
 * failure into red error lines with exit status 1.
 */
export async function runOperation(
	label: string,
	body: (context: OperationContext) => Promise<void>,
): Promise<void> {
	let config: SealfileConfig;
	try {
		config = loadConfig();
	} catch (error: unknown) {
		reportError(error);
		return;
	}

	const spinner = ora({ text: `${label}...`, indent: 2 }).start();
	const context: OperationContext = {
		config,
		spinner,
		progress: spinnerProgress(spinner, label, config.progressThreshold),
		passwordSource: (confirm) => pausing(spinner, createPasswordSource({ confirm })),
	};

	try {
		await body(context);
	} catch (error: unknown) {
		reportError(error, spinner);
	}
}

export function reportError(error: unknown, spinner?: Ora): void {
	const [first = 'Error', ...rest] = describeError(error);
	if (spinner) {
		spinner.fail(danger(first));
	} else {
		console.error(`\n  ${danger(first)}`);
	}
	for (const line of rest) {
		console.error(`    ${dim(line)}`);
	}
	process.exitCode = 1;
}

/** `source → destination` lines for `--verbose`. */
export function printFiles(report: BatchReport): void {
	for (const file of report.files) {
		console.log(`    ${dim(`${file.source} → ${file.destination}`)}`);
	}
}

function pausing(spinner: Ora, source: PasswordSource): PasswordSource {
	return async () => {
		const wasSpinning = spinner.isSpinning;
		if (wasSpinning) spinner.stop();
		try {
			return await source();
		} finally {
			if (wasSpinning) spinner.start();
		}
	};
}
