import { BatchError } from '@sealfile/core';

/**
 * Lines shown for a failed command: one `Error:` line, plus the failing path
 * and completed count for directory operations.
 */
export function describeError(error: unknown): string[] {
	if (error instanceof BatchError) {
		return [
			`Error: ${messageOf(error.cause)}`,
			`failed at ${error.failedPath} after ${error.completed} file(s)`,
		];
	}
	return [`Error: ${messageOf(error)}`];
}

function messageOf(error: unknown): string {
	if (error instanceof Error) return error.message;
	return error === undefined ? 'Unknown error' : String(error);
}
