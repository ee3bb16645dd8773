import { afterEach, describe, expect, it, vi } from 'vitest';
import type { ProgressEvent } from '@sealfile/core';
import { byteProgress, notify } from '../progress.js';

const event: ProgressEvent = { phase: 'file', path: 'a.txt', completed: 1, total: 2 };

describe('progress', () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it('delivers events to the sink', () => {
		const sink = vi.fn();

		notify(sink, event);

		expect(sink).toHaveBeenCalledWith(event);
	});

	it('turns a throwing sink into a process warning', () => {
		const warn = vi.spyOn(process, 'emitWarning').mockImplementation(() => undefined);

		expect(() =>
			notify(() => {
				throw new Error('boom');
			}, event),
		).not.toThrow();
		expect(warn).toHaveBeenCalledWith('Progress observer failed: boom', 'SealfileProgressWarning');
	});

	it('byteProgress tags byte counts with phase and path', () => {
		const sink = vi.fn();

		byteProgress(sink, 'write', 'out.bin')?.(10, 20);

		expect(sink).toHaveBeenCalledWith({ phase: 'write', path: 'out.bin', completed: 10, total: 20 });
	});

	it('byteProgress returns nothing without a sink', () => {
		expect(byteProgress(undefined, 'read', 'in.bin')).toBeUndefined();
	});
});
