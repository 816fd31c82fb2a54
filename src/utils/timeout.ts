// ---------------------------------------------------------------------------
// Timeout Utility: wraps an async function with a timeout that rejects
// with a structured OPERATION_TIMEOUT error.
// ---------------------------------------------------------------------------

import { createTimeoutError } from '../errors/resilience.js';

export interface TimeoutOptions {
	/** Label for the operation (used in error messages). */
	readonly operation?: string;
}

/**
 * Run an async function with a timeout. Rejects with `createTimeoutError()`
 * if the function doesn't settle within `timeoutMs`. A non-positive
 * `timeoutMs` disables the timer.
 *
 * The timer is cleaned up on resolution or rejection.
 */
export async function withTimeout<T>(
	fn: () => Promise<T>,
	timeoutMs: number,
	options?: TimeoutOptions,
): Promise<T> {
	const operation = options?.operation ?? 'unknown';

	if (timeoutMs <= 0) return fn();

	return new Promise<T>((resolve, reject) => {
		let settled = false;

		const timer = setTimeout(() => {
			if (!settled) {
				settled = true;
				reject(createTimeoutError(operation, timeoutMs));
			}
		}, timeoutMs);

		const finish = (): boolean => {
			if (settled) return false;
			settled = true;
			clearTimeout(timer);
			return true;
		};

		fn().then(
			(value) => {
				if (finish()) resolve(value);
			},
			(error: unknown) => {
				if (finish()) reject(error);
			},
		);
	});
}
