// ---------------------------------------------------------------------------
// Retry: re-run a failed async operation after a fixed delay
// ---------------------------------------------------------------------------

import {
	type CacheError,
	createCacheError,
	isCacheError,
	withFields,
} from '../errors/index.js';

export interface RetryOptions {
	/** Attempts including the first. Defaults to `2`. */
	readonly maxAttempts?: number;
	/** Pause between attempts. Defaults to `0`. */
	readonly delayMs?: number;
	/** Return `false` to rethrow the error unchanged. */
	readonly shouldRetry?: (error: unknown, attempt: number) => boolean;
	/** Called before the next attempt starts. */
	readonly onRetry?: (error: unknown, attempt: number) => void;
}

/** Thrown when every attempt failed. The last attempt's error is the `cause`. */
export const createRetryExhaustedError = (
	attempts: number,
	lastError: unknown,
): CacheError & { readonly attempts: number } =>
	withFields(
		createCacheError(`All ${attempts} retry attempts exhausted`, {
			name: 'RetryExhaustedError',
			code: 'RETRY_EXHAUSTED',
			cause: lastError,
			metadata: { attempts },
		}),
		{ attempts },
	);

export const isRetryExhaustedError = (
	value: unknown,
): value is CacheError & { readonly attempts: number } =>
	isCacheError(value) && value.code === 'RETRY_EXHAUSTED';

/**
 * Run `fn` up to `maxAttempts` times.
 *
 * @example
 * ```ts
 * const bytes = await retry(() => readRange(handle), {
 *   delayMs: 25,
 *   shouldRetry: (err) => !isStaleError(err),
 * });
 * ```
 */
export async function retry<T>(
	fn: (attempt: number) => Promise<T>,
	options: RetryOptions = {},
): Promise<T> {
	const maxAttempts = Math.max(1, options.maxAttempts ?? 2);
	const delayMs = Math.max(0, options.delayMs ?? 0);
	const shouldRetry = options.shouldRetry ?? (() => true);

	let lastError: unknown;
	for (let attempt = 1; attempt <= maxAttempts; attempt++) {
		try {
			return await fn(attempt);
		} catch (error) {
			lastError = error;
			if (!shouldRetry(error, attempt)) throw error;
			if (attempt === maxAttempts) break;
			options.onRetry?.(error, attempt + 1);
			if (delayMs > 0) {
				await new Promise<void>((resolve) => setTimeout(resolve, delayMs));
			}
		}
	}

	throw createRetryExhaustedError(maxAttempts, lastError);
}
