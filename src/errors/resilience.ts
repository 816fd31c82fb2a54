// ---------------------------------------------------------------------------
// Resilience Errors: Timeout
// ---------------------------------------------------------------------------

import type { CacheError } from './base.js';
import { createCacheError, isCacheError, withFields } from './base.js';

export const createTimeoutError = (
	operation: string,
	timeoutMs: number,
): CacheError & {
	readonly operation: string;
	readonly timeoutMs: number;
} =>
	withFields(
		createCacheError(`Operation "${operation}" timed out after ${timeoutMs}ms`, {
			name: 'TimeoutError',
			code: 'OPERATION_TIMEOUT',
			statusCode: 504,
			metadata: { operation, timeoutMs },
		}),
		{ operation, timeoutMs },
	);

export const isTimeoutError = (
	value: unknown,
): value is CacheError & {
	readonly operation: string;
	readonly timeoutMs: number;
} => isCacheError(value) && value.code === 'OPERATION_TIMEOUT';
