// ---------------------------------------------------------------------------
// Cache Errors: source files, in-memory capacity, persisted records
// ---------------------------------------------------------------------------

import type { CacheError } from './base.js';
import { createCacheError, isCacheError, withFields } from './base.js';

export interface FileFingerprint {
	readonly size: number;
	readonly mtimeMs: number;
}

// ---------------------------------------------------------------------------
// NotFound
// ---------------------------------------------------------------------------

export const createNotFoundError = (
	path: string,
	options: { cause?: unknown } = {},
): CacheError & { readonly path: string } =>
	withFields(
		createCacheError(`File not found: ${path}`, {
			name: 'NotFoundError',
			code: 'NOT_FOUND',
			statusCode: 404,
			cause: options.cause,
			metadata: { path },
		}),
		{ path },
	);

// ---------------------------------------------------------------------------
// TooLarge
// ---------------------------------------------------------------------------

export const createTooLargeError = (
	key: string,
	sizeBytes: number,
	maxBytes: number,
): CacheError & { readonly sizeBytes: number; readonly maxBytes: number } =>
	withFields(
		createCacheError(
			`Value for "${key}" is ${sizeBytes} bytes, over the ${maxBytes}-byte capacity`,
			{
				name: 'TooLargeError',
				code: 'TOO_LARGE',
				statusCode: 413,
				metadata: { key, sizeBytes, maxBytes },
			},
		),
		{ sizeBytes, maxBytes },
	);

// ---------------------------------------------------------------------------
// Stale
// ---------------------------------------------------------------------------

export const createStaleError = (
	path: string,
	expected: FileFingerprint,
	actual: FileFingerprint,
): CacheError & { readonly path: string } =>
	withFields(
		createCacheError(`File changed since it was opened: ${path}`, {
			name: 'StaleError',
			code: 'STALE',
			statusCode: 409,
			metadata: { path, expected, actual },
		}),
		{ path },
	);

// ---------------------------------------------------------------------------
// IOFailure
// ---------------------------------------------------------------------------

export const createIOFailureError = (
	target: string,
	operation: 'read' | 'write' | 'delete' | 'open' | 'stat' | 'sweep',
	options: { cause?: unknown } = {},
): CacheError & { readonly target: string } =>
	withFields(
		createCacheError(`Failed to ${operation} ${target}`, {
			name: 'IOFailureError',
			code: 'IO_FAILURE',
			statusCode: 500,
			cause: options.cause,
			metadata: { target, operation },
		}),
		{ target },
	);

// ---------------------------------------------------------------------------
// Expired
// ---------------------------------------------------------------------------

export const createExpiredError = (
	key: string,
	expiredAt: number,
): CacheError & { readonly expiredAt: number } =>
	withFields(
		createCacheError(`Cached record ${key} expired`, {
			name: 'ExpiredError',
			code: 'EXPIRED',
			statusCode: 410,
			metadata: { key, expiredAt },
		}),
		{ expiredAt },
	);

// ---------------------------------------------------------------------------
// CorruptRecord
// ---------------------------------------------------------------------------

export const createCorruptRecordError = (
	key: string,
	options: { cause?: unknown } = {},
): CacheError =>
	createCacheError(`Cached record ${key} could not be decoded`, {
		name: 'CorruptRecordError',
		code: 'CORRUPT_RECORD',
		statusCode: 422,
		cause: options.cause,
		metadata: { key },
	});

// ---------------------------------------------------------------------------
// Chunk index out of range
// ---------------------------------------------------------------------------

export const createChunkOutOfRangeError = (
	path: string,
	index: number,
	chunkCount: number,
): CacheError & { readonly index: number } =>
	withFields(
		createCacheError(
			`Chunk ${index} is out of range for ${path} (${chunkCount} chunks)`,
			{
				name: 'ChunkOutOfRangeError',
				code: 'CHUNK_OUT_OF_RANGE',
				statusCode: 416,
				metadata: { path, index, chunkCount },
			},
		),
		{ index },
	);

// ---------------------------------------------------------------------------
// Type Guards
// ---------------------------------------------------------------------------

export const isNotFoundError = (
	value: unknown,
): value is CacheError & { readonly path: string } =>
	isCacheError(value) && value.code === 'NOT_FOUND';

export const isTooLargeError = (
	value: unknown,
): value is CacheError & { readonly sizeBytes: number; readonly maxBytes: number } =>
	isCacheError(value) && value.code === 'TOO_LARGE';

export const isStaleError = (
	value: unknown,
): value is CacheError & { readonly path: string } =>
	isCacheError(value) && value.code === 'STALE';

export const isIOFailureError = (
	value: unknown,
): value is CacheError & { readonly target: string } =>
	isCacheError(value) && value.code === 'IO_FAILURE';

export const isExpiredError = (
	value: unknown,
): value is CacheError & { readonly expiredAt: number } =>
	isCacheError(value) && value.code === 'EXPIRED';

export const isCorruptRecordError = (value: unknown): value is CacheError =>
	isCacheError(value) && value.code === 'CORRUPT_RECORD';

export const isChunkOutOfRangeError = (
	value: unknown,
): value is CacheError & { readonly index: number } =>
	isCacheError(value) && value.code === 'CHUNK_OUT_OF_RANGE';
