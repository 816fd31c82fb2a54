// ---------------------------------------------------------------------------
// Lazy Text Loader
// ---------------------------------------------------------------------------
//
// Random and sequential access to a manuscript file of any size without
// holding it in memory. The file is stat'ed once on open; chunks are read
// on demand with positioned reads and kept in a small LRU. Each line
// iteration opens its own read stream.
//
// A loader is bound to the size and mtime it saw on open. If either moves,
// the next chunk read or iteration fails with STALE rather than returning
// text from a different version of the file.
// ---------------------------------------------------------------------------

import { createReadStream } from 'node:fs';
import { type FileHandle, open, stat } from 'node:fs/promises';
import { createInterface } from 'node:readline';
import type { BoundedLRUCache } from '../cache/lru-cache.js';
import { createBoundedLRUCache } from '../cache/lru-cache.js';
import { DEFAULT_CHUNK_SIZE, DEFAULT_MAX_CACHED_CHUNKS } from '../config/schema.js';
import {
	createChunkOutOfRangeError,
	createIOFailureError,
	createNotFoundError,
	createStaleError,
	type FileFingerprint,
	isCacheError,
	isNotFoundError,
	isStaleError,
	systemErrorCode,
} from '../errors/index.js';
import type { Logger } from '../logger.js';
import { getDefaultLogger } from '../logger.js';
import { isRetryExhaustedError, retry } from '../utils/retry.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface LazyTextLoaderOptions {
	/** Bytes per chunk. Defaults to 1 MiB. */
	readonly chunkSize?: number;
	/** Materialised chunks kept in memory. Defaults to `10`. */
	readonly maxCachedChunks?: number;
	/** Delay before the single retry of a failed read. Defaults to `25`. */
	readonly retryDelayMs?: number;
	readonly logger?: Logger;
}

/** Byte range of one chunk. Pure arithmetic, no I/O. */
export interface LazyChunkHandle {
	readonly index: number;
	readonly offset: number;
	readonly length: number;
}

export interface LineMatch {
	/** 1-based line number. */
	readonly lineNumber: number;
	readonly line: string;
}

export interface SearchOptions {
	/** Defaults to `false`. Ignored for `RegExp` patterns. */
	readonly caseSensitive?: boolean;
}

export interface LazyTextLoader extends AsyncIterable<string> {
	readonly path: string;
	/** Byte size captured when the loader was opened. */
	readonly size: number;
	readonly mtimeMs: number;
	readonly chunkSize: number;
	readonly chunkCount: number;
	readonly chunkHandle: (index: number) => LazyChunkHandle;
	/** Raw bytes of one chunk. Never reads any other chunk. */
	readonly readChunk: (index: number) => Promise<Buffer>;
	/** One chunk decoded as UTF-8. A multi-byte character may straddle chunks. */
	readonly readChunkText: (index: number) => Promise<string>;
	/** Restartable line iterator; terminators are stripped. */
	readonly iterate: () => AsyncIterable<string>;
	readonly search: (
		pattern: string | RegExp,
		options?: SearchOptions,
	) => Promise<readonly LineMatch[]>;
	/** Number of chunks currently held in memory. */
	readonly cachedChunks: number;
	/** Drop every materialised chunk. */
	readonly close: () => void;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const fingerprintOf = (stats: { size: number; mtimeMs: number }): FileFingerprint => ({
	size: stats.size,
	mtimeMs: stats.mtimeMs,
});

const toLoaderError = (
	error: unknown,
	path: string,
	operation: 'read' | 'stat' | 'open',
): Error => {
	if (isCacheError(error)) return error;
	if (systemErrorCode(error) === 'ENOENT') {
		return createNotFoundError(path, { cause: error });
	}
	return createIOFailureError(path, operation, { cause: error });
};

const matcherFor = (
	pattern: string | RegExp,
	caseSensitive: boolean,
): ((line: string) => boolean) => {
	if (pattern instanceof RegExp) {
		const regex = new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
		return (line) => regex.test(line);
	}
	if (caseSensitive) return (line) => line.includes(pattern);
	const needle = pattern.toLowerCase();
	return (line) => line.toLowerCase().includes(needle);
};

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Open a lazy loader over `path`.
 *
 * @throws {NotFoundError} When the file does not exist.
 * @throws {IOFailureError} When the file cannot be stat'ed or is not a regular file.
 *
 * @example
 * ```ts
 * const loader = await openLazyTextLoader('drafts/chapter-12.md');
 * for await (const line of loader.iterate()) {
 *   if (line.startsWith('#')) console.log(line);
 * }
 * ```
 */
export async function openLazyTextLoader(
	path: string,
	options: LazyTextLoaderOptions = {},
): Promise<LazyTextLoader> {
	const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
	const maxCachedChunks = options.maxCachedChunks ?? DEFAULT_MAX_CACHED_CHUNKS;
	const retryDelayMs = options.retryDelayMs ?? 25;
	if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
		throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
	}

	const logger = (options.logger ?? getDefaultLogger()).child('lazy-loader');

	let opened: FileFingerprint;
	try {
		const stats = await stat(path);
		if (!stats.isFile()) {
			throw createIOFailureError(path, 'open', {
				cause: new Error('Not a regular file'),
			});
		}
		opened = fingerprintOf(stats);
	} catch (error) {
		throw toLoaderError(error, path, 'stat');
	}

	const { size, mtimeMs } = opened;
	const chunkCount = Math.ceil(size / chunkSize);
	const chunks: BoundedLRUCache<Buffer> = createBoundedLRUCache<Buffer>({
		maxBytes: chunkSize * maxCachedChunks,
		maxEntries: maxCachedChunks,
		name: 'chunks',
		logger,
	});
	const inflight = new Map<number, Promise<Buffer>>();

	logger.debug(`Opened ${path}`, { size, chunkCount, chunkSize });

	// -----------------------------------------------------------------------
	// Freshness
	// -----------------------------------------------------------------------

	const verifyFresh = async (): Promise<void> => {
		let current: FileFingerprint;
		try {
			current = fingerprintOf(await stat(path));
		} catch (error) {
			throw toLoaderError(error, path, 'stat');
		}
		if (current.size !== size || current.mtimeMs !== mtimeMs) {
			chunks.clear();
			throw createStaleError(path, opened, current);
		}
	};

	// -----------------------------------------------------------------------
	// Chunks
	// -----------------------------------------------------------------------

	const chunkHandle = (index: number): LazyChunkHandle => {
		if (!Number.isInteger(index) || index < 0 || index >= chunkCount) {
			throw createChunkOutOfRangeError(path, index, chunkCount);
		}
		const offset = index * chunkSize;
		return Object.freeze({
			index,
			offset,
			length: Math.min(chunkSize, size - offset),
		});
	};

	const readRange = async (handle: LazyChunkHandle): Promise<Buffer> => {
		await verifyFresh();
		let file: FileHandle;
		try {
			file = await open(path, 'r');
		} catch (error) {
			if (systemErrorCode(error) === 'ENOENT') {
				throw createNotFoundError(path, { cause: error });
			}
			throw error;
		}
		try {
			const buffer = Buffer.alloc(handle.length);
			const { bytesRead } = await file.read(buffer, 0, handle.length, handle.offset);
			return bytesRead === handle.length ? buffer : buffer.subarray(0, bytesRead);
		} finally {
			await file.close();
		}
	};

	const loadChunk = async (handle: LazyChunkHandle): Promise<Buffer> => {
		let buffer: Buffer;
		try {
			buffer = await retry(() => readRange(handle), {
				maxAttempts: 2,
				delayMs: retryDelayMs,
				shouldRetry: (error) => !isNotFoundError(error) && !isStaleError(error),
				onRetry: (error) =>
					logger.warn(`Retrying read of chunk ${handle.index}`, {
						path,
						error: error instanceof Error ? error.message : String(error),
					}),
			});
		} catch (error) {
			if (isRetryExhaustedError(error)) {
				throw createIOFailureError(path, 'read', { cause: error.cause });
			}
			throw toLoaderError(error, path, 'read');
		}

		chunks.set(String(handle.index), buffer, buffer.byteLength);
		return buffer;
	};

	const readChunk = async (index: number): Promise<Buffer> => {
		const handle = chunkHandle(index);
		const cached = chunks.get(String(index));
		if (cached !== undefined) {
			await verifyFresh();
			return cached;
		}

		const pending = inflight.get(index);
		if (pending) return pending;

		const load = loadChunk(handle).finally(() => {
			inflight.delete(index);
		});
		inflight.set(index, load);
		return load;
	};

	// -----------------------------------------------------------------------
	// Lines
	// -----------------------------------------------------------------------

	async function* lines(): AsyncGenerator<string> {
		await verifyFresh();
		const stream = createReadStream(path, {
			encoding: 'utf8',
			highWaterMark: chunkSize,
		});
		const reader = createInterface({ input: stream, crlfDelay: Number.POSITIVE_INFINITY });
		try {
			for await (const line of reader) {
				yield line;
			}
		} catch (error) {
			throw toLoaderError(error, path, 'read');
		} finally {
			reader.close();
			stream.destroy();
		}
	}

	const iterate = (): AsyncIterable<string> =>
		Object.freeze({ [Symbol.asyncIterator]: () => lines() });

	const search = async (
		pattern: string | RegExp,
		searchOptions: SearchOptions = {},
	): Promise<readonly LineMatch[]> => {
		const matches = matcherFor(pattern, searchOptions.caseSensitive ?? false);
		const results: LineMatch[] = [];
		let lineNumber = 0;
		for await (const line of lines()) {
			lineNumber++;
			if (matches(line)) results.push(Object.freeze({ lineNumber, line }));
		}
		return Object.freeze(results);
	};

	return Object.freeze({
		path,
		size,
		mtimeMs,
		chunkSize,
		chunkCount,
		chunkHandle,
		readChunk,
		readChunkText: async (index: number): Promise<string> =>
			(await readChunk(index)).toString('utf8'),
		iterate,
		search,
		[Symbol.asyncIterator]: () => lines(),
		get cachedChunks() {
			return chunks.size;
		},
		close(): void {
			chunks.clear();
		},
	});
}
