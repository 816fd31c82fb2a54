// ---------------------------------------------------------------------------
// Persistent Response Cache
// ---------------------------------------------------------------------------
//
// Disk-backed cache of AI provider responses keyed by request + context
// fingerprint. The cache never fails its caller: reads that error, time
// out, hit an expired row or decode garbage are misses, and writes that
// fail are logged and dropped. Expired rows are deleted when read and by a
// periodic sweep.
// ---------------------------------------------------------------------------

import { DEFAULT_RESPONSE_TTL_SECONDS } from '../config/schema.js';
import {
	type CacheError,
	createCorruptRecordError,
	createExpiredError,
	createIOFailureError,
	createTooLargeError,
	isCacheError,
	toError,
} from '../errors/index.js';
import type { EventBus } from '../events/types.js';
import type { Logger } from '../logger.js';
import { getDefaultLogger } from '../logger.js';
import { withTimeout } from '../utils/timeout.js';
import { compressPayload, decompressPayload } from './compression.js';
import { type FingerprintLike, fingerprintKey } from './fingerprint.js';
import { openSqliteResponseStore } from './store.js';
import type {
	JsonValue,
	ResponseStore,
	StoredResponse,
	StoreStats,
} from './types.js';

// ---------------------------------------------------------------------------
// Options & results
// ---------------------------------------------------------------------------

export interface ResponseCacheOptions {
	/** SQLite file. Ignored when `store` is given. */
	readonly path?: string;
	/** Pre-opened store, mainly for tests. */
	readonly store?: ResponseStore;
	/** TTL used when `put` gets none. Defaults to 7 days. */
	readonly defaultTtlSeconds?: number;
	/** Upper bound on every store operation. Defaults to 3000 ms. */
	readonly timeoutMs?: number;
	/** Interval of the expired-row sweep. `0` disables it. Defaults to 24 h. */
	readonly sweepIntervalMs?: number;
	readonly compressionLevel?: number;
	/** Compressed payloads above this size are not stored. Defaults to 8 MiB. */
	readonly maxPayloadBytes?: number;
	readonly busyTimeoutMs?: number;
	readonly now?: () => number;
	readonly eventBus?: EventBus;
	readonly logger?: Logger;
}

export type LookupResult =
	| { readonly hit: true; readonly value: JsonValue }
	| {
			readonly hit: false;
			/** Why a stored row was not served. Absent for a plain miss. */
			readonly reason?: CacheError;
	  };

export interface ResponseCacheStats {
	readonly entries: number;
	readonly payloadBytes: number;
	readonly expiredEntries: number;
	readonly hits: number;
	readonly misses: number;
	readonly writes: number;
	readonly droppedWrites: number;
	readonly path: string;
	/** `true` when the store could not be opened and every call is a no-op. */
	readonly degraded: boolean;
}

export interface PersistentResponseCache {
	readonly path: string;
	readonly degraded: boolean;
	/** Cached payload, or `undefined` on any kind of miss. */
	readonly get: (fingerprint: FingerprintLike) => Promise<JsonValue | undefined>;
	/** Like `get`, but says why a stored row was not served. */
	readonly lookup: (fingerprint: FingerprintLike) => Promise<LookupResult>;
	/** Store a payload. Returns `false` when the write was dropped. */
	readonly put: (
		fingerprint: FingerprintLike,
		payload: JsonValue,
		ttlSeconds?: number,
	) => Promise<boolean>;
	readonly delete: (fingerprint: FingerprintLike) => Promise<boolean>;
	readonly clear: () => Promise<number>;
	/** Delete every expired row. Returns the number removed. */
	readonly sweepExpired: () => Promise<number>;
	/**
	 * Read-through helper: return the cached payload, or call `produce`,
	 * store its result and return it. Errors from `produce` propagate.
	 */
	readonly remember: <T extends JsonValue>(
		fingerprint: FingerprintLike,
		produce: () => Promise<T>,
		ttlSeconds?: number,
	) => Promise<JsonValue>;
	readonly getStats: () => Promise<ResponseCacheStats>;
	readonly close: () => Promise<void>;
}

// ---------------------------------------------------------------------------
// Disabled store
// ---------------------------------------------------------------------------

/** Stand-in used when the database cannot be opened. */
const createDisabledStore = (path: string, cause: unknown): ResponseStore => {
	const unavailable = (): Promise<never> =>
		Promise.reject(createIOFailureError(path, 'write', { cause }));
	return Object.freeze({
		path,
		read: async () => undefined,
		write: unavailable,
		remove: async () => false,
		clear: async () => 0,
		sweep: async () => 0,
		stats: async () => ({ entries: 0, payloadBytes: 0, expiredEntries: 0 }),
		close: async () => undefined,
	});
};

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Open the response cache. Never rejects: if the database cannot be
 * opened, the cache is returned in a degraded state where every read
 * misses and every write is dropped.
 *
 * @example
 * ```ts
 * const cache = await openResponseCache({ path: 'project/.cache/responses.db' });
 * const fp = createFingerprint(request, context);
 * const reply = await cache.remember(fp, () => client.complete(request));
 * ```
 */
export async function openResponseCache(
	options: ResponseCacheOptions = {},
): Promise<PersistentResponseCache> {
	const logger = (options.logger ?? getDefaultLogger()).child('response-cache');
	const defaultTtlSeconds = options.defaultTtlSeconds ?? DEFAULT_RESPONSE_TTL_SECONDS;
	const timeoutMs = options.timeoutMs ?? 3_000;
	const sweepIntervalMs = options.sweepIntervalMs ?? 24 * 60 * 60 * 1000;
	const compressionLevel = options.compressionLevel ?? 6;
	const maxPayloadBytes = options.maxPayloadBytes ?? 8 * 1024 * 1024;
	const now = options.now ?? Date.now;
	const { eventBus } = options;

	let store: ResponseStore;
	let degraded = false;
	if (options.store) {
		store = options.store;
	} else {
		const path = options.path ?? '.manuscript-cache/responses.db';
		try {
			store = await openSqliteResponseStore(path, {
				busyTimeoutMs: options.busyTimeoutMs,
				logger,
			});
		} catch (error) {
			logger.error(
				`Response cache disabled: cannot open ${path}`,
				toError(error),
			);
			store = createDisabledStore(path, error);
			degraded = true;
		}
	}

	let hits = 0;
	let misses = 0;
	let writes = 0;
	let droppedWrites = 0;
	let closed = false;
	const pending = new Set<Promise<void>>();

	const guarded = <T>(operation: string, fn: () => Promise<T>): Promise<T> =>
		withTimeout(fn, timeoutMs, { operation: `response-cache.${operation}` });

	const describe = (error: unknown): string => toError(error).message;

	// Fire-and-forget delete of the unusable row that was read, tracked so
	// `close` can wait. A row rewritten since the read is left alone.
	const discard = ({ key, createdAt }: StoredResponse): void => {
		const task: Promise<void> = guarded('delete', () =>
			store.remove(key, createdAt),
		)
			.then(
				() => undefined,
				(error: unknown) => {
					logger.warn('Failed to delete unusable cache row', {
						key,
						error: describe(error),
					});
				},
			)
			.finally(() => {
				pending.delete(task);
			});
		pending.add(task);
	};

	const miss = (reason?: CacheError): LookupResult => {
		misses++;
		return reason ? Object.freeze({ hit: false, reason }) : Object.freeze({ hit: false });
	};

	const dropWrite = (key: string, reason: string, error?: unknown): false => {
		droppedWrites++;
		logger.warn(`Dropped cache write: ${reason}`, {
			key,
			...(error === undefined ? {} : { error: describe(error) }),
		});
		eventBus?.publish('response-cache.write-dropped', { key, reason });
		return false;
	};

	// -----------------------------------------------------------------------
	// Operations
	// -----------------------------------------------------------------------

	const lookup = async (fingerprint: FingerprintLike): Promise<LookupResult> => {
		const key = fingerprintKey(fingerprint);
		if (closed) return miss();

		let record: StoredResponse | undefined;
		try {
			record = await guarded('read', () => store.read(key));
		} catch (error) {
			logger.warn('Cache read failed, treating as miss', {
				key,
				error: describe(error),
			});
			return miss(
				isCacheError(error)
					? error
					: createIOFailureError(key, 'read', { cause: error }),
			);
		}

		if (!record) return miss();

		if (now() > record.expiresAt) {
			discard(record);
			return miss(createExpiredError(key, record.expiresAt));
		}

		try {
			const value = await decompressPayload(record.payload);
			hits++;
			return Object.freeze({ hit: true, value });
		} catch (error) {
			logger.warn('Discarding undecodable cache row', {
				key,
				error: describe(error),
			});
			discard(record);
			return miss(createCorruptRecordError(key, { cause: error }));
		}
	};

	const get = async (fingerprint: FingerprintLike): Promise<JsonValue | undefined> => {
		const result = await lookup(fingerprint);
		return result.hit ? result.value : undefined;
	};

	const put = async (
		fingerprint: FingerprintLike,
		payload: JsonValue,
		ttlSeconds?: number,
	): Promise<boolean> => {
		const key = fingerprintKey(fingerprint);
		if (closed) return dropWrite(key, 'closed');

		const ttl = ttlSeconds ?? defaultTtlSeconds;
		if (!Number.isFinite(ttl) || ttl <= 0) {
			return dropWrite(key, `invalid ttl ${ttl}`);
		}

		let compressed: Buffer;
		try {
			compressed = await compressPayload(payload, { level: compressionLevel });
		} catch (error) {
			return dropWrite(key, 'encode failed', error);
		}

		if (compressed.byteLength > maxPayloadBytes) {
			return dropWrite(
				key,
				'too large',
				createTooLargeError(key, compressed.byteLength, maxPayloadBytes),
			);
		}

		const createdAt = now();
		const record: StoredResponse = Object.freeze({
			key,
			payload: compressed,
			createdAt,
			ttlSeconds: ttl,
			expiresAt: createdAt + ttl * 1000,
			payloadBytes: compressed.byteLength,
		});

		try {
			await guarded('write', () => store.write(record));
		} catch (error) {
			return dropWrite(key, 'write failed', error);
		}
		writes++;
		return true;
	};

	const sweepExpired = async (): Promise<number> => {
		if (closed) return 0;
		try {
			const removed = await guarded('sweep', () => store.sweep(now()));
			if (removed > 0) logger.debug(`Swept ${removed} expired responses`);
			return removed;
		} catch (error) {
			logger.warn('Expired-row sweep failed', { error: describe(error) });
			return 0;
		}
	};

	let timer: ReturnType<typeof setInterval> | undefined;
	if (sweepIntervalMs > 0 && !degraded) {
		timer = setInterval(() => {
			sweepExpired().catch((error: unknown) => {
				logger.error('Scheduled sweep failed', toError(error));
			});
		}, sweepIntervalMs);
		timer.unref();
	}

	return Object.freeze({
		path: store.path,
		degraded,
		get,
		lookup,
		put,

		async delete(fingerprint: FingerprintLike): Promise<boolean> {
			if (closed) return false;
			const key = fingerprintKey(fingerprint);
			try {
				return await guarded('delete', () => store.remove(key));
			} catch (error) {
				logger.warn('Cache delete failed', { key, error: describe(error) });
				return false;
			}
		},

		async clear(): Promise<number> {
			if (closed) return 0;
			try {
				const removed = await guarded('clear', () => store.clear());
				logger.info(`Cleared ${removed} cached responses`);
				return removed;
			} catch (error) {
				logger.warn('Cache clear failed', { error: describe(error) });
				return 0;
			}
		},

		sweepExpired,

		async remember<T extends JsonValue>(
			fingerprint: FingerprintLike,
			produce: () => Promise<T>,
			ttlSeconds?: number,
		): Promise<JsonValue> {
			const cached = await lookup(fingerprint);
			if (cached.hit) return cached.value;
			const value = await produce();
			await put(fingerprint, value, ttlSeconds);
			return value;
		},

		async getStats(): Promise<ResponseCacheStats> {
			let stored: StoreStats = { entries: 0, payloadBytes: 0, expiredEntries: 0 };
			if (!closed) {
				try {
					stored = await guarded('stats', () => store.stats(now()));
				} catch (error) {
					logger.warn('Failed to read cache statistics', {
						error: describe(error),
					});
				}
			}
			return Object.freeze({
				...stored,
				hits,
				misses,
				writes,
				droppedWrites,
				path: store.path,
				degraded,
			});
		},

		async close(): Promise<void> {
			if (closed) return;
			closed = true;
			if (timer !== undefined) clearInterval(timer);
			await Promise.allSettled([...pending]);
			await store.close();
			logger.debug('Response cache closed');
		},
	});
}
