// ---------------------------------------------------------------------------
// Bounded LRU Cache
// ---------------------------------------------------------------------------
//
// In-memory key/value cache with a hard byte ceiling and an optional entry
// ceiling. Map insertion order is the recency list: the least recently used
// entry is first, and a hit moves its key to the end. Every operation is
// synchronous, so ordering and size accounting change in the same tick.
// ---------------------------------------------------------------------------

import type { Logger } from '../logger.js';
import { getDefaultLogger } from '../logger.js';
import type { ManagedCache } from '../memory/types.js';
import { estimateSize, isValidSizeHint } from './size.js';

// ---------------------------------------------------------------------------
// Options & results
// ---------------------------------------------------------------------------

export interface BoundedLRUCacheOptions<V> {
	/** Hard ceiling on the summed size of all entries. */
	readonly maxBytes: number;
	/** Optional ceiling on the number of entries. */
	readonly maxEntries?: number;
	/**
	 * Size estimator used when `set` is called without a hint. A negative or
	 * non-finite result falls back to the built-in estimate.
	 */
	readonly sizeOf?: (value: V) => number;
	/** Label used in log output. Defaults to `"lru"`. */
	readonly name?: string;
	readonly logger?: Logger;
}

export type SetResult =
	| {
			readonly status: 'stored';
			readonly sizeBytes: number;
			/** Keys evicted to make room, oldest first. */
			readonly evicted: readonly string[];
	  }
	| {
			readonly status: 'too_large';
			readonly sizeBytes: number;
			readonly maxBytes: number;
	  };

export interface CacheStats {
	readonly hits: number;
	readonly misses: number;
	readonly evictions: number;
	readonly rejections: number;
	readonly entries: number;
	readonly bytes: number;
	readonly maxBytes: number;
}

// ---------------------------------------------------------------------------
// BoundedLRUCache interface
// ---------------------------------------------------------------------------

export interface BoundedLRUCache<V> extends ManagedCache {
	/** Look up a key. A hit promotes it to most-recently-used. */
	readonly get: (key: string) => V | undefined;
	/**
	 * Insert or replace a value, evicting least-recently-used entries until
	 * the byte and entry ceilings hold. A value larger than `maxBytes` is
	 * rejected and any previous value under the key is dropped.
	 */
	readonly set: (key: string, value: V, sizeHint?: number) => SetResult;
	/** Same as `set`. */
	readonly update: (key: string, value: V, sizeHint?: number) => SetResult;
	readonly delete: (key: string) => boolean;
	readonly clear: () => void;
	/** Membership test that leaves recency untouched. */
	readonly contains: (key: string) => boolean;
	readonly currentSizeBytes: () => number;
	readonly evictOldest: (count: number) => readonly string[];
	/** Evict `max(1, floor(size * ratio))` of the oldest entries. */
	readonly evictFraction: (ratio: number) => readonly string[];
	/** Evict oldest entries until the tracked size is at most `targetBytes`. */
	readonly trimTo: (targetBytes: number) => readonly string[];
	/** Keys from least to most recently used. */
	readonly keys: () => readonly string[];
	readonly getStats: () => CacheStats;
	readonly size: number;
	readonly maxBytes: number;
	readonly maxEntries: number | undefined;
}

interface Entry<V> {
	readonly value: V;
	readonly sizeBytes: number;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createBoundedLRUCache<V>(
	options: BoundedLRUCacheOptions<V>,
): BoundedLRUCache<V> {
	const { maxBytes, maxEntries } = options;
	if (!Number.isFinite(maxBytes) || maxBytes <= 0) {
		throw new RangeError(`maxBytes must be a positive number, got ${maxBytes}`);
	}
	if (
		maxEntries !== undefined &&
		(!Number.isInteger(maxEntries) || maxEntries < 1)
	) {
		throw new RangeError(
			`maxEntries must be a positive integer, got ${maxEntries}`,
		);
	}

	const sizeOf = options.sizeOf ?? estimateSize;
	const logger = (options.logger ?? getDefaultLogger()).child(
		options.name ?? 'lru',
	);

	const entries = new Map<string, Entry<V>>();
	let totalBytes = 0;
	let hits = 0;
	let misses = 0;
	let evictions = 0;
	let rejections = 0;

	const remove = (key: string): boolean => {
		const entry = entries.get(key);
		if (entry === undefined) return false;
		totalBytes -= entry.sizeBytes;
		entries.delete(key);
		return true;
	};

	// Evict from the head while `shouldEvict` holds.
	const evictWhile = (shouldEvict: () => boolean): string[] => {
		const evicted: string[] = [];
		while (entries.size > 0 && shouldEvict()) {
			const first = entries.keys().next();
			if (first.done) break;
			remove(first.value);
			evicted.push(first.value);
		}
		evictions += evicted.length;
		return evicted;
	};

	const set = (key: string, value: V, sizeHint?: number): SetResult => {
		const measured = isValidSizeHint(sizeHint) ? sizeHint : sizeOf(value);
		const sizeBytes = isValidSizeHint(measured) ? measured : estimateSize(value);

		if (sizeBytes > maxBytes) {
			remove(key);
			rejections++;
			logger.debug('Rejected oversized value', { key, sizeBytes, maxBytes });
			return Object.freeze({ status: 'too_large', sizeBytes, maxBytes });
		}

		remove(key);
		entries.set(key, { value, sizeBytes });
		totalBytes += sizeBytes;

		const evicted = evictWhile(
			() =>
				totalBytes > maxBytes ||
				(maxEntries !== undefined && entries.size > maxEntries),
		);
		if (evicted.length > 0) {
			logger.debug(`Evicted ${evicted.length} entries`, { key, evicted });
		}

		return Object.freeze({
			status: 'stored',
			sizeBytes,
			evicted: Object.freeze(evicted),
		});
	};

	const cache: BoundedLRUCache<V> = {
		get(key: string): V | undefined {
			const entry = entries.get(key);
			if (entry === undefined) {
				misses++;
				return undefined;
			}
			hits++;
			// Promote to most-recently-used (move to end)
			entries.delete(key);
			entries.set(key, entry);
			return entry.value;
		},

		set,
		update: set,

		delete(key: string): boolean {
			return remove(key);
		},

		clear(): void {
			entries.clear();
			totalBytes = 0;
		},

		contains(key: string): boolean {
			return entries.has(key);
		},

		currentSizeBytes(): number {
			return totalBytes;
		},

		evictOldest(count: number): readonly string[] {
			let remaining = Math.max(0, Math.floor(count));
			return Object.freeze(evictWhile(() => remaining-- > 0));
		},

		evictFraction(ratio: number): readonly string[] {
			if (!(ratio > 0) || entries.size === 0) return Object.freeze([]);
			const count = Math.max(1, Math.floor(entries.size * Math.min(ratio, 1)));
			return cache.evictOldest(count);
		},

		trimTo(targetBytes: number): readonly string[] {
			const target = Math.max(0, targetBytes);
			return Object.freeze(evictWhile(() => totalBytes > target));
		},

		keys(): readonly string[] {
			return Object.freeze([...entries.keys()]);
		},

		getStats(): CacheStats {
			return Object.freeze({
				hits,
				misses,
				evictions,
				rejections,
				entries: entries.size,
				bytes: totalBytes,
				maxBytes,
			});
		},

		get size() {
			return entries.size;
		},

		get maxBytes() {
			return maxBytes;
		},

		get maxEntries() {
			return maxEntries;
		},
	};

	return Object.freeze(cache);
}
