// ---------------------------------------------------------------------------
// Memory management: type definitions
// ---------------------------------------------------------------------------

export type MemoryPressureLevel = 'normal' | 'warning' | 'critical';

export type CleanupMode = 'soft' | 'hard' | 'target';

/**
 * Surface the manager needs from a registered cache. `BoundedLRUCache` and
 * `ProjectScopedCache` both satisfy it. Eviction helpers return the keys
 * they removed.
 */
export interface ManagedCache {
	readonly size: number;
	readonly maxBytes: number;
	readonly currentSizeBytes: () => number;
	readonly evictFraction: (ratio: number) => readonly string[];
	readonly trimTo: (targetBytes: number) => readonly string[];
	readonly clear: () => void;
}

export interface RegisterCacheOptions {
	/** Owning project. Caches of the active project survive hard cleanup. */
	readonly projectId?: string;
}

export interface RegisteredCacheInfo {
	readonly name: string;
	readonly projectId?: string;
	readonly entries: number;
	readonly sizeBytes: number;
	readonly maxBytes: number;
}

/** Raw reading returned by a memory sampler. */
export interface MemorySample {
	readonly rssBytes: number;
	readonly heapUsedBytes: number;
}

export interface MemoryStats {
	readonly rssBytes: number;
	readonly heapUsedBytes: number;
	readonly cacheBytes: number;
	readonly peakRssBytes: number;
	readonly gcCount: number;
	readonly cacheCount: number;
	readonly pressure: MemoryPressureLevel;
	readonly timestamp: number;
}

export interface MemorySummary {
	readonly currentBytes: number;
	readonly peakBytes: number;
	readonly averageBytes: number;
	readonly limitBytes: number;
	readonly usagePercent: number;
	readonly samples: number;
}

export interface CleanupReport {
	readonly mode: CleanupMode;
	readonly freedBytes: number;
	readonly evictedEntries: number;
	/** `true` when at least one cache failed to evict. */
	readonly degraded: boolean;
	/** Snapshot taken after the cleanup finished. */
	readonly stats: MemoryStats;
}

export interface OptimizeReport extends CleanupReport {
	readonly gcCollected: boolean;
}

/** Registration surface shared by the memory manager and its test doubles. */
export interface CacheRegistrar {
	readonly registerCache: (
		name: string,
		cache: ManagedCache,
		options?: RegisterCacheOptions,
	) => void;
	readonly unregisterCache: (name: string) => boolean;
}
