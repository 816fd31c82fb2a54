// ---------------------------------------------------------------------------
// Project-Scoped Caches
// ---------------------------------------------------------------------------
//
// Every writing project owns a dedicated BoundedLRUCache with its own byte
// budget; nothing is shared between projects, so identical keys in two
// projects never collide and closing a project drops its whole cache at
// once. The registry creates caches on first access and registers them
// with the memory manager so they take part in pressure cleanup.
// ---------------------------------------------------------------------------

import { DEFAULT_PROJECT_CACHE_BYTES } from '../config/schema.js';
import type { EventBus } from '../events/types.js';
import type { Logger } from '../logger.js';
import { getDefaultLogger } from '../logger.js';
import { getMemoryManager } from '../memory/memory-manager.js';
import type { CacheRegistrar } from '../memory/types.js';
import {
	type BoundedLRUCache,
	createBoundedLRUCache,
} from './lru-cache.js';

export interface ProjectScopedCache<V = unknown> extends BoundedLRUCache<V> {
	readonly projectId: string;
}

export interface ProjectCacheRegistryOptions {
	/** Byte budget of each project's cache. Defaults to 128 MiB. */
	readonly maxBytesPerProject?: number;
	readonly maxEntriesPerProject?: number;
	readonly memoryManager?: CacheRegistrar;
	readonly eventBus?: EventBus;
	readonly logger?: Logger;
}

export interface ProjectCacheRegistry<V = unknown> {
	/** Return the project's cache, creating it on first access. */
	readonly getOrCreate: (projectId: string) => ProjectScopedCache<V>;
	readonly has: (projectId: string) => boolean;
	readonly get: (projectId: string) => ProjectScopedCache<V> | undefined;
	/**
	 * Clear the project's cache and drop it from the registry and the
	 * memory manager. Returns `false` when the project had no cache.
	 */
	readonly close: (projectId: string) => boolean;
	/** Close every project. Returns the number closed. */
	readonly closeAll: () => number;
	readonly projectIds: () => readonly string[];
	readonly totalSizeBytes: () => number;
	readonly size: number;
}

/** Name under which a project's cache is registered with the manager. */
export const projectCacheName = (projectId: string): string =>
	`project:${projectId}`;

// ---------------------------------------------------------------------------
// Project cache
// ---------------------------------------------------------------------------

const scopeCache = <V>(
	projectId: string,
	lru: BoundedLRUCache<V>,
): ProjectScopedCache<V> =>
	Object.freeze({
		projectId,
		get: lru.get,
		set: lru.set,
		update: lru.update,
		delete: lru.delete,
		clear: lru.clear,
		contains: lru.contains,
		currentSizeBytes: lru.currentSizeBytes,
		evictOldest: lru.evictOldest,
		evictFraction: lru.evictFraction,
		trimTo: lru.trimTo,
		keys: lru.keys,
		getStats: lru.getStats,
		get size() {
			return lru.size;
		},
		get maxBytes() {
			return lru.maxBytes;
		},
		get maxEntries() {
			return lru.maxEntries;
		},
	});

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export function createProjectCacheRegistry<V = unknown>(
	options: ProjectCacheRegistryOptions = {},
): ProjectCacheRegistry<V> {
	const maxBytes = options.maxBytesPerProject ?? DEFAULT_PROJECT_CACHE_BYTES;
	const maxEntries = options.maxEntriesPerProject;
	const { memoryManager, eventBus } = options;
	const logger = (options.logger ?? getDefaultLogger()).child('project-cache');

	const caches = new Map<string, ProjectScopedCache<V>>();

	const getOrCreate = (projectId: string): ProjectScopedCache<V> => {
		const existing = caches.get(projectId);
		if (existing) return existing;

		const cache = scopeCache(
			projectId,
			createBoundedLRUCache<V>({
				maxBytes,
				maxEntries,
				name: projectCacheName(projectId),
				logger,
			}),
		);
		caches.set(projectId, cache);
		memoryManager?.registerCache(projectCacheName(projectId), cache, {
			projectId,
		});
		logger.debug(`Created cache for project "${projectId}"`, { maxBytes });
		eventBus?.publish('project-cache.created', { projectId });
		return cache;
	};

	const close = (projectId: string): boolean => {
		const cache = caches.get(projectId);
		if (!cache) return false;
		cache.clear();
		caches.delete(projectId);
		memoryManager?.unregisterCache(projectCacheName(projectId));
		logger.debug(`Closed cache for project "${projectId}"`);
		eventBus?.publish('project-cache.closed', { projectId });
		return true;
	};

	return Object.freeze({
		getOrCreate,

		has(projectId: string): boolean {
			return caches.has(projectId);
		},

		get(projectId: string): ProjectScopedCache<V> | undefined {
			return caches.get(projectId);
		},

		close,

		closeAll(): number {
			const ids = [...caches.keys()];
			for (const id of ids) close(id);
			return ids.length;
		},

		projectIds(): readonly string[] {
			return Object.freeze([...caches.keys()]);
		},

		totalSizeBytes(): number {
			let total = 0;
			for (const cache of caches.values()) total += cache.currentSizeBytes();
			return total;
		},

		get size() {
			return caches.size;
		},
	});
}

// ---------------------------------------------------------------------------
// Process-wide default registry
// ---------------------------------------------------------------------------

let defaultRegistry: ProjectCacheRegistry | undefined;

/**
 * Process-wide registry, created on first use and registered with the
 * process-wide memory manager. Creating it starts that manager's periodic
 * pressure checks; the interval is unref'd and stopped on exit.
 */
export function getProjectCacheRegistry(): ProjectCacheRegistry {
	if (!defaultRegistry) {
		const memoryManager = getMemoryManager();
		memoryManager.start();
		defaultRegistry = createProjectCacheRegistry({ memoryManager });
	}
	return defaultRegistry;
}

/** Close every project in the default registry and discard it. */
export function resetProjectCacheRegistry(): void {
	defaultRegistry?.closeAll();
	defaultRegistry = undefined;
}

/**
 * The cache dedicated to `projectId` in the default registry.
 *
 * @example
 * ```ts
 * const cache = projectCacheFor('my-novel');
 * cache.set('chapter-3', chapterText);
 * ```
 */
export const projectCacheFor = (projectId: string): ProjectScopedCache =>
	getProjectCacheRegistry().getOrCreate(projectId);
