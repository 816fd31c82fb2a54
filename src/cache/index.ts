export {
	type BoundedLRUCache,
	type BoundedLRUCacheOptions,
	type CacheStats,
	createBoundedLRUCache,
	type SetResult,
} from './lru-cache.js';
export {
	createProjectCacheRegistry,
	getProjectCacheRegistry,
	type ProjectCacheRegistry,
	type ProjectCacheRegistryOptions,
	type ProjectScopedCache,
	projectCacheFor,
	projectCacheName,
	resetProjectCacheRegistry,
} from './project-cache.js';
export { estimateSize } from './size.js';
