export {
	type CacheConfig,
	type CacheConfigInput,
	cacheConfigSchema,
	DEFAULT_CHUNK_SIZE,
	DEFAULT_MAX_CACHED_CHUNKS,
	DEFAULT_MEMORY_LIMIT_BYTES,
	DEFAULT_PROJECT_CACHE_BYTES,
	DEFAULT_RESPONSE_TTL_SECONDS,
	type LoaderConfig,
	type MemoryConfig,
	type ProjectCacheConfig,
	type ResponseCacheConfig,
} from './schema.js';
export {
	type DefineConfigOptions,
	defineCacheConfig,
	loadCacheConfig,
} from './settings.js';
