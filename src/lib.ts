// ---------------------------------------------------------------------------
// manuscript-cache: public library API
//
// Main entry point of the package. Re-exports every public function, type
// and interface needed to build and operate the cache tiers.
// ---------------------------------------------------------------------------

// ---- Bounded & project caches ---------------------------------------------
export type {
	BoundedLRUCache,
	BoundedLRUCacheOptions,
	CacheStats,
	ProjectCacheRegistry,
	ProjectCacheRegistryOptions,
	ProjectScopedCache,
	SetResult,
} from './cache/index.js';
export {
	createBoundedLRUCache,
	createProjectCacheRegistry,
	estimateSize,
	getProjectCacheRegistry,
	projectCacheFor,
	projectCacheName,
	resetProjectCacheRegistry,
} from './cache/index.js';
// ---- Configuration --------------------------------------------------------
export type {
	CacheConfig,
	CacheConfigInput,
	DefineConfigOptions,
	LoaderConfig,
	MemoryConfig,
	ProjectCacheConfig,
	ResponseCacheConfig,
} from './config/index.js';
export {
	cacheConfigSchema,
	DEFAULT_CHUNK_SIZE,
	DEFAULT_MAX_CACHED_CHUNKS,
	DEFAULT_MEMORY_LIMIT_BYTES,
	DEFAULT_PROJECT_CACHE_BYTES,
	DEFAULT_RESPONSE_TTL_SECONDS,
	defineCacheConfig,
	loadCacheConfig,
} from './config/index.js';
// ---- Errors ---------------------------------------------------------------
export * from './errors/index.js';
// ---- Events ---------------------------------------------------------------
export type {
	EventBus,
	EventBusOptions,
	EventHandler,
	EventPayload,
	EventPayloadMap,
	EventType,
} from './events/index.js';
export { createEventBus } from './events/index.js';
// ---- Lazy text loading ----------------------------------------------------
export type {
	LazyChunkHandle,
	LazyTextLoader,
	LazyTextLoaderOptions,
	LineMatch,
	SearchOptions,
	SmartReadOptions,
	SmartReadResult,
	StreamOptions,
	TextFileStats,
} from './loader/index.js';
export {
	analyzeTextFile,
	openLazyTextLoader,
	processTextFile,
	readTextSmart,
	transformTextFile,
} from './loader/index.js';
// ---- Logging --------------------------------------------------------------
export type {
	LogEntry,
	Logger,
	LoggerOptions,
	LogLevel,
	LogTransport,
	MemoryTransportHandle,
} from './logger.js';
export {
	createConsoleTransport,
	createLogger,
	createMemoryTransport,
	createNoopLogger,
	getDefaultLogger,
	setDefaultLogger,
} from './logger.js';
// ---- Memory management ----------------------------------------------------
export type {
	CacheRegistrar,
	CleanupMode,
	CleanupReport,
	ManagedCache,
	MemoryManager,
	MemoryManagerOptions,
	MemoryPressureLevel,
	MemorySample,
	MemoryStats,
	MemorySummary,
	OptimizeReport,
	RegisterCacheOptions,
	RegisteredCacheInfo,
} from './memory/index.js';
export {
	createMemoryManager,
	getMemoryManager,
	resetMemoryManager,
} from './memory/index.js';
// ---- Response cache -------------------------------------------------------
export type {
	CharacterRef,
	FingerprintLike,
	JsonValue,
	LookupResult,
	PersistentResponseCache,
	ProjectContext,
	RequestDescriptor,
	ResponseCacheOptions,
	ResponseCacheStats,
	ResponseFingerprint,
	ResponseStore,
	SqliteStoreOptions,
	StoredResponse,
	StoreStats,
} from './response/index.js';
export {
	canonicalJson,
	compressPayload,
	contextFingerprint,
	createFingerprint,
	decompressPayload,
	fingerprintKey,
	isGzipped,
	isJsonValue,
	openResponseCache,
	openSqliteResponseStore,
} from './response/index.js';
// ---- Subsystem ------------------------------------------------------------
export type { CacheSubsystem, CacheSubsystemOptions } from './subsystem.js';
export { createCacheSubsystem } from './subsystem.js';
// ---- Utilities ------------------------------------------------------------
export type { RetryOptions } from './utils/retry.js';
export {
	createRetryExhaustedError,
	isRetryExhaustedError,
	retry,
} from './utils/retry.js';
export type { TimeoutOptions } from './utils/timeout.js';
export { withTimeout } from './utils/timeout.js';
