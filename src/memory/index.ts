export {
	createMemoryManager,
	getMemoryManager,
	type MemoryManager,
	type MemoryManagerOptions,
	resetMemoryManager,
} from './memory-manager.js';
export type {
	CacheRegistrar,
	CleanupMode,
	CleanupReport,
	ManagedCache,
	MemoryPressureLevel,
	MemorySample,
	MemoryStats,
	MemorySummary,
	OptimizeReport,
	RegisterCacheOptions,
	RegisteredCacheInfo,
} from './types.js';
