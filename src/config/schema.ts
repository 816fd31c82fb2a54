// ---------------------------------------------------------------------------
// Configuration schema
// ---------------------------------------------------------------------------
//
// One zod schema per subsystem section. Every field has a default, so an
// empty object resolves to a complete configuration. Cross-field
// constraints (warning < critical) are expressed as refinements.
// ---------------------------------------------------------------------------

import { z } from 'zod';

const MiB = 1024 * 1024;

export const DEFAULT_MEMORY_LIMIT_BYTES = 512 * MiB;
export const DEFAULT_PROJECT_CACHE_BYTES = 128 * MiB;
export const DEFAULT_CHUNK_SIZE = MiB;
export const DEFAULT_MAX_CACHED_CHUNKS = 10;
export const DEFAULT_RESPONSE_TTL_SECONDS = 7 * 24 * 60 * 60;

// ---------------------------------------------------------------------------
// Sections
// ---------------------------------------------------------------------------

export const memorySchema = z
	.object({
		maxMemoryBytes: z.number().int().positive().default(DEFAULT_MEMORY_LIMIT_BYTES),
		warningThreshold: z.number().gt(0).lt(1).default(0.8),
		criticalThreshold: z.number().gt(0).max(1).default(0.9),
		softEvictionRatio: z.number().gt(0).max(1).default(0.25),
		cacheTargetRatio: z.number().min(0).max(1).default(0.8),
		checkIntervalMs: z.number().int().min(0).default(5_000),
		historySize: z.number().int().positive().default(100),
	})
	.refine((value) => value.warningThreshold < value.criticalThreshold, {
		message: 'warningThreshold must be below criticalThreshold',
		path: ['warningThreshold'],
	});

export const projectCacheSchema = z.object({
	maxBytesPerProject: z
		.number()
		.int()
		.positive()
		.default(DEFAULT_PROJECT_CACHE_BYTES),
	maxEntriesPerProject: z.number().int().positive().optional(),
});

export const loaderSchema = z.object({
	chunkSize: z.number().int().positive().default(DEFAULT_CHUNK_SIZE),
	maxCachedChunks: z.number().int().positive().default(DEFAULT_MAX_CACHED_CHUNKS),
	lazyThresholdBytes: z.number().int().min(0).default(DEFAULT_CHUNK_SIZE),
});

export const responseCacheSchema = z.object({
	dbPath: z.string().min(1).default('.manuscript-cache/responses.db'),
	defaultTtlSeconds: z
		.number()
		.positive()
		.default(DEFAULT_RESPONSE_TTL_SECONDS),
	timeoutMs: z.number().int().min(0).max(60_000).default(3_000),
	sweepIntervalMs: z.number().int().min(0).default(24 * 60 * 60 * 1000),
	compressionLevel: z.number().int().min(1).max(9).default(6),
	maxPayloadBytes: z.number().int().positive().default(8 * MiB),
});

export const logLevelSchema = z
	.enum(['debug', 'info', 'warn', 'error', 'none'])
	.default('info');

// ---------------------------------------------------------------------------
// Root
// ---------------------------------------------------------------------------

export const cacheConfigSchema = z.object({
	memory: memorySchema.default({}),
	projectCache: projectCacheSchema.default({}),
	loader: loaderSchema.default({}),
	responseCache: responseCacheSchema.default({}),
	logLevel: logLevelSchema,
});

export type CacheConfigInput = z.input<typeof cacheConfigSchema>;
export type MemoryConfig = Readonly<z.output<typeof memorySchema>>;
export type ProjectCacheConfig = Readonly<z.output<typeof projectCacheSchema>>;
export type LoaderConfig = Readonly<z.output<typeof loaderSchema>>;
export type ResponseCacheConfig = Readonly<z.output<typeof responseCacheSchema>>;

export interface CacheConfig {
	readonly memory: MemoryConfig;
	readonly projectCache: ProjectCacheConfig;
	readonly loader: LoaderConfig;
	readonly responseCache: ResponseCacheConfig;
	readonly logLevel: z.output<typeof logLevelSchema>;
}
