// ---------------------------------------------------------------------------
// Cache subsystem wiring
// ---------------------------------------------------------------------------
//
// Builds every tier from one resolved configuration: the memory manager,
// the project cache registry (registered with that manager), and the
// persistent response cache. `dispose` tears them down in reverse order.
// ---------------------------------------------------------------------------

import { createProjectCacheRegistry, type ProjectCacheRegistry } from './cache/project-cache.js';
import type { CacheConfig, CacheConfigInput } from './config/schema.js';
import { defineCacheConfig } from './config/settings.js';
import { createEventBus } from './events/event-bus.js';
import type { EventBus } from './events/types.js';
import {
	type LazyTextLoader,
	openLazyTextLoader,
} from './loader/lazy-text-loader.js';
import { readTextSmart, type SmartReadResult } from './loader/text-stream.js';
import { createLogger, type Logger } from './logger.js';
import { createMemoryManager, type MemoryManager } from './memory/memory-manager.js';
import type { MemorySample } from './memory/types.js';
import { openResponseCache, type PersistentResponseCache } from './response/response-cache.js';

export interface CacheSubsystemOptions {
	readonly logger?: Logger;
	readonly eventBus?: EventBus;
	/** Start background memory monitoring. Defaults to `true`. */
	readonly monitor?: boolean;
	readonly sampleMemory?: () => MemorySample;
	readonly collectGarbage?: () => void;
	readonly now?: () => number;
}

export interface CacheSubsystem {
	readonly config: CacheConfig;
	readonly logger: Logger;
	readonly eventBus: EventBus;
	readonly memoryManager: MemoryManager;
	readonly projects: ProjectCacheRegistry;
	readonly responseCache: PersistentResponseCache;
	/** Open a lazy loader with the configured chunk settings. */
	readonly openTextFile: (path: string) => Promise<LazyTextLoader>;
	/** Whole string below the lazy threshold, a lazy loader above it. */
	readonly readText: (path: string) => Promise<SmartReadResult>;
	/** Mark a project active so it survives hard cleanup. */
	readonly activateProject: (projectId?: string) => void;
	readonly dispose: () => Promise<void>;
}

/**
 * Create the whole cache subsystem.
 *
 * @example
 * ```ts
 * const caches = await createCacheSubsystem({
 *   responseCache: { dbPath: join(projectDir, '.cache', 'responses.db') },
 * });
 * caches.projects.getOrCreate('my-novel').set('outline', outlineText);
 * await caches.dispose();
 * ```
 */
export async function createCacheSubsystem(
	input: CacheConfigInput = {},
	options: CacheSubsystemOptions = {},
): Promise<CacheSubsystem> {
	const config = defineCacheConfig(input);
	const logger =
		options.logger ??
		createLogger({ context: 'manuscript-cache', level: config.logLevel });
	const eventBus = options.eventBus ?? createEventBus({ logger });

	const memoryManager = createMemoryManager({
		...config.memory,
		sampleMemory: options.sampleMemory,
		collectGarbage: options.collectGarbage,
		now: options.now,
		eventBus,
		logger,
	});

	const projects = createProjectCacheRegistry({
		maxBytesPerProject: config.projectCache.maxBytesPerProject,
		maxEntriesPerProject: config.projectCache.maxEntriesPerProject,
		memoryManager,
		eventBus,
		logger,
	});

	const responseCache = await openResponseCache({
		path: config.responseCache.dbPath,
		defaultTtlSeconds: config.responseCache.defaultTtlSeconds,
		timeoutMs: config.responseCache.timeoutMs,
		sweepIntervalMs: config.responseCache.sweepIntervalMs,
		compressionLevel: config.responseCache.compressionLevel,
		maxPayloadBytes: config.responseCache.maxPayloadBytes,
		now: options.now,
		eventBus,
		logger,
	});

	if (options.monitor ?? true) memoryManager.start();
	logger.info('Cache subsystem ready', {
		maxMemoryBytes: config.memory.maxMemoryBytes,
		responseCache: responseCache.path,
		degraded: responseCache.degraded,
	});

	const loaderOptions = {
		chunkSize: config.loader.chunkSize,
		maxCachedChunks: config.loader.maxCachedChunks,
		logger,
	};

	return Object.freeze({
		config,
		logger,
		eventBus,
		memoryManager,
		projects,
		responseCache,
		openTextFile: (path: string) => openLazyTextLoader(path, loaderOptions),
		readText: (path: string) =>
			readTextSmart(path, {
				...loaderOptions,
				lazyThresholdBytes: config.loader.lazyThresholdBytes,
			}),
		activateProject: (projectId?: string) => {
			memoryManager.setActiveProject(projectId);
		},
		async dispose(): Promise<void> {
			memoryManager.stop();
			await responseCache.close();
			projects.closeAll();
			memoryManager.dispose();
			logger.debug('Cache subsystem disposed');
		},
	});
}
