// ---------------------------------------------------------------------------
// Memory Manager
// ---------------------------------------------------------------------------
//
// Owns the registry of live caches, samples process memory, keeps a short
// history for summaries, and evicts across every registered cache when
// usage crosses the warning or critical threshold. Nothing here throws:
// a cache that fails to evict is logged and the cleanup is reported as
// degraded.
// ---------------------------------------------------------------------------

import { DEFAULT_MEMORY_LIMIT_BYTES } from '../config/schema.js';
import { toError } from '../errors/index.js';
import type { EventBus } from '../events/types.js';
import type { Logger } from '../logger.js';
import { getDefaultLogger } from '../logger.js';
import type {
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

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface MemoryManagerOptions {
	/** Memory ceiling the thresholds are measured against. Defaults to 512 MiB. */
	readonly maxMemoryBytes?: number;
	/** Fraction of the ceiling that triggers soft cleanup. Defaults to `0.8`. */
	readonly warningThreshold?: number;
	/** Fraction of the ceiling that triggers hard cleanup. Defaults to `0.9`. */
	readonly criticalThreshold?: number;
	/** Share of each cache's entries evicted by soft cleanup. Defaults to `0.25`. */
	readonly softEvictionRatio?: number;
	/** Default `cleanup()` target as a fraction of each cache's budget. */
	readonly cacheTargetRatio?: number;
	/** Interval of the background pressure check. `0` disables it. */
	readonly checkIntervalMs?: number;
	/** Number of samples kept for the average. Defaults to `100`. */
	readonly historySize?: number;
	/** Memory sampler. Defaults to `process.memoryUsage()`. */
	readonly sampleMemory?: () => MemorySample;
	/** GC hook. Defaults to `global.gc` when node runs with `--expose-gc`. */
	readonly collectGarbage?: () => void;
	readonly eventBus?: EventBus;
	readonly logger?: Logger;
	readonly now?: () => number;
}

// ---------------------------------------------------------------------------
// MemoryManager interface
// ---------------------------------------------------------------------------

export interface MemoryManager extends CacheRegistrar {
	readonly registeredCaches: () => readonly RegisteredCacheInfo[];
	/** Caches of the active project survive hard cleanup. */
	readonly setActiveProject: (projectId?: string) => void;
	readonly activeProject: string | undefined;
	/** Take a fresh sample and return a snapshot. */
	readonly getMemoryStats: () => MemoryStats;
	readonly getMemorySummary: () => MemorySummary;
	/**
	 * Trim every registered cache to `targetRatio` of its own budget, then
	 * refresh the sample. Defaults to `cacheTargetRatio`.
	 */
	readonly cleanup: (targetRatio?: number) => CleanupReport;
	/** Evict the oldest `softEvictionRatio` of entries in every cache. */
	readonly softCleanup: () => CleanupReport;
	/** Clear every cache except those of the active project. */
	readonly hardCleanup: () => CleanupReport;
	/** `cleanup()` followed by a forced GC cycle. */
	readonly optimizeMemory: () => OptimizeReport;
	/** Returns `false` when no GC hook is available or it failed. */
	readonly forceGarbageCollection: () => boolean;
	/** Sample memory, publish transitions, and clean up when over threshold. */
	readonly checkPressure: () => MemoryPressureLevel;
	readonly start: () => void;
	readonly stop: () => void;
	readonly dispose: () => void;
	readonly isRunning: boolean;
	readonly degradedCleanups: number;
}

interface Registration {
	readonly cache: ManagedCache;
	readonly projectId?: string;
}

const defaultSampler = (): MemorySample => {
	const usage = process.memoryUsage();
	return { rssBytes: usage.rss, heapUsedBytes: usage.heapUsed };
};

const detectGarbageCollector = (): (() => void) | undefined => {
	const gc: unknown = Reflect.get(globalThis, 'gc');
	return typeof gc === 'function' ? () => gc() : undefined;
};

const clampRatio = (value: number, fallback: number): number =>
	Number.isFinite(value) ? Math.min(1, Math.max(0, value)) : fallback;

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createMemoryManager(
	options: MemoryManagerOptions = {},
): MemoryManager {
	const maxMemoryBytes = options.maxMemoryBytes ?? DEFAULT_MEMORY_LIMIT_BYTES;
	const warningThreshold = options.warningThreshold ?? 0.8;
	const criticalThreshold = options.criticalThreshold ?? 0.9;
	const softEvictionRatio = options.softEvictionRatio ?? 0.25;
	const cacheTargetRatio = options.cacheTargetRatio ?? 0.8;
	const checkIntervalMs = options.checkIntervalMs ?? 5_000;
	const historySize = Math.max(1, options.historySize ?? 100);
	const sampleMemory = options.sampleMemory ?? defaultSampler;
	const collectGarbage = options.collectGarbage ?? detectGarbageCollector();
	const now = options.now ?? Date.now;
	const { eventBus } = options;
	const logger = (options.logger ?? getDefaultLogger()).child('memory');

	if (warningThreshold >= criticalThreshold) {
		throw new RangeError(
			`warningThreshold (${warningThreshold}) must be below criticalThreshold (${criticalThreshold})`,
		);
	}

	const caches = new Map<string, Registration>();
	const history: number[] = [];
	let lastSample: MemorySample = { rssBytes: 0, heapUsedBytes: 0 };
	let peakRssBytes = 0;
	let gcCount = 0;
	let degradedCleanups = 0;
	let pressure: MemoryPressureLevel = 'normal';
	let activeProject: string | undefined;
	let timer: ReturnType<typeof setInterval> | undefined;

	// -----------------------------------------------------------------------
	// Sampling
	// -----------------------------------------------------------------------

	const sample = (): MemorySample => {
		try {
			lastSample = sampleMemory();
		} catch (error) {
			logger.warn('Memory sampler failed, reusing previous sample', {
				error: toError(error).message,
			});
		}
		if (lastSample.rssBytes > peakRssBytes) peakRssBytes = lastSample.rssBytes;
		return lastSample;
	};

	const levelFor = (rssBytes: number): MemoryPressureLevel => {
		const usage = rssBytes / maxMemoryBytes;
		if (usage >= criticalThreshold) return 'critical';
		if (usage >= warningThreshold) return 'warning';
		return 'normal';
	};

	const cacheBytes = (): number => {
		let total = 0;
		for (const { cache } of caches.values()) {
			try {
				total += cache.currentSizeBytes();
			} catch (error) {
				logger.warn('Failed to read cache size', {
					error: toError(error).message,
				});
			}
		}
		return total;
	};

	const snapshot = (current: MemorySample): MemoryStats =>
		Object.freeze({
			rssBytes: current.rssBytes,
			heapUsedBytes: current.heapUsedBytes,
			cacheBytes: cacheBytes(),
			peakRssBytes,
			gcCount,
			cacheCount: caches.size,
			pressure: levelFor(current.rssBytes),
			timestamp: now(),
		});

	// -----------------------------------------------------------------------
	// Cleanup
	// -----------------------------------------------------------------------

	const runCleanup = (
		mode: CleanupMode,
		evict: (registration: Registration) => void,
	): CleanupReport => {
		let freedBytes = 0;
		let evictedEntries = 0;
		let degraded = false;

		for (const [name, registration] of caches) {
			const { cache } = registration;
			try {
				const bytesBefore = cache.currentSizeBytes();
				const entriesBefore = cache.size;
				evict(registration);
				freedBytes += Math.max(0, bytesBefore - cache.currentSizeBytes());
				evictedEntries += Math.max(0, entriesBefore - cache.size);
			} catch (error) {
				degraded = true;
				logger.error(`Cleanup of cache "${name}" failed`, toError(error));
			}
		}

		if (degraded) degradedCleanups++;
		const stats = snapshot(sample());
		const report: CleanupReport = Object.freeze({
			mode,
			freedBytes,
			evictedEntries,
			degraded,
			stats,
		});

		logger.info(`${mode} cleanup freed ${freedBytes} bytes`, {
			evictedEntries,
			degraded,
			rssBytes: stats.rssBytes,
		});
		eventBus?.publish('memory.cleanup', {
			mode,
			freedBytes,
			evictedEntries,
			degraded,
		});
		return report;
	};

	const cleanup = (targetRatio?: number): CleanupReport => {
		const ratio = clampRatio(targetRatio ?? cacheTargetRatio, cacheTargetRatio);
		return runCleanup('target', ({ cache }) => {
			cache.trimTo(Math.floor(cache.maxBytes * ratio));
		});
	};

	const softCleanup = (): CleanupReport =>
		runCleanup('soft', ({ cache }) => {
			cache.evictFraction(softEvictionRatio);
		});

	const hardCleanup = (): CleanupReport =>
		runCleanup('hard', ({ cache, projectId }) => {
			if (activeProject !== undefined && projectId === activeProject) return;
			cache.clear();
		});

	const forceGarbageCollection = (): boolean => {
		if (!collectGarbage) {
			logger.debug('Garbage collection is not exposed (run node with --expose-gc)');
			return false;
		}
		let collected = false;
		try {
			collectGarbage();
			gcCount++;
			collected = true;
		} catch (error) {
			logger.warn('Forced garbage collection failed', {
				error: toError(error).message,
			});
		}
		eventBus?.publish('memory.gc', { collected });
		return collected;
	};

	// -----------------------------------------------------------------------
	// Monitoring
	// -----------------------------------------------------------------------

	const checkPressure = (): MemoryPressureLevel => {
		const current = sample();
		history.push(current.rssBytes);
		if (history.length > historySize) history.shift();

		const previousLevel = pressure;
		const level = levelFor(current.rssBytes);
		pressure = level;

		if (level !== previousLevel) {
			const details = {
				rssBytes: current.rssBytes,
				limitBytes: maxMemoryBytes,
				previousLevel,
			};
			if (level === 'normal') logger.info('Memory pressure cleared', details);
			else logger.warn(`Memory pressure ${level}`, details);
			eventBus?.publish('memory.pressure', {
				level,
				previousLevel,
				rssBytes: current.rssBytes,
				limitBytes: maxMemoryBytes,
			});
		}

		if (level === 'warning') {
			softCleanup();
		} else if (level === 'critical') {
			hardCleanup();
			forceGarbageCollection();
		}
		return level;
	};

	const stop = (): void => {
		if (timer === undefined) return;
		clearInterval(timer);
		timer = undefined;
		logger.debug('Memory monitoring stopped');
	};

	return Object.freeze({
		registerCache(
			name: string,
			cache: ManagedCache,
			registerOptions: RegisterCacheOptions = {},
		): void {
			caches.set(name, { cache, projectId: registerOptions.projectId });
			logger.debug(`Registered cache "${name}"`, {
				projectId: registerOptions.projectId,
			});
		},

		unregisterCache(name: string): boolean {
			return caches.delete(name);
		},

		registeredCaches(): readonly RegisteredCacheInfo[] {
			return Object.freeze(
				[...caches].map(([name, { cache, projectId }]) =>
					Object.freeze({
						name,
						projectId,
						entries: cache.size,
						sizeBytes: cache.currentSizeBytes(),
						maxBytes: cache.maxBytes,
					}),
				),
			);
		},

		setActiveProject(projectId?: string): void {
			activeProject = projectId;
		},

		get activeProject() {
			return activeProject;
		},

		getMemoryStats(): MemoryStats {
			return snapshot(sample());
		},

		getMemorySummary(): MemorySummary {
			const currentBytes = history.length > 0 ? lastSample.rssBytes : sample().rssBytes;
			const averageBytes =
				history.length > 0
					? history.reduce((sum, value) => sum + value, 0) / history.length
					: currentBytes;
			return Object.freeze({
				currentBytes,
				peakBytes: peakRssBytes,
				averageBytes,
				limitBytes: maxMemoryBytes,
				usagePercent: Math.round((currentBytes / maxMemoryBytes) * 10_000) / 100,
				samples: history.length,
			});
		},

		cleanup,
		softCleanup,
		hardCleanup,

		optimizeMemory(): OptimizeReport {
			const report = cleanup();
			const gcCollected = forceGarbageCollection();
			return Object.freeze({
				...report,
				stats: snapshot(sample()),
				gcCollected,
			});
		},

		forceGarbageCollection,
		checkPressure,

		start(): void {
			if (timer !== undefined || checkIntervalMs <= 0) return;
			timer = setInterval(() => {
				checkPressure();
			}, checkIntervalMs);
			timer.unref();
			logger.debug('Memory monitoring started', { checkIntervalMs });
		},

		stop,

		dispose(): void {
			stop();
			caches.clear();
			history.length = 0;
		},

		get isRunning() {
			return timer !== undefined;
		},

		get degradedCleanups() {
			return degradedCleanups;
		},
	});
}

// ---------------------------------------------------------------------------
// Process-wide instance
// ---------------------------------------------------------------------------

let defaultManager: MemoryManager | undefined;
let exitHook: (() => void) | undefined;

/**
 * Process-wide manager, created on first call with `options`. Later calls
 * return the same instance and ignore their options. Monitoring stops when
 * the process exits.
 */
export function getMemoryManager(options?: MemoryManagerOptions): MemoryManager {
	if (!defaultManager) {
		const manager = createMemoryManager(options);
		exitHook = () => manager.stop();
		process.once('exit', exitHook);
		defaultManager = manager;
	}
	return defaultManager;
}

/** Dispose the process-wide manager so the next call creates a fresh one. */
export function resetMemoryManager(): void {
	if (exitHook) process.removeListener('exit', exitHook);
	defaultManager?.dispose();
	defaultManager = undefined;
	exitHook = undefined;
}
