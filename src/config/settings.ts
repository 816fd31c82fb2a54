// ---------------------------------------------------------------------------
// Configuration: resolution and loading
// ---------------------------------------------------------------------------
//
// `defineCacheConfig` validates a plain object against the zod schema and
// returns a frozen, fully-resolved `CacheConfig`. `loadCacheConfig` does the
// same for a JSON file on disk.
// ---------------------------------------------------------------------------

import { readFile } from 'node:fs/promises';
import type { ZodError, ZodTypeAny, z } from 'zod';
import {
	type ConfigIssue,
	createConfigNotFoundError,
	createConfigParseError,
	createConfigValidationError,
	systemErrorCode,
} from '../errors/index.js';
import {
	type CacheConfig,
	type CacheConfigInput,
	cacheConfigSchema,
	loaderSchema,
	logLevelSchema,
	memorySchema,
	projectCacheSchema,
	responseCacheSchema,
} from './schema.js';

export interface DefineConfigOptions {
	/**
	 * If `true`, an invalid section falls back to its defaults instead of
	 * throwing. Defaults to `false`.
	 */
	readonly lenient?: boolean;
	/** Called in lenient mode with the issues that were ignored. */
	readonly onWarn?: (issues: readonly ConfigIssue[]) => void;
}

const toIssues = (error: ZodError, prefix = ''): ConfigIssue[] =>
	error.issues.map((issue) => ({
		path: [prefix, ...issue.path.map(String)].filter(Boolean).join('.'),
		message: issue.message,
	}));

const freezeConfig = (config: z.output<typeof cacheConfigSchema>): CacheConfig =>
	Object.freeze({
		memory: Object.freeze({ ...config.memory }),
		projectCache: Object.freeze({ ...config.projectCache }),
		loader: Object.freeze({ ...config.loader }),
		responseCache: Object.freeze({ ...config.responseCache }),
		logLevel: config.logLevel,
	});

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === 'object' && value !== null && !Array.isArray(value);

const parseSection = <S extends ZodTypeAny>(
	schema: S,
	value: unknown,
	path: string,
	issues: ConfigIssue[],
): z.output<S> => {
	const result = schema.safeParse(value);
	if (result.success) return result.data;
	issues.push(...toIssues(result.error, path));
	return schema.parse(undefined);
};

/**
 * Resolve a configuration object, applying defaults.
 *
 * @example
 * ```ts
 * const config = defineCacheConfig({
 *   memory: { maxMemoryBytes: 256 * 1024 * 1024 },
 *   responseCache: { dbPath: 'projects/.cache/responses.db' },
 * });
 * ```
 *
 * @throws {ConfigValidationError} When the input is invalid and `lenient` is off.
 */
export function defineCacheConfig(
	input: CacheConfigInput = {},
	options: DefineConfigOptions = {},
): CacheConfig {
	return resolveCacheConfig(input, options);
}

function resolveCacheConfig(
	input: unknown,
	options: DefineConfigOptions,
): CacheConfig {
	const result = cacheConfigSchema.safeParse(input);
	if (result.success) return freezeConfig(result.data);

	if (!options.lenient) {
		throw createConfigValidationError(toIssues(result.error), {
			cause: result.error,
		});
	}

	const issues: ConfigIssue[] = [];
	const raw: Record<string, unknown> = isRecord(input) ? input : {};

	const resolved = {
		memory: parseSection(memorySchema.default({}), raw.memory, 'memory', issues),
		projectCache: parseSection(
			projectCacheSchema.default({}),
			raw.projectCache,
			'projectCache',
			issues,
		),
		loader: parseSection(loaderSchema.default({}), raw.loader, 'loader', issues),
		responseCache: parseSection(
			responseCacheSchema.default({}),
			raw.responseCache,
			'responseCache',
			issues,
		),
		logLevel: parseSection(logLevelSchema, raw.logLevel, 'logLevel', issues),
	};

	options.onWarn?.(Object.freeze(issues));
	return freezeConfig(resolved);
}

/**
 * Read a JSON configuration file and resolve it with `defineCacheConfig`.
 *
 * @throws {ConfigNotFoundError} When the file does not exist.
 * @throws {ConfigParseError} When the file is not valid JSON.
 */
export async function loadCacheConfig(
	configPath: string,
	options: DefineConfigOptions = {},
): Promise<CacheConfig> {
	let text: string;
	try {
		text = await readFile(configPath, 'utf-8');
	} catch (error) {
		if (systemErrorCode(error) === 'ENOENT') {
			throw createConfigNotFoundError(configPath, { cause: error });
		}
		throw error;
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(text);
	} catch (error) {
		throw createConfigParseError(configPath, { cause: error });
	}

	if (!isRecord(parsed)) {
		throw createConfigValidationError([
			{ path: '', message: 'Configuration root must be an object' },
		]);
	}

	return resolveCacheConfig(parsed, options);
}
