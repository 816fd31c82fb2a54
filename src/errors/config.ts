// ---------------------------------------------------------------------------
// Configuration Errors
// ---------------------------------------------------------------------------

import type { CacheError } from './base.js';
import { createCacheError, isCacheError, withFields } from './base.js';

export interface ConfigIssue {
	readonly path: string;
	readonly message: string;
}

export const createConfigError = (
	message: string,
	options: {
		code?: string;
		cause?: unknown;
		metadata?: Record<string, unknown>;
	} = {},
): CacheError =>
	createCacheError(message, {
		name: 'ConfigError',
		code: options.code ?? 'CONFIG_ERROR',
		statusCode: 400,
		cause: options.cause,
		metadata: options.metadata,
	});

export const createConfigNotFoundError = (
	configPath: string,
	options: { cause?: unknown } = {},
): CacheError =>
	createCacheError(`Configuration file not found: ${configPath}`, {
		name: 'ConfigNotFoundError',
		code: 'CONFIG_NOT_FOUND',
		statusCode: 400,
		cause: options.cause,
		metadata: { configPath },
	});

export const createConfigParseError = (
	configPath: string,
	options: { cause?: unknown } = {},
): CacheError =>
	createCacheError(`Configuration file is not valid JSON: ${configPath}`, {
		name: 'ConfigParseError',
		code: 'CONFIG_PARSE',
		statusCode: 400,
		cause: options.cause,
		metadata: { configPath },
	});

export const createConfigValidationError = (
	issues: readonly ConfigIssue[],
	options: { cause?: unknown } = {},
): CacheError & { readonly issues: readonly ConfigIssue[] } => {
	const [first] = issues;
	const summary =
		issues.length !== 1 || first === undefined
			? `${issues.length} validation errors`
			: first.path
				? `${first.path}: ${first.message}`
				: first.message;
	const frozenIssues = Object.freeze([...issues]);

	return withFields(
		createCacheError(`Invalid configuration: ${summary}`, {
			name: 'ConfigValidationError',
			code: 'CONFIG_VALIDATION',
			statusCode: 400,
			cause: options.cause,
			metadata: { issues: frozenIssues },
		}),
		{ issues: frozenIssues },
	);
};

// ---------------------------------------------------------------------------
// Type Guards
// ---------------------------------------------------------------------------

export const isConfigError = (value: unknown): value is CacheError =>
	isCacheError(value) && value.code.startsWith('CONFIG_');

export const isConfigNotFoundError = (value: unknown): value is CacheError =>
	isCacheError(value) && value.code === 'CONFIG_NOT_FOUND';

export const isConfigParseError = (value: unknown): value is CacheError =>
	isCacheError(value) && value.code === 'CONFIG_PARSE';

export const isConfigValidationError = (
	value: unknown,
): value is CacheError & { readonly issues: readonly ConfigIssue[] } =>
	isCacheError(value) && value.code === 'CONFIG_VALIDATION';
