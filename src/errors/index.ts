// ---------------------------------------------------------------------------
// Error barrel: re-exports all error factories, type guards, and utilities
// ---------------------------------------------------------------------------

export {
	type CacheError,
	type CacheErrorOptions,
	createCacheError,
	isCacheError,
	systemErrorCode,
	toError,
	withFields,
	wrapError,
} from './base.js';
export {
	createChunkOutOfRangeError,
	createCorruptRecordError,
	createExpiredError,
	createIOFailureError,
	createNotFoundError,
	createStaleError,
	createTooLargeError,
	type FileFingerprint,
	isChunkOutOfRangeError,
	isCorruptRecordError,
	isExpiredError,
	isIOFailureError,
	isNotFoundError,
	isStaleError,
	isTooLargeError,
} from './cache.js';
export {
	type ConfigIssue,
	createConfigError,
	createConfigNotFoundError,
	createConfigParseError,
	createConfigValidationError,
	isConfigError,
	isConfigNotFoundError,
	isConfigParseError,
	isConfigValidationError,
} from './config.js';
export { createTimeoutError, isTimeoutError } from './resilience.js';
