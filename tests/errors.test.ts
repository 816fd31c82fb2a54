import { describe, expect, it } from 'vitest';
import {
	createCacheError,
	createChunkOutOfRangeError,
	createConfigError,
	createConfigNotFoundError,
	createConfigParseError,
	createConfigValidationError,
	createCorruptRecordError,
	createExpiredError,
	createIOFailureError,
	createNotFoundError,
	createStaleError,
	createTimeoutError,
	createTooLargeError,
	isCacheError,
	isChunkOutOfRangeError,
	isConfigError,
	isConfigNotFoundError,
	isConfigParseError,
	isConfigValidationError,
	isCorruptRecordError,
	isExpiredError,
	isIOFailureError,
	isNotFoundError,
	isStaleError,
	isTimeoutError,
	isTooLargeError,
	systemErrorCode,
	toError,
	wrapError,
} from '../src/errors/index.js';

// ---------------------------------------------------------------------------
// CacheError (base)
// ---------------------------------------------------------------------------

describe('CacheError', () => {
	it('should create an error with default values', () => {
		const err = createCacheError('something went wrong');

		expect(isCacheError(err)).toBe(true);
		expect(err).toBeInstanceOf(Error);
		expect(err.name).toBe('CacheError');
		expect(err.message).toBe('something went wrong');
		expect(err.code).toBe('CACHE_ERROR');
		expect(err.statusCode).toBe(500);
		expect(err.metadata).toEqual({});
		expect(err.cause).toBeUndefined();
	});

	it('should accept custom code, statusCode, cause, and metadata', () => {
		const cause = new Error('root cause');
		const err = createCacheError('with options', {
			code: 'CUSTOM_CODE',
			statusCode: 418,
			cause,
			metadata: { foo: 'bar' },
		});

		expect(err.code).toBe('CUSTOM_CODE');
		expect(err.statusCode).toBe(418);
		expect(err.cause).toBe(cause);
		expect(err.metadata).toEqual({ foo: 'bar' });
	});

	it('should serialize to JSON', () => {
		const err = createCacheError('json test', {
			code: 'JSON_CODE',
			statusCode: 400,
			cause: new Error('inner'),
			metadata: { key: 123 },
		});

		const json = err.toJSON();

		expect(json.name).toBe('CacheError');
		expect(json.code).toBe('JSON_CODE');
		expect(json.message).toBe('json test');
		expect(json.metadata).toEqual({ key: 123 });
		expect(json.cause).toEqual({ name: 'Error', message: 'inner' });
	});

	it('should keep a non-Error cause as is in JSON', () => {
		expect(createCacheError('x', { cause: 'oops' }).toJSON().cause).toBe('oops');
	});

	it('should make the structured fields read-only', () => {
		const err = createCacheError('locked', { code: 'LOCKED' });

		expect(() => Object.assign(err, { code: 'CHANGED' })).toThrow(TypeError);
		expect(err.code).toBe('LOCKED');
	});

	it('should not treat plain errors as cache errors', () => {
		expect(isCacheError(new Error('plain'))).toBe(false);
		expect(isCacheError({ code: 'X', statusCode: 1, toJSON: () => ({}) })).toBe(false);
		expect(isCacheError(undefined)).toBe(false);
	});
});

// ---------------------------------------------------------------------------
// Cache domain errors
// ---------------------------------------------------------------------------

describe('NotFoundError', () => {
	it('should carry the path', () => {
		const err = createNotFoundError('/novels/draft.txt');

		expect(isNotFoundError(err)).toBe(true);
		expect(err.code).toBe('NOT_FOUND');
		expect(err.statusCode).toBe(404);
		expect(err.path).toBe('/novels/draft.txt');
		expect(err.message).toBe('File not found: /novels/draft.txt');
	});
});

describe('TooLargeError', () => {
	it('should carry the size and the capacity', () => {
		const err = createTooLargeError('chapter-1', 300, 200);

		expect(isTooLargeError(err)).toBe(true);
		expect(err.sizeBytes).toBe(300);
		expect(err.maxBytes).toBe(200);
		expect(err.message).toBe(
			'Value for "chapter-1" is 300 bytes, over the 200-byte capacity',
		);
	});
});

describe('StaleError', () => {
	it('should record both fingerprints in metadata', () => {
		const expected = { size: 10, mtimeMs: 1 };
		const actual = { size: 12, mtimeMs: 2 };
		const err = createStaleError('/novels/draft.txt', expected, actual);

		expect(isStaleError(err)).toBe(true);
		expect(err.statusCode).toBe(409);
		expect(err.metadata).toEqual({ path: '/novels/draft.txt', expected, actual });
	});
});

describe('IOFailureError', () => {
	it('should name the operation and keep the cause', () => {
		const cause = new Error('EIO');
		const err = createIOFailureError('responses.db', 'open', { cause });

		expect(isIOFailureError(err)).toBe(true);
		expect(err.message).toBe('Failed to open responses.db');
		expect(err.target).toBe('responses.db');
		expect(err.cause).toBe(cause);
		expect(err.metadata).toEqual({ target: 'responses.db', operation: 'open' });
	});
});

describe('ExpiredError', () => {
	it('should carry the expiry time', () => {
		const err = createExpiredError('abc', 1_700_000_000_000);

		expect(isExpiredError(err)).toBe(true);
		expect(err.expiredAt).toBe(1_700_000_000_000);
		expect(err.statusCode).toBe(410);
	});
});

describe('CorruptRecordError', () => {
	it('should keep the decode failure as cause', () => {
		const cause = new SyntaxError('Unexpected token');
		const err = createCorruptRecordError('abc', { cause });

		expect(isCorruptRecordError(err)).toBe(true);
		expect(err.message).toBe('Cached record abc could not be decoded');
		expect(err.cause).toBe(cause);
	});
});

describe('ChunkOutOfRangeError', () => {
	it('should carry the index', () => {
		const err = createChunkOutOfRangeError('/novels/draft.txt', 7, 4);

		expect(isChunkOutOfRangeError(err)).toBe(true);
		expect(err.index).toBe(7);
		expect(err.message).toBe('Chunk 7 is out of range for /novels/draft.txt (4 chunks)');
	});
});

// ---------------------------------------------------------------------------
// Config errors
// ---------------------------------------------------------------------------

describe('ConfigError', () => {
	it('should default code to CONFIG_ERROR and statusCode to 400', () => {
		const err = createConfigError('bad config');

		expect(isConfigError(err)).toBe(true);
		expect(err.name).toBe('ConfigError');
		expect(err.code).toBe('CONFIG_ERROR');
		expect(err.statusCode).toBe(400);
	});

	it('should match every config error code', () => {
		expect(isConfigError(createConfigNotFoundError('a.json'))).toBe(true);
		expect(isConfigError(createConfigParseError('a.json'))).toBe(true);
		expect(isConfigError(createConfigValidationError([]))).toBe(true);
		expect(isConfigError(createNotFoundError('a.json'))).toBe(false);
	});
});

describe('ConfigNotFoundError', () => {
	it('should include the config path in message and metadata', () => {
		const err = createConfigNotFoundError('/path/to/cache.json');

		expect(isConfigNotFoundError(err)).toBe(true);
		expect(err.message).toBe('Configuration file not found: /path/to/cache.json');
		expect(err.metadata).toEqual({ configPath: '/path/to/cache.json' });
	});
});

describe('ConfigParseError', () => {
	it('should preserve the cause', () => {
		const cause = new SyntaxError('Unexpected end of JSON input');
		const err = createConfigParseError('cache.json', { cause });

		expect(isConfigParseError(err)).toBe(true);
		expect(err.cause).toBe(cause);
	});
});

describe('ConfigValidationError', () => {
	it('should format a single issue', () => {
		const err = createConfigValidationError([
			{ path: 'loader.chunkSize', message: 'must be positive' },
		]);

		expect(isConfigValidationError(err)).toBe(true);
		expect(err.message).toBe('Invalid configuration: loader.chunkSize: must be positive');
		expect(err.issues).toHaveLength(1);
	});

	it('should omit an empty path', () => {
		const err = createConfigValidationError([{ path: '', message: 'must be an object' }]);

		expect(err.message).toBe('Invalid configuration: must be an object');
	});

	it('should count multiple issues', () => {
		const err = createConfigValidationError([
			{ path: 'a', message: 'x' },
			{ path: 'b', message: 'y' },
		]);

		expect(err.message).toBe('Invalid configuration: 2 validation errors');
		expect(Object.isFrozen(err.issues)).toBe(true);
	});
});

// ---------------------------------------------------------------------------
// Timeout
// ---------------------------------------------------------------------------

describe('TimeoutError', () => {
	it('should carry the operation and duration', () => {
		const err = createTimeoutError('response-cache.read', 3000);

		expect(isTimeoutError(err)).toBe(true);
		expect(err.message).toBe('Operation "response-cache.read" timed out after 3000ms');
		expect(err.operation).toBe('response-cache.read');
		expect(err.timeoutMs).toBe(3000);
		expect(err.statusCode).toBe(504);
	});
});

// ---------------------------------------------------------------------------
// Utilities
// ---------------------------------------------------------------------------

describe('toError', () => {
	it('should return Error instances unchanged', () => {
		const err = new Error('same');
		expect(toError(err)).toBe(err);
	});

	it('should wrap strings and other values', () => {
		expect(toError('text').message).toBe('text');
		expect(toError(42).message).toBe('42');
	});
});

describe('wrapError', () => {
	it('should keep the original as cause', () => {
		const cause = new Error('inner');
		const err = wrapError('outer', cause, 'WRAPPED');

		expect(err.code).toBe('WRAPPED');
		expect(err.cause).toBe(cause);
	});
});

describe('systemErrorCode', () => {
	it('should read the code from system errors', () => {
		const err = Object.assign(new Error('no such file'), { code: 'ENOENT' });

		expect(systemErrorCode(err)).toBe('ENOENT');
		expect(systemErrorCode(new Error('plain'))).toBeUndefined();
		expect(systemErrorCode('ENOENT')).toBeUndefined();
	});
});
