// ---------------------------------------------------------------------------
// CacheError: base interface, factory, type guard, and utilities
// ---------------------------------------------------------------------------

/**
 * Shape of every error produced by the cache subsystem. Consumers
 * discriminate on `code` through the type guards exported from sibling
 * modules rather than with `instanceof`.
 */
export interface CacheError extends Error {
	/** Machine-readable error code (e.g. "STALE", "IO_FAILURE"). */
	readonly code: string;
	/** HTTP-style status hint. */
	readonly statusCode: number;
	/** Structured context attached to the error. */
	readonly metadata: Readonly<Record<string, unknown>>;
	/** Plain-object representation for logging / serialisation. */
	readonly toJSON: () => Record<string, unknown>;
}

export interface CacheErrorOptions {
	readonly name?: string;
	readonly code?: string;
	readonly statusCode?: number;
	readonly cause?: unknown;
	readonly metadata?: Readonly<Record<string, unknown>>;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const serializeCause = (cause: unknown): unknown =>
	cause instanceof Error ? { name: cause.name, message: cause.message } : cause;

const lock = (target: object, keys: readonly string[]): void => {
	for (const key of keys) {
		Object.defineProperty(target, key, { writable: false });
	}
};

/**
 * Attach extra read-only fields to an existing error. Used by the
 * per-domain factories (`path`, `sizeBytes`, ...).
 */
export const withFields = <E extends Readonly<Record<string, unknown>>>(
	err: CacheError,
	fields: E,
): CacheError & Readonly<E> => {
	const extended = Object.assign(err, fields);
	lock(extended, Object.keys(fields));
	return extended;
};

// ---------------------------------------------------------------------------
// Base factory
// ---------------------------------------------------------------------------

/**
 * Create a `CacheError`: a plain `Error` augmented with structured fields.
 * This is the only place in the codebase where `new Error` is used for
 * domain failures.
 */
export const createCacheError = (
	message: string,
	options: CacheErrorOptions = {},
): CacheError => {
	const code = options.code ?? 'CACHE_ERROR';
	const statusCode = options.statusCode ?? 500;
	const metadata = Object.freeze({ ...(options.metadata ?? {}) });
	const base = new Error(message, { cause: options.cause });
	base.name = options.name ?? 'CacheError';

	const err = Object.assign(base, {
		code,
		statusCode,
		metadata,
		toJSON: (): Record<string, unknown> => ({
			name: base.name,
			code,
			message: base.message,
			statusCode,
			metadata,
			cause: serializeCause(base.cause),
			stack: base.stack,
		}),
	});

	lock(err, ['code', 'statusCode', 'metadata']);
	Object.defineProperty(err, 'toJSON', { enumerable: false, writable: false });

	return err;
};

// ---------------------------------------------------------------------------
// Base type guard
// ---------------------------------------------------------------------------

/**
 * Checks whether a value is a `CacheError` by duck-typing its fields.
 */
export const isCacheError = (value: unknown): value is CacheError =>
	value instanceof Error &&
	typeof Reflect.get(value, 'code') === 'string' &&
	typeof Reflect.get(value, 'statusCode') === 'number' &&
	typeof Reflect.get(value, 'toJSON') === 'function';

// ---------------------------------------------------------------------------
// Utilities
// ---------------------------------------------------------------------------

/**
 * Normalise an unknown thrown value into an `Error` instance.
 */
export const toError = (value: unknown): Error => {
	if (value instanceof Error) return value;
	if (typeof value === 'string') return new Error(value);
	return new Error(String(value));
};

/**
 * Wrap an unknown cause in a `CacheError`, keeping it as `cause`.
 */
export const wrapError = (
	message: string,
	cause: unknown,
	code?: string,
): CacheError => createCacheError(message, { cause, code });

/**
 * Extract the Node.js system error code (`ENOENT`, `EACCES`, ...) from an
 * unknown thrown value, if there is one.
 */
export const systemErrorCode = (value: unknown): string | undefined => {
	if (!(value instanceof Error)) return undefined;
	const code: unknown = Reflect.get(value, 'code');
	return typeof code === 'string' ? code : undefined;
};
