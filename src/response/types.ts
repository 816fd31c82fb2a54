// ---------------------------------------------------------------------------
// Response cache: shared types
// ---------------------------------------------------------------------------

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue =
	| JsonPrimitive
	| readonly JsonValue[]
	| { readonly [key: string]: JsonValue };

export const isJsonValue = (value: unknown): value is JsonValue => {
	if (value === null) return true;
	switch (typeof value) {
		case 'string':
		case 'boolean':
			return true;
		case 'number':
			return Number.isFinite(value);
		case 'object':
			if (Array.isArray(value)) return value.every(isJsonValue);
			return Object.values(value).every(isJsonValue);
		default:
			return false;
	}
};

/** One row of the persistent store. `expiresAt = createdAt + ttlSeconds * 1000`. */
export interface StoredResponse {
	readonly key: string;
	/** Gzip-compressed JSON. */
	readonly payload: Buffer;
	readonly createdAt: number;
	readonly ttlSeconds: number;
	readonly expiresAt: number;
	readonly payloadBytes: number;
}

export interface StoreStats {
	readonly entries: number;
	readonly payloadBytes: number;
	readonly expiredEntries: number;
}

/**
 * Persistence behind the response cache. The SQLite implementation lives
 * in `store.ts`; tests substitute in-process doubles.
 */
export interface ResponseStore {
	readonly path: string;
	readonly read: (key: string) => Promise<StoredResponse | undefined>;
	/** Insert or replace. Last write wins. */
	readonly write: (record: StoredResponse) => Promise<void>;
	/**
	 * Delete the row for `key`. With `expectedCreatedAt`, only a row written at
	 * that time is deleted, so a newer write survives.
	 */
	readonly remove: (key: string, expectedCreatedAt?: number) => Promise<boolean>;
	/** Remove every row. Returns the number removed. */
	readonly clear: () => Promise<number>;
	/** Remove rows with `expiresAt < now`. Returns the number removed. */
	readonly sweep: (now: number) => Promise<number>;
	readonly stats: (now: number) => Promise<StoreStats>;
	readonly close: () => Promise<void>;
}
