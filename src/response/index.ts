export {
	compressPayload,
	decompressPayload,
	isGzipped,
} from './compression.js';
export {
	type CharacterRef,
	canonicalJson,
	contextFingerprint,
	createFingerprint,
	type FingerprintLike,
	fingerprintKey,
	type ProjectContext,
	type RequestDescriptor,
	type ResponseFingerprint,
} from './fingerprint.js';
export {
	type LookupResult,
	openResponseCache,
	type PersistentResponseCache,
	type ResponseCacheOptions,
	type ResponseCacheStats,
} from './response-cache.js';
export {
	openSqliteResponseStore,
	type SqliteStoreOptions,
} from './store.js';
export {
	isJsonValue,
	type JsonValue,
	type ResponseStore,
	type StoredResponse,
	type StoreStats,
} from './types.js';
