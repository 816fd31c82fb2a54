// ---------------------------------------------------------------------------
// SQLite response store
// ---------------------------------------------------------------------------
//
// better-sqlite3 database accessed through Kysely. WAL journaling lets
// readers proceed while another process writes, and `busy_timeout` makes
// concurrent writers wait instead of failing immediately. Writes are
// upserts, so the last writer of a key wins.
// ---------------------------------------------------------------------------

import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { Kysely, SqliteDialect } from 'kysely';
import { createIOFailureError } from '../errors/index.js';
import type { Logger } from '../logger.js';
import { getDefaultLogger } from '../logger.js';
import type { ResponseStore, StoredResponse, StoreStats } from './types.js';

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

export interface ResponseCacheTable {
	key: string;
	payload: Buffer;
	created_at: number;
	ttl_seconds: number;
	expires_at: number;
	payload_bytes: number;
}

export interface ResponseCacheDatabase {
	response_cache: ResponseCacheTable;
}

export const IN_MEMORY_PATH = ':memory:';

async function migrate(db: Kysely<ResponseCacheDatabase>): Promise<void> {
	await db.schema
		.createTable('response_cache')
		.ifNotExists()
		.addColumn('key', 'text', (col) => col.primaryKey())
		.addColumn('payload', 'blob', (col) => col.notNull())
		.addColumn('created_at', 'integer', (col) => col.notNull())
		.addColumn('ttl_seconds', 'real', (col) => col.notNull())
		.addColumn('expires_at', 'integer', (col) => col.notNull())
		.addColumn('payload_bytes', 'integer', (col) => col.notNull())
		.execute();

	await db.schema
		.createIndex('idx_response_cache_expires_at')
		.ifNotExists()
		.on('response_cache')
		.column('expires_at')
		.execute();
}

const toRecord = (row: ResponseCacheTable): StoredResponse =>
	Object.freeze({
		key: row.key,
		payload: row.payload,
		createdAt: row.created_at,
		ttlSeconds: row.ttl_seconds,
		expiresAt: row.expires_at,
		payloadBytes: row.payload_bytes,
	});

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export interface SqliteStoreOptions {
	/** How long a writer waits for a lock held by another connection. */
	readonly busyTimeoutMs?: number;
	readonly logger?: Logger;
}

/**
 * Open (creating if needed) the SQLite store at `path`. Pass `":memory:"`
 * for a private in-memory database.
 *
 * @throws {IOFailureError} When the database cannot be opened or migrated.
 */
export async function openSqliteResponseStore(
	path: string,
	options: SqliteStoreOptions = {},
): Promise<ResponseStore> {
	const busyTimeoutMs = options.busyTimeoutMs ?? 2_000;
	const logger = (options.logger ?? getDefaultLogger()).child('sqlite');

	let db: Kysely<ResponseCacheDatabase>;
	try {
		if (path !== IN_MEMORY_PATH) {
			await mkdir(dirname(path), { recursive: true });
		}
		const database = new Database(path);
		database.pragma('journal_mode = WAL');
		database.pragma(`busy_timeout = ${Math.max(0, Math.floor(busyTimeoutMs))}`);
		db = new Kysely<ResponseCacheDatabase>({
			dialect: new SqliteDialect({ database }),
		});
	} catch (error) {
		throw createIOFailureError(path, 'open', { cause: error });
	}

	try {
		await migrate(db);
	} catch (error) {
		await db.destroy();
		throw createIOFailureError(path, 'open', { cause: error });
	}

	logger.debug(`Opened response store at ${path}`);

	return Object.freeze({
		path,

		async read(key: string): Promise<StoredResponse | undefined> {
			const row = await db
				.selectFrom('response_cache')
				.selectAll()
				.where('key', '=', key)
				.executeTakeFirst();
			return row ? toRecord(row) : undefined;
		},

		async write(record: StoredResponse): Promise<void> {
			const row: ResponseCacheTable = {
				key: record.key,
				payload: record.payload,
				created_at: record.createdAt,
				ttl_seconds: record.ttlSeconds,
				expires_at: record.expiresAt,
				payload_bytes: record.payloadBytes,
			};
			await db
				.insertInto('response_cache')
				.values(row)
				.onConflict((oc) =>
					oc.column('key').doUpdateSet({
						payload: row.payload,
						created_at: row.created_at,
						ttl_seconds: row.ttl_seconds,
						expires_at: row.expires_at,
						payload_bytes: row.payload_bytes,
					}),
				)
				.execute();
		},

		async remove(key: string, expectedCreatedAt?: number): Promise<boolean> {
			let query = db.deleteFrom('response_cache').where('key', '=', key);
			if (expectedCreatedAt !== undefined) {
				query = query.where('created_at', '=', expectedCreatedAt);
			}
			const result = await query.executeTakeFirst();
			return result.numDeletedRows > 0n;
		},

		async clear(): Promise<number> {
			const result = await db.deleteFrom('response_cache').executeTakeFirst();
			return Number(result.numDeletedRows);
		},

		async sweep(now: number): Promise<number> {
			const result = await db
				.deleteFrom('response_cache')
				.where('expires_at', '<', now)
				.executeTakeFirst();
			return Number(result.numDeletedRows);
		},

		async stats(now: number): Promise<StoreStats> {
			const totals = await db
				.selectFrom('response_cache')
				.select((eb) => [
					eb.fn.countAll<number>().as('entries'),
					eb.fn.sum<number | null>('payload_bytes').as('payload_bytes'),
				])
				.executeTakeFirstOrThrow();
			const expired = await db
				.selectFrom('response_cache')
				.select((eb) => eb.fn.countAll<number>().as('entries'))
				.where('expires_at', '<', now)
				.executeTakeFirstOrThrow();
			return Object.freeze({
				entries: Number(totals.entries),
				payloadBytes: Number(totals.payload_bytes ?? 0),
				expiredEntries: Number(expired.entries),
			});
		},

		async close(): Promise<void> {
			await db.destroy();
		},
	});
}
