// ---------------------------------------------------------------------------
// Payload compression
// ---------------------------------------------------------------------------
//
// JSON payloads are stored gzip-compressed. Decoding validates both the
// gzip frame and the JSON shape so a damaged row surfaces as an error the
// cache can turn into CORRUPT_RECORD.
// ---------------------------------------------------------------------------

import { Buffer } from 'node:buffer';
import { promisify } from 'node:util';
import { gunzip, gzip } from 'node:zlib';
import { type JsonValue, isJsonValue } from './types.js';

const gzipAsync = promisify(gzip);
const gunzipAsync = promisify(gunzip);

export interface CompressionOptions {
	/**
	 * Gzip compression level (1–9). Higher = smaller output but slower.
	 * Defaults to `6` (balanced).
	 */
	readonly level?: number;
}

/**
 * Detect whether a buffer starts with the gzip magic bytes (0x1f 0x8b).
 */
export function isGzipped(data: Buffer): boolean {
	return data.length >= 2 && data[0] === 0x1f && data[1] === 0x8b;
}

/**
 * Serialise a JSON value and gzip it.
 */
export async function compressPayload(
	value: JsonValue,
	options?: CompressionOptions,
): Promise<Buffer> {
	const level = options?.level ?? 6;
	return gzipAsync(Buffer.from(JSON.stringify(value), 'utf-8'), { level });
}

/**
 * Gunzip and parse a stored payload.
 *
 * @throws When the data is not gzip, not JSON, or not a JSON value.
 */
export async function decompressPayload(data: Buffer): Promise<JsonValue> {
	if (!isGzipped(data)) {
		throw new Error('Payload is not gzip-compressed');
	}
	const text = (await gunzipAsync(data)).toString('utf-8');
	const parsed: unknown = JSON.parse(text);
	if (!isJsonValue(parsed)) {
		throw new Error('Payload is not a JSON value');
	}
	return parsed;
}
