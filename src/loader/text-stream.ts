// ---------------------------------------------------------------------------
// Streaming text helpers
// ---------------------------------------------------------------------------
//
// Whole-file operations that stream instead of loading: statistics, a
// chunked transform from one file to another, and a reader that returns
// small files as a string and large ones as a LazyTextLoader.
// ---------------------------------------------------------------------------

import { createReadStream, createWriteStream } from 'node:fs';
import { readFile, stat } from 'node:fs/promises';
import { createInterface } from 'node:readline';
import { pipeline } from 'node:stream/promises';
import { DEFAULT_CHUNK_SIZE } from '../config/schema.js';
import {
	createIOFailureError,
	createNotFoundError,
	systemErrorCode,
	toError,
} from '../errors/index.js';
import type { Logger } from '../logger.js';
import { getDefaultLogger } from '../logger.js';
import {
	type LazyTextLoader,
	type LazyTextLoaderOptions,
	openLazyTextLoader,
} from './lazy-text-loader.js';

export interface TextFileStats {
	readonly sizeBytes: number;
	readonly lineCount: number;
	readonly wordCount: number;
	/** Characters excluding line terminators. */
	readonly charCount: number;
	readonly averageLineLength: number;
}

export interface StreamOptions {
	readonly chunkSize?: number;
	readonly logger?: Logger;
}

export type SmartReadResult =
	| { readonly kind: 'text'; readonly text: string; readonly size: number }
	| { readonly kind: 'lazy'; readonly loader: LazyTextLoader; readonly size: number };

export interface SmartReadOptions extends LazyTextLoaderOptions {
	/** Files strictly larger than this are opened lazily. Defaults to 1 MiB. */
	readonly lazyThresholdBytes?: number;
}

const statOrThrow = async (path: string): Promise<number> => {
	try {
		return (await stat(path)).size;
	} catch (error) {
		if (systemErrorCode(error) === 'ENOENT') {
			throw createNotFoundError(path, { cause: error });
		}
		throw createIOFailureError(path, 'stat', { cause: error });
	}
};

const countWords = (line: string): number => {
	let words = 0;
	for (const token of line.split(/\s+/)) {
		if (token.length > 0) words++;
	}
	return words;
};

/**
 * Line, word and character counts of a UTF-8 file, computed in one
 * streaming pass.
 *
 * @throws {NotFoundError} When the file does not exist.
 */
export async function analyzeTextFile(
	path: string,
	options: StreamOptions = {},
): Promise<TextFileStats> {
	const sizeBytes = await statOrThrow(path);
	let lineCount = 0;
	let wordCount = 0;
	let charCount = 0;

	const stream = createReadStream(path, {
		encoding: 'utf8',
		highWaterMark: options.chunkSize ?? DEFAULT_CHUNK_SIZE,
	});
	const reader = createInterface({ input: stream, crlfDelay: Number.POSITIVE_INFINITY });
	try {
		for await (const line of reader) {
			lineCount++;
			charCount += line.length;
			wordCount += countWords(line);
		}
	} catch (error) {
		throw createIOFailureError(path, 'read', { cause: error });
	} finally {
		reader.close();
		stream.destroy();
	}

	return Object.freeze({
		sizeBytes,
		lineCount,
		wordCount,
		charCount,
		averageLineLength: charCount / Math.max(lineCount, 1),
	});
}

/**
 * Yield `processor(chunk)` for each decoded chunk of the file. Chunks are
 * split on byte boundaries but never inside a UTF-8 sequence.
 */
export async function* processTextFile(
	path: string,
	processor: (chunk: string) => string,
	options: StreamOptions = {},
): AsyncGenerator<string> {
	await statOrThrow(path);
	const stream = createReadStream(path, {
		encoding: 'utf8',
		highWaterMark: options.chunkSize ?? DEFAULT_CHUNK_SIZE,
	});
	try {
		for await (const chunk of stream) {
			yield processor(String(chunk));
		}
	} finally {
		stream.destroy();
	}
}

/**
 * Stream `inputPath` through `processor` into `outputPath`. Failures are
 * logged and reported as `false`.
 */
export async function transformTextFile(
	inputPath: string,
	outputPath: string,
	processor: (chunk: string) => string,
	options: StreamOptions = {},
): Promise<boolean> {
	const logger = (options.logger ?? getDefaultLogger()).child('text-stream');
	try {
		await pipeline(
			processTextFile(inputPath, processor, options),
			createWriteStream(outputPath, { encoding: 'utf8' }),
		);
		return true;
	} catch (error) {
		logger.error(`Failed to transform ${inputPath}`, toError(error));
		return false;
	}
}

/**
 * Read a file whole when it is small, or open a LazyTextLoader when it is
 * larger than `lazyThresholdBytes`.
 *
 * @throws {NotFoundError} When the file does not exist.
 */
export async function readTextSmart(
	path: string,
	options: SmartReadOptions = {},
): Promise<SmartReadResult> {
	const threshold = options.lazyThresholdBytes ?? DEFAULT_CHUNK_SIZE;
	const size = await statOrThrow(path);

	if (size > threshold) {
		return Object.freeze({
			kind: 'lazy',
			loader: await openLazyTextLoader(path, options),
			size,
		});
	}

	try {
		return Object.freeze({ kind: 'text', text: await readFile(path, 'utf8'), size });
	} catch (error) {
		if (systemErrorCode(error) === 'ENOENT') {
			throw createNotFoundError(path, { cause: error });
		}
		throw createIOFailureError(path, 'read', { cause: error });
	}
}
