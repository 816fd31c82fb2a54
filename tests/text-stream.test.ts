import { readFile, writeFile } from 'node:fs/promises';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { isNotFoundError } from '../src/errors/index.js';
import {
	analyzeTextFile,
	processTextFile,
	readTextSmart,
	transformTextFile,
} from '../src/loader/text-stream.js';
import { createNoopLogger } from '../src/logger.js';
import {
	collect,
	createTempDir,
	createTestLogger,
	rejectionOf,
	type TempDir,
} from './utils/mocks.js';

const logger = createNoopLogger();

describe('text streaming', () => {
	let dir: TempDir;

	beforeEach(async () => {
		dir = await createTempDir();
	});

	afterEach(async () => {
		await dir.cleanup();
	});

	describe('analyzeTextFile', () => {
		it('counts lines, words and characters', async () => {
			const path = dir.file('draft.txt');
			await writeFile(path, 'one two\nthree\n\nfour five six\n');

			expect(await analyzeTextFile(path, { chunkSize: 4 })).toEqual({
				sizeBytes: 29,
				lineCount: 4,
				wordCount: 6,
				charCount: 25,
				averageLineLength: 6.25,
			});
		});

		it('reports a missing file as NOT_FOUND', async () => {
			const error = await rejectionOf(analyzeTextFile(dir.file('missing.txt')));

			expect(isNotFoundError(error)).toBe(true);
		});
	});

	describe('processTextFile', () => {
		it('yields each processed chunk', async () => {
			const path = dir.file('letters.txt');
			await writeFile(path, 'abcdefghij');

			const chunks = await collect(
				processTextFile(path, (chunk) => `[${chunk}]`, { chunkSize: 4 }),
			);

			expect(chunks).toEqual(['[abcd]', '[efgh]', '[ij]']);
		});
	});

	describe('transformTextFile', () => {
		it('writes the transformed content and returns true', async () => {
			const input = dir.file('in.txt');
			const output = dir.file('out.txt');
			await writeFile(input, 'hello\nworld\n');

			const ok = await transformTextFile(input, output, (chunk) => chunk.toUpperCase(), {
				chunkSize: 4,
				logger,
			});

			expect(ok).toBe(true);
			expect(await readFile(output, 'utf8')).toBe('HELLO\nWORLD\n');
		});

		it('returns false and logs when the input is missing', async () => {
			const { logger: testLogger, transport } = createTestLogger();
			const input = dir.file('missing.txt');

			const ok = await transformTextFile(input, dir.file('out.txt'), (c) => c, {
				logger: testLogger,
			});

			expect(ok).toBe(false);
			expect(transport.filter('error')[0]?.message).toBe(
				`Failed to transform ${input}`,
			);
		});
	});

	describe('readTextSmart', () => {
		it('returns small files as text', async () => {
			const path = dir.file('short.txt');
			await writeFile(path, '0123456789');

			expect(await readTextSmart(path, { logger })).toEqual({
				kind: 'text',
				text: '0123456789',
				size: 10,
			});
		});

		it('opens files above the threshold lazily', async () => {
			const path = dir.file('long.txt');
			await writeFile(path, '0123456789');

			const result = await readTextSmart(path, {
				lazyThresholdBytes: 4,
				chunkSize: 4,
				logger,
			});

			expect(result.kind).toBe('lazy');
			if (result.kind === 'lazy') {
				expect(result.loader.chunkCount).toBe(3);
				expect(await result.loader.readChunkText(1)).toBe('4567');
			}
		});

		it('reports a missing file as NOT_FOUND', async () => {
			const error = await rejectionOf(readTextSmart(dir.file('missing.txt')));

			expect(isNotFoundError(error)).toBe(true);
		});
	});
});
