import { mkdir, rm, writeFile } from 'node:fs/promises';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
	isChunkOutOfRangeError,
	isIOFailureError,
	isNotFoundError,
	isStaleError,
} from '../src/errors/index.js';
import { openLazyTextLoader } from '../src/loader/lazy-text-loader.js';
import { createNoopLogger } from '../src/logger.js';
import { collect, createTempDir, rejectionOf, type TempDir } from './utils/mocks.js';

const logger = createNoopLogger();

// Ten 7-byte lines; a 21-byte chunk covers exactly three of them.
const TEN_LINES = Array.from({ length: 10 }, (_, i) => `line ${i}`);
const TEN_LINE_TEXT = `${TEN_LINES.join('\n')}\n`;

describe('openLazyTextLoader', () => {
	let dir: TempDir;
	let path: string;

	beforeEach(async () => {
		dir = await createTempDir();
		path = dir.file('manuscript.txt');
		await writeFile(path, TEN_LINE_TEXT);
	});

	afterEach(async () => {
		await dir.cleanup();
	});

	const open = (chunkSize = 21, maxCachedChunks?: number) =>
		openLazyTextLoader(path, { chunkSize, maxCachedChunks, logger, retryDelayMs: 0 });

	it('captures the file size and chunk layout on open', async () => {
		const loader = await open();

		expect(loader.size).toBe(70);
		expect(loader.chunkSize).toBe(21);
		expect(loader.chunkCount).toBe(4);
		expect(loader.path).toBe(path);
	});

	it('computes chunk handles without I/O', async () => {
		const loader = await open();

		expect(loader.chunkHandle(0)).toEqual({ index: 0, offset: 0, length: 21 });
		expect(loader.chunkHandle(3)).toEqual({ index: 3, offset: 63, length: 7 });
	});

	it('iterates every line in order', async () => {
		const loader = await open();

		expect(await collect(loader.iterate())).toEqual(TEN_LINES);
	});

	it('can iterate more than once', async () => {
		const loader = await open();
		const lines = loader.iterate();

		expect(await collect(lines)).toEqual(TEN_LINES);
		expect(await collect(lines)).toEqual(TEN_LINES);
	});

	it('is itself async iterable', async () => {
		const loader = await open();

		expect(await collect(loader)).toEqual(TEN_LINES);
	});

	it('reads a single chunk without touching its neighbours', async () => {
		const loader = await open();

		expect(await loader.readChunkText(0)).toBe('line 0\nline 1\nline 2\n');
		expect(loader.cachedChunks).toBe(1);
	});

	it('reads the last, partial chunk directly', async () => {
		const loader = await open();

		expect(await loader.readChunkText(3)).toBe('line 9\n');
		expect(loader.cachedChunks).toBe(1);
	});

	it('serves repeated reads from the chunk cache', async () => {
		const loader = await open();
		const first = await loader.readChunk(1);

		expect(await loader.readChunk(1)).toBe(first);
	});

	it('shares one read between concurrent requests for a chunk', async () => {
		const loader = await open();
		const [a, b] = await Promise.all([loader.readChunk(2), loader.readChunk(2)]);

		expect(a).toBe(b);
		expect(a.toString('utf8')).toBe('line 6\nline 7\nline 8\n');
	});

	it('keeps at most maxCachedChunks chunks in memory', async () => {
		const loader = await open(21, 2);
		await loader.readChunk(0);
		await loader.readChunk(1);
		await loader.readChunk(2);

		expect(loader.cachedChunks).toBe(2);
	});

	it('rejects chunk indexes outside the file', async () => {
		const loader = await open();

		for (const index of [4, -1, 1.5]) {
			const error = await rejectionOf(loader.readChunk(index));
			expect(isChunkOutOfRangeError(error)).toBe(true);
		}
		expect(() => loader.chunkHandle(4)).toThrow('Chunk 4 is out of range');
	});

	it('drops cached chunks on close', async () => {
		const loader = await open();
		await loader.readChunk(0);
		loader.close();

		expect(loader.cachedChunks).toBe(0);
	});

	it('strips CRLF line endings', async () => {
		await writeFile(path, 'alpha\r\nbeta\r\ngamma');
		const loader = await open();

		expect(await collect(loader.iterate())).toEqual(['alpha', 'beta', 'gamma']);
	});

	it('handles an empty file', async () => {
		await writeFile(path, '');
		const loader = await open();

		expect(loader.chunkCount).toBe(0);
		expect(await collect(loader.iterate())).toEqual([]);
	});

	describe('search', () => {
		beforeEach(async () => {
			await writeFile(path, 'The Raven\nquoth the raven\nNevermore\n');
		});

		it('matches case-insensitively by default', async () => {
			const loader = await open();

			expect(await loader.search('RAVEN')).toEqual([
				{ lineNumber: 1, line: 'The Raven' },
				{ lineNumber: 2, line: 'quoth the raven' },
			]);
		});

		it('honours caseSensitive', async () => {
			const loader = await open();

			expect(await loader.search('Raven', { caseSensitive: true })).toEqual([
				{ lineNumber: 1, line: 'The Raven' },
			]);
		});

		it('accepts regular expressions', async () => {
			const loader = await open();

			expect(await loader.search(/^never/i)).toEqual([
				{ lineNumber: 3, line: 'Nevermore' },
			]);
		});
	});

	describe('failures', () => {
		it('reports a missing file as NOT_FOUND', async () => {
			const error = await rejectionOf(
				openLazyTextLoader(dir.file('missing.txt'), { logger }),
			);

			expect(isNotFoundError(error)).toBe(true);
		});

		it('reports a directory as IO_FAILURE', async () => {
			const sub = dir.file('drafts');
			await mkdir(sub);
			const error = await rejectionOf(openLazyTextLoader(sub, { logger }));

			expect(isIOFailureError(error)).toBe(true);
		});

		it('fails chunk reads with STALE once the file changes', async () => {
			const loader = await open();
			await writeFile(path, `${TEN_LINE_TEXT}line 10\n`);

			expect(isStaleError(await rejectionOf(loader.readChunk(0)))).toBe(true);
		});

		it('refuses to serve a cached chunk once the file changes', async () => {
			const loader = await open();
			expect((await loader.readChunk(0)).toString('utf8')).toBe('line 0\nline 1\nline 2\n');
			expect(loader.cachedChunks).toBe(1);
			await writeFile(path, `${TEN_LINE_TEXT}line 10\n`);

			expect(isStaleError(await rejectionOf(loader.readChunk(0)))).toBe(true);
			expect(loader.cachedChunks).toBe(0);
		});

		it('fails iteration with STALE once the file changes', async () => {
			const loader = await open();
			await writeFile(path, 'rewritten\n');
			const iterator = loader.iterate()[Symbol.asyncIterator]();

			expect(isStaleError(await rejectionOf(iterator.next()))).toBe(true);
		});

		it('reports a file deleted after open as NOT_FOUND', async () => {
			const loader = await open();
			await rm(path);

			expect(isNotFoundError(await rejectionOf(loader.readChunk(0)))).toBe(true);
		});
	});
});
