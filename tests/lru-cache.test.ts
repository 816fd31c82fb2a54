import { describe, expect, it } from 'vitest';
import { createBoundedLRUCache } from '../src/cache/lru-cache.js';
import { createNoopLogger } from '../src/logger.js';
import { createTestLogger } from './utils/mocks.js';

const logger = createNoopLogger();

const cacheOf = (maxBytes: number, maxEntries?: number) =>
	createBoundedLRUCache<string>({ maxBytes, maxEntries, logger });

describe('createBoundedLRUCache', () => {
	it('returns a frozen object', () => {
		expect(Object.isFrozen(cacheOf(100))).toBe(true);
	});

	it('evicts the least recently used entry when the byte budget is exceeded', () => {
		const cache = cacheOf(100);
		cache.set('a', 'A', 40);
		cache.set('b', 'B', 40);
		const result = cache.set('c', 'C', 40);

		expect(result).toEqual({ status: 'stored', sizeBytes: 40, evicted: ['a'] });
		expect(cache.contains('a')).toBe(false);
		expect(cache.get('b')).toBe('B');
		expect(cache.get('c')).toBe('C');
		expect(cache.currentSizeBytes()).toBe(80);
	});

	it('promotes entries on get', () => {
		const cache = cacheOf(100);
		cache.set('a', 'A', 40);
		cache.set('b', 'B', 40);
		cache.get('a');
		const result = cache.set('c', 'C', 40);

		expect(result.status === 'stored' && result.evicted).toEqual(['b']);
		expect(cache.get('a')).toBe('A');
	});

	it('does not promote entries on contains', () => {
		const cache = cacheOf(100);
		cache.set('a', 'A', 40);
		cache.set('b', 'B', 40);
		expect(cache.contains('a')).toBe(true);
		cache.set('c', 'C', 40);

		expect(cache.contains('a')).toBe(false);
	});

	it('rejects values larger than the whole budget', () => {
		const cache = cacheOf(10);
		const result = cache.set('big', 'x', 11);

		expect(result).toEqual({ status: 'too_large', sizeBytes: 11, maxBytes: 10 });
		expect(cache.get('big')).toBeUndefined();
		expect(cache.size).toBe(0);
	});

	it('drops the previous value when a replacement is too large', () => {
		const cache = cacheOf(10);
		cache.set('k', 'small', 5);
		cache.set('k', 'huge', 20);

		expect(cache.get('k')).toBeUndefined();
		expect(cache.currentSizeBytes()).toBe(0);
	});

	it('keeps other entries when a value is rejected', () => {
		const cache = cacheOf(10);
		cache.set('a', 'A', 6);
		cache.set('b', 'B', 11);

		expect(cache.keys()).toEqual(['a']);
		expect(cache.currentSizeBytes()).toBe(6);
	});

	it('evicts by entry count when maxEntries is set', () => {
		const cache = cacheOf(1_000, 2);
		cache.set('a', 'A', 1);
		cache.set('b', 'B', 1);
		const result = cache.set('c', 'C', 1);

		expect(result.status === 'stored' && result.evicted).toEqual(['a']);
		expect(cache.size).toBe(2);
	});

	it('replaces an existing key in place', () => {
		const cache = cacheOf(100);
		cache.set('a', 'old', 10);
		cache.set('a', 'new', 30);

		expect(cache.get('a')).toBe('new');
		expect(cache.size).toBe(1);
		expect(cache.currentSizeBytes()).toBe(30);
	});

	describe('update', () => {
		it('behaves exactly like set', () => {
			const viaSet = cacheOf(100);
			const viaUpdate = cacheOf(100);
			const steps: Array<[string, string, number]> = [
				['a', 'A', 40],
				['b', 'B', 40],
				['a', 'A2', 20],
				['c', 'C', 50],
				['d', 'D', 200],
			];

			for (const [key, value, size] of steps) {
				expect(viaUpdate.update(key, value, size)).toEqual(
					viaSet.set(key, value, size),
				);
			}

			expect(viaUpdate.keys()).toEqual(viaSet.keys());
			expect(viaUpdate.currentSizeBytes()).toBe(viaSet.currentSizeBytes());
		});
	});

	describe('sizing', () => {
		it('measures strings in UTF-8 bytes', () => {
			const cache = createBoundedLRUCache<string>({ maxBytes: 100, logger });
			expect(cache.set('s', 'héllo')).toMatchObject({ sizeBytes: 6 });
		});

		it('measures binary data by byteLength', () => {
			const cache = createBoundedLRUCache<Buffer>({ maxBytes: 100, logger });
			expect(cache.set('b', Buffer.alloc(7))).toMatchObject({ sizeBytes: 7 });
		});

		it('measures other values by their JSON form', () => {
			const cache = createBoundedLRUCache<{ a: number }>({ maxBytes: 100, logger });
			expect(cache.set('o', { a: 1 })).toMatchObject({ sizeBytes: 7 });
		});

		it('ignores negative and non-finite size hints', () => {
			const cache = cacheOf(100);
			expect(cache.set('a', 'abc', -1)).toMatchObject({ sizeBytes: 3 });
			expect(cache.set('b', 'abc', Number.NaN)).toMatchObject({ sizeBytes: 3 });
			expect(cache.set('c', 'abc', 0)).toMatchObject({ sizeBytes: 0 });
		});

		it('uses a custom sizeOf', () => {
			const cache = createBoundedLRUCache<string>({
				maxBytes: 100,
				sizeOf: () => 25,
				logger,
			});
			expect(cache.set('a', 'anything')).toMatchObject({ sizeBytes: 25 });
		});

		it('falls back to the estimate when sizeOf returns an unusable number', () => {
			const cache = createBoundedLRUCache<string>({
				maxBytes: 100,
				sizeOf: (value) => (value === 'abc' ? Number.NaN : -5),
				logger,
			});

			expect(cache.set('a', 'abc')).toEqual({ status: 'stored', sizeBytes: 3, evicted: [] });
			expect(cache.set('b', 'de')).toEqual({ status: 'stored', sizeBytes: 2, evicted: [] });
			expect(cache.currentSizeBytes()).toBe(5);
		});
	});

	it('never tracks more bytes than maxBytes', () => {
		const cache = cacheOf(100);
		for (let i = 0; i < 200; i++) {
			cache.set(`k${i % 17}`, 'v', ((i * 37) % 60) + 1);
			expect(cache.currentSizeBytes()).toBeLessThanOrEqual(100);
		}
	});

	it('deletes entries', () => {
		const cache = cacheOf(100);
		cache.set('a', 'A', 10);

		expect(cache.delete('a')).toBe(true);
		expect(cache.delete('a')).toBe(false);
		expect(cache.currentSizeBytes()).toBe(0);
	});

	it('clears all entries', () => {
		const cache = cacheOf(100);
		cache.set('a', 'A', 10);
		cache.set('b', 'B', 10);
		cache.clear();

		expect(cache.size).toBe(0);
		expect(cache.currentSizeBytes()).toBe(0);
	});

	it('lists keys from least to most recently used', () => {
		const cache = cacheOf(100);
		cache.set('a', 'A', 1);
		cache.set('b', 'B', 1);
		cache.set('c', 'C', 1);
		cache.get('a');

		expect(cache.keys()).toEqual(['b', 'c', 'a']);
	});

	describe('eviction helpers', () => {
		const filled = (count: number) => {
			const cache = cacheOf(1_000);
			for (let i = 0; i < count; i++) cache.set(`k${i}`, 'v', 10);
			return cache;
		};

		it('evictOldest removes the oldest entries', () => {
			const cache = filled(3);
			expect(cache.evictOldest(2)).toEqual(['k0', 'k1']);
			expect(cache.keys()).toEqual(['k2']);
			expect(cache.evictOldest(0)).toEqual([]);
		});

		it('evictFraction removes a share of entries, at least one', () => {
			const eight = filled(8);
			expect(eight.evictFraction(0.25)).toEqual(['k0', 'k1']);

			const two = filled(2);
			expect(two.evictFraction(0.25)).toEqual(['k0']);
			expect(two.evictFraction(0)).toEqual([]);
		});

		it('trimTo evicts until the size fits the target', () => {
			const cache = filled(0);
			cache.set('a', 'A', 30);
			cache.set('b', 'B', 30);
			cache.set('c', 'C', 30);

			expect(cache.trimTo(50)).toEqual(['a', 'b']);
			expect(cache.currentSizeBytes()).toBe(30);
		});
	});

	it('reports statistics', () => {
		const cache = cacheOf(100);
		cache.set('a', 'A', 40);
		cache.set('b', 'B', 40);
		cache.set('c', 'C', 40);
		cache.set('d', 'D', 400);
		cache.get('b');
		cache.get('a');

		expect(cache.getStats()).toEqual({
			hits: 1,
			misses: 1,
			evictions: 1,
			rejections: 1,
			entries: 2,
			bytes: 80,
			maxBytes: 100,
		});
	});

	it('logs rejected values at debug level', () => {
		const { logger: testLogger, transport } = createTestLogger();
		const cache = createBoundedLRUCache<string>({
			maxBytes: 10,
			name: 'chapters',
			logger: testLogger,
		});
		cache.set('big', 'x', 11);

		expect(transport.filter('debug')).toHaveLength(1);
		expect(transport.entries[0]).toMatchObject({
			context: 'test:chapters',
			message: 'Rejected oversized value',
			metadata: { key: 'big', sizeBytes: 11, maxBytes: 10 },
		});
	});

	it('rejects invalid limits', () => {
		expect(() => cacheOf(0)).toThrow(RangeError);
		expect(() => cacheOf(100, 0)).toThrow(RangeError);
	});
});
