import { describe, expect, it, vi } from 'vitest';
import { isRetryExhaustedError, retry } from '../src/utils/retry.js';
import { rejectionOf } from './utils/mocks.js';

describe('retry', () => {
	it('returns the first successful result', async () => {
		const fn = vi.fn(async (attempt: number) => `attempt ${attempt}`);

		expect(await retry(fn)).toBe('attempt 1');
		expect(fn).toHaveBeenCalledTimes(1);
	});

	it('retries once by default', async () => {
		let calls = 0;
		const result = await retry(async () => {
			calls++;
			if (calls < 2) throw new Error('EAGAIN');
			return 'read';
		});

		expect(result).toBe('read');
		expect(calls).toBe(2);
	});

	it('throws RETRY_EXHAUSTED with the last error as cause', async () => {
		const last = new Error('third');
		let calls = 0;

		const error = await rejectionOf(
			retry(
				async () => {
					calls++;
					throw calls === 3 ? last : new Error('earlier');
				},
				{ maxAttempts: 3, delayMs: 1 },
			),
		);

		expect(isRetryExhaustedError(error)).toBe(true);
		if (isRetryExhaustedError(error)) {
			expect(error.attempts).toBe(3);
			expect(error.cause).toBe(last);
			expect(error.message).toBe('All 3 retry attempts exhausted');
		}
	});

	it('rethrows unchanged when shouldRetry declines', async () => {
		const fatal = new Error('file changed');
		const fn = vi.fn(async () => {
			throw fatal;
		});

		const error = await rejectionOf(
			retry(fn, { maxAttempts: 5, shouldRetry: () => false }),
		);

		expect(error).toBe(fatal);
		expect(fn).toHaveBeenCalledTimes(1);
	});

	it('reports each upcoming attempt to onRetry', async () => {
		const onRetry = vi.fn();
		const failure = new Error('EIO');

		await rejectionOf(
			retry(
				async () => {
					throw failure;
				},
				{ maxAttempts: 3, onRetry },
			),
		);

		expect(onRetry.mock.calls).toEqual([
			[failure, 2],
			[failure, 3],
		]);
	});

	it('waits delayMs between attempts', async () => {
		vi.useFakeTimers();
		try {
			let calls = 0;
			const pending = retry(
				async () => {
					calls++;
					if (calls === 1) throw new Error('EAGAIN');
					return 'done';
				},
				{ delayMs: 50 },
			);

			await vi.advanceTimersByTimeAsync(49);
			expect(calls).toBe(1);
			await vi.advanceTimersByTimeAsync(1);
			expect(await pending).toBe('done');
			expect(calls).toBe(2);
		} finally {
			vi.useRealTimers();
		}
	});

	it('treats maxAttempts below one as a single attempt', async () => {
		const fn = vi.fn(async () => {
			throw new Error('EIO');
		});

		const error = await rejectionOf(retry(fn, { maxAttempts: 0 }));

		expect(isRetryExhaustedError(error)).toBe(true);
		expect(fn).toHaveBeenCalledTimes(1);
	});
});
