import { DEFAULT_BACKOFF, ExponentialBackoff } from '../../../src/utils/retry-policy';

describe('ExponentialBackoff', () => {
	it('should double from 5s up to a 60s ceiling', () => {
		const backoff = new ExponentialBackoff();

		const delays = Array.from({ length: 7 }, () => backoff.recordFailure());

		expect(delays).toEqual([5000, 10000, 20000, 40000, 60000, 60000, 60000]);
		expect(backoff.getConsecutiveFailures()).toBe(7);
	});

	it('should return to the base delay after reset', () => {
		const backoff = new ExponentialBackoff(DEFAULT_BACKOFF);
		backoff.recordFailure();
		backoff.recordFailure();

		backoff.reset();

		expect(backoff.getConsecutiveFailures()).toBe(0);
		expect(backoff.recordFailure()).toBe(5000);
	});

	it('should continue a restored failure sequence', () => {
		const backoff = new ExponentialBackoff();
		backoff.recordFailure();
		backoff.recordFailure();
		const failures = backoff.getConsecutiveFailures();

		backoff.reset();
		backoff.restore(failures);

		expect(backoff.recordFailure()).toBe(20000);
	});

	it('should peek without recording', () => {
		const backoff = new ExponentialBackoff({ baseDelayMs: 50, maxDelayMs: 600, multiplier: 2 });
		backoff.recordFailure();

		expect(backoff.peekNextDelay()).toBe(100);
		expect(backoff.peekNextDelay()).toBe(100);
		expect(backoff.getConsecutiveFailures()).toBe(1);
	});
});
