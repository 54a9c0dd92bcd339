/**
 * Exponential backoff for reconnect loops
 */

export interface BackoffConfig {
	baseDelayMs: number;
	maxDelayMs: number;
	multiplier: number;
}

export const DEFAULT_BACKOFF: BackoffConfig = {
	baseDelayMs: 5000,
	maxDelayMs: 60000,
	multiplier: 2,
};

/**
 * Tracks consecutive failures of one attempt sequence.
 *
 * Delay before retry k (1-based) is min(base * multiplier^(k-1), max).
 * `reset()` on success brings the next delay back to base.
 */
export class ExponentialBackoff {
	private consecutiveFailures: number = 0;

	constructor(private readonly config: BackoffConfig = DEFAULT_BACKOFF) {}

	/**
	 * Record a failure and return the delay to wait before the next attempt
	 */
	recordFailure(): number {
		this.consecutiveFailures++;
		return this.calculateBackoff(this.consecutiveFailures);
	}

	/**
	 * Delay the next failure would produce, without recording it
	 */
	peekNextDelay(): number {
		return this.calculateBackoff(this.consecutiveFailures + 1);
	}

	getConsecutiveFailures(): number {
		return this.consecutiveFailures;
	}

	reset(): void {
		this.consecutiveFailures = 0;
	}

	/**
	 * Resume an earlier failure sequence, e.g. after a success that did not last
	 */
	restore(consecutiveFailures: number): void {
		this.consecutiveFailures = Math.max(0, consecutiveFailures);
	}

	private calculateBackoff(attempt: number): number {
		const delay = this.config.baseDelayMs * Math.pow(this.config.multiplier, attempt - 1);
		return Math.min(delay, this.config.maxDelayMs);
	}
}
