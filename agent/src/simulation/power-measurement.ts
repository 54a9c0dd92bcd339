/**
 * POWER MEASUREMENT SIMULATION
 * ============================
 *
 * Synthetic power readings for devices without a physical meter.
 * Each reading is the rated power with up to ±5% jitter.
 */

/** Fraction of rated power a reading may deviate by */
export const POWER_JITTER = 0.05;

export interface Measurement {
	/** ISO-8601 UTC, second precision: 2024-01-01T00:00:00Z */
	timestamp: string;
	/** Watts, one decimal */
	power: number;
}

export type RandomSource = () => number;

/**
 * @param random - uniform in [0, 1)
 */
export function simulatePower(ratedPower: number, random: RandomSource = Math.random): number {
	const jitter = (random() * 2 - 1) * POWER_JITTER;
	return Math.round(ratedPower * (1 + jitter) * 10) / 10;
}

export function formatTimestamp(date: Date): string {
	return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function createMeasurement(
	ratedPower: number,
	now: Date = new Date(),
	random: RandomSource = Math.random,
): Measurement {
	return {
		timestamp: formatTimestamp(now),
		power: simulatePower(ratedPower, random),
	};
}
