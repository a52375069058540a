import { WindowBeforeRetentionHorizonError } from "./errors";
import { Interval } from "./types";

const MS_PER_HOUR = 60 * 60 * 1000;

/** Spans above four weeks must use hourly buckets. */
export const FOUR_WEEKS_HOURS = 4 * 7 * 24;

/** The reporting API keeps 90 days of data. */
export const RETENTION_MS = 90 * 24 * MS_PER_HOUR;

/**
 * Aligned query window.
 */
export type AlignedWindow = Readonly<{
	from: Date;
	to: Date;
}>;

/**
 * Bucket size in milliseconds for an interval.
 *
 * @param interval Reporting interval.
 * @returns Bucket size in milliseconds.
 * @throws {Error} When the interval is not one the API supports.
 */
export function intervalMs(interval: Interval): number {
	switch (interval) {
		case Interval.FINE:
			return 5 * 60 * 1000;
		case Interval.COARSE:
			return MS_PER_HOUR;
		default: {
			const _exhaustive: never = interval;
			throw new Error(`Unsupported interval: ${_exhaustive}`);
		}
	}
}

/**
 * Picks the reporting interval for a window and point budget.
 * Hourly when the span exceeds four weeks or when hourly samples alone
 * fill the budget, five-minute otherwise.
 *
 * @param from Window start.
 * @param to Window end.
 * @param maxDataPoints Number of points the panel can draw.
 * @returns Interval for the report request.
 */
export function selectInterval(
	from: Date,
	to: Date,
	maxDataPoints: number,
): Interval {
	const spanHours = Math.trunc((to.getTime() - from.getTime()) / MS_PER_HOUR);
	if (spanHours > FOUR_WEEKS_HOURS) {
		return Interval.COARSE;
	}
	if (spanHours >= maxDataPoints) {
		return Interval.COARSE;
	}
	return Interval.FINE;
}

/**
 * Rounds a time to the nearest interval boundary, halfway values up.
 *
 * @param t Time to round.
 * @param interval Reporting interval.
 * @returns Rounded time.
 */
export function roundToInterval(t: Date, interval: Interval): Date {
	const step = intervalMs(interval);
	const ms = t.getTime();
	const rem = ((ms % step) + step) % step;
	return new Date(rem + rem < step ? ms - rem : ms + step - rem);
}

/**
 * Oldest time the reporting API still has data for, rounded to the interval.
 *
 * @param interval Reporting interval.
 * @param now Evaluation time.
 * @returns Retention cutoff.
 */
export function oldestAvailable(interval: Interval, now: Date): Date {
	return roundToInterval(new Date(now.getTime() - RETENTION_MS), interval);
}

/**
 * Aligns a window onto interval boundaries and clamps its start to the
 * retention horizon. The API rejects start/end times off a boundary.
 *
 * @param from Requested start.
 * @param to Requested end.
 * @param interval Reporting interval.
 * @param now Evaluation time for the retention horizon.
 * @returns Aligned window.
 * @throws {WindowBeforeRetentionHorizonError} When the window ends before the horizon.
 */
export function alignWindow(
	from: Date,
	to: Date,
	interval: Interval,
	now: Date = new Date(),
): AlignedWindow {
	const fromRounded = roundToInterval(from, interval);
	const toRounded = roundToInterval(to, interval);
	const oldest = oldestAvailable(interval, now);

	if (toRounded.getTime() < oldest.getTime()) {
		throw new WindowBeforeRetentionHorizonError(toRounded, oldest);
	}

	return {
		from: fromRounded.getTime() < oldest.getTime() ? oldest : fromRounded,
		to: toRounded,
	};
}

/**
 * Formats a time as RFC3339 in UTC without fractional seconds.
 *
 * @param t Time to format.
 * @returns Timestamp such as "2023-11-14T22:15:00Z".
 */
export function formatApiTime(t: Date): string {
	return t.toISOString().replace(/\.\d{3}Z$/, "Z");
}
