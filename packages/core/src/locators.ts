/**
 * Locators choose which periods of a complete (gap-free) range get a
 * tick, for each labelling granularity.
 */
import type { Period } from "./period";

/**
 * Index of the first period whose calendar position is a multiple of
 * the interval, so ticks land on round boundaries. Defaults to 0.
 */
const alignedStart = (
	periods: readonly Period[],
	interval: number,
	position: (period: Period) => number,
): number => {
	if (interval <= 1) return 0;
	const index = periods.findIndex((p) => position(p) % interval === 0);
	return index < 0 ? 0 : index;
};

const everyNth = (
	periods: readonly Period[],
	start: number,
	interval: number,
): Period[] => periods.filter((_, i) => i >= start && (i - start) % interval === 0);

const isFirstOfYear = (period: Period): boolean => {
	switch (period.freq) {
		case "D":
			return period.month === 1 && period.day === 1;
		case "M":
			return period.month === 1;
		case "Q":
			return period.quarter === 1;
		case "Y":
			return true;
	}
};

const yearLocator = (complete: readonly Period[], interval: number): Period[] => {
	const subset = complete.filter(isFirstOfYear);
	const start = alignedStart(subset, interval, (p) => p.year);
	return everyNth(subset, start, interval);
};

const quarterLocator = (
	complete: readonly Period[],
	interval: number,
): Period[] => {
	const start = alignedStart(complete, interval, (p) => p.quarter - 1);
	return everyNth(complete, start, interval);
};

const monthLocator = (
	complete: readonly Period[],
	interval: number,
): Period[] => {
	const subset = complete.filter((p) => p.freq !== "D" || p.day === 1);
	const start = alignedStart(subset, interval, (p) => p.month - 1);
	return everyNth(subset, start, interval);
};

/**
 * Daily ticks are offset by half an interval so the first one is not
 * pinned to the first day, except for odd counts at an interval of 2.
 */
const dayLocator = (
	complete: readonly Period[],
	interval: number,
	count: number,
): Period[] => {
	const start = interval === 2 && count % 2 ? 0 : Math.floor(interval / 2);
	return everyNth(complete, start, interval);
};

export { dayLocator, monthLocator, quarterLocator, yearLocator };
