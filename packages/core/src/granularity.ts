/**
 * Granularity selection: which calendar unit to label at, and how many
 * units apart the labels sit, so that the label count stays within a
 * tick budget.
 */
import {
	type Frequency,
	frequencyOf,
	maxPeriod,
	minPeriod,
	type PeriodSequence,
} from "./period";
import { createLogger } from "./utils/logger";

const log = createLogger("ticks");

type Granularity = "DAY" | "MONTH" | "QUARTER" | "YEAR";

type GranularitySelection =
	| { count: number; granularity: Granularity; interval: number }
	| { count: 0; granularity: "BAD"; interval: 0 };

const BAD_SELECTION = {
	count: 0,
	granularity: "BAD",
	interval: 0,
} as const satisfies GranularitySelection;

/** Smallest tick budget honoured, whatever the caller asks for. */
const MIN_TICKS = 4;

/** Granularities each source frequency may be labelled at, finest first. */
const GENERALISATIONS: Readonly<Record<Frequency, readonly Granularity[]>> = {
	D: ["DAY", "MONTH", "YEAR"],
	M: ["MONTH", "YEAR"],
	Q: ["QUARTER", "YEAR"],
	Y: ["YEAR"],
};

const GRANULARITY_FREQUENCY: Readonly<Record<Granularity, Frequency>> = {
	DAY: "D",
	MONTH: "M",
	QUARTER: "Q",
	YEAR: "Y",
};

/** Step sizes tried per granularity, ascending. */
const INTERVALS: Readonly<Record<Granularity, readonly number[]>> = {
	YEAR: [1, 2, 4, 5, 10, 20, 40, 50, 100, 200, 400, 500, 1000],
	QUARTER: [1, 2],
	MONTH: [1, 2, 3, 4, 6],
	DAY: [1, 2, 4, 7, 14],
};

const tickBudget = (maxTicks: number): number =>
	Number.isNaN(maxTicks) ? MIN_TICKS : Math.max(Math.floor(maxTicks), MIN_TICKS);

/**
 * Pick the finest granularity, and within it the smallest interval,
 * whose tick count fits the budget. Spans are measured between the
 * containing buckets of the first and last period, so a partial
 * trailing bucket still counts as one.
 *
 * Returns BAD_SELECTION for an empty sequence or one without a single
 * recognised frequency. When nothing fits, falls back to the coarsest
 * granularity at its largest interval.
 */
const selectGranularity = (
	periods: PeriodSequence,
	maxTicks: number,
): GranularitySelection => {
	const freq = frequencyOf(periods);
	const first = minPeriod(periods);
	const last = maxPeriod(periods);
	if (!first || !last) return BAD_SELECTION;
	if (!freq) {
		log.warn("Unrecognised date-like period frequency (mixed frequencies)");
		return BAD_SELECTION;
	}

	const budget = tickBudget(maxTicks);
	let fallback: GranularitySelection = BAD_SELECTION;

	for (const granularity of GENERALISATIONS[freq]) {
		const target = GRANULARITY_FREQUENCY[granularity];
		const span =
			last.asFreq(target, "end").ordinal -
			first.asFreq(target, "end").ordinal +
			1;
		for (const interval of INTERVALS[granularity]) {
			const count = Math.floor(span / interval);
			if (count <= budget) {
				log.debug(
					"selected %s every %d (%d ticks, budget %d)",
					granularity,
					interval,
					count,
					budget,
				);
				return { count, granularity, interval };
			}
			fallback = { count, granularity, interval };
		}
	}

	log.debug(
		"no granularity fits budget %d, using %s every %d",
		budget,
		fallback.granularity,
		fallback.interval,
	);
	return fallback;
};

export {
	BAD_SELECTION,
	GENERALISATIONS,
	GRANULARITY_FREQUENCY,
	INTERVALS,
	MIN_TICKS,
	selectGranularity,
	tickBudget,
};
export type { Granularity, GranularitySelection };
