import { buildLabelled } from "./labels";
import { minPeriod, type PeriodSequence } from "./period";

type TicksAndLabels = {
	/** Offsets from the first period of the sequence, ascending. */
	ticks: number[];
	labels: string[];
};

/**
 * Integer tick positions and their labels for a period axis, where
 * position 0 is the sequence's earliest period.
 */
const computeTicksAndLabels = (
	periods: PeriodSequence,
	maxTicks = 10,
): TicksAndLabels => {
	const base = minPeriod(periods);
	const { labels } = buildLabelled(periods, maxTicks);
	if (!base || labels.size === 0) return { ticks: [], labels: [] };

	const entries = [...labels.entries()].sort(([a], [b]) => a.compare(b));
	return {
		ticks: entries.map(([period]) => period.ordinal - base.ordinal),
		labels: entries.map(([, label]) => label),
	};
};

export { computeTicksAndLabels };
export type { TicksAndLabels };
