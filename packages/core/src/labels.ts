/**
 * Label builder: selects the periods to tick and the text to show at
 * each, for a sequence of calendar periods and a tick budget.
 */
import { type Granularity, selectGranularity } from "./granularity";
import {
	dayLabeller,
	monthLabeller,
	quarterLabeller,
	yearLabeller,
} from "./labellers";
import { dayLocator, monthLocator, quarterLocator, yearLocator } from "./locators";
import { completeRange, type Period, type PeriodSequence } from "./period";

const periodKey = (period: Period): string => `${period.freq}:${period.ordinal}`;

/**
 * Labelled periods in calendar order. Lookups go by period value, so a
 * freshly parsed period finds the label of an equal one.
 */
class LabelMap {
	private readonly items: [Period, string][] = [];
	private readonly index = new Map<string, number>();

	constructor(entries: Iterable<readonly [Period, string]> = []) {
		for (const [period, label] of entries) {
			const key = periodKey(period);
			const at = this.index.get(key);
			if (at === undefined) {
				this.index.set(key, this.items.length);
				this.items.push([period, label]);
			} else {
				this.items[at] = [period, label];
			}
		}
	}

	get size(): number {
		return this.items.length;
	}

	get(period: Period): string | undefined {
		const at = this.index.get(periodKey(period));
		return at === undefined ? undefined : this.items[at][1];
	}

	has(period: Period): boolean {
		return this.index.has(periodKey(period));
	}

	entries() {
		return this.items[Symbol.iterator]();
	}

	keys() {
		return this.items.map(([period]) => period).values();
	}

	values() {
		return this.items.map(([, label]) => label).values();
	}

	[Symbol.iterator]() {
		return this.entries();
	}
}

type Labelled = {
	granularity: Granularity | "BAD";
	interval: number;
	labels: LabelMap;
};

const locateAndLabel = (
	granularity: Granularity,
	complete: readonly Period[],
	interval: number,
	count: number,
): { periods: Period[]; text: string[] } => {
	switch (granularity) {
		case "DAY": {
			const periods = dayLocator(complete, interval, count);
			return { periods, text: dayLabeller(periods) };
		}
		case "MONTH": {
			const periods = monthLocator(complete, interval);
			return { periods, text: monthLabeller(periods) };
		}
		case "QUARTER": {
			const periods = quarterLocator(complete, interval);
			return { periods, text: quarterLabeller(periods) };
		}
		case "YEAR": {
			const periods = yearLocator(complete, interval);
			return { periods, text: yearLabeller(periods) };
		}
	}
};

/**
 * Like buildLabels, but also reports the granularity and interval the
 * labels were chosen at.
 */
const buildLabelled = (periods: PeriodSequence, maxTicks: number): Labelled => {
	const selection = selectGranularity(periods, maxTicks);
	if (selection.granularity === "BAD") {
		return { granularity: "BAD", interval: 0, labels: new LabelMap() };
	}

	// Step through the gap-free range so intervals follow calendar spacing,
	// not the positions of whatever periods the input happens to have.
	const complete = completeRange(periods);
	const located = locateAndLabel(
		selection.granularity,
		complete,
		selection.interval,
		selection.count,
	);

	return {
		granularity: selection.granularity,
		interval: selection.interval,
		labels: new LabelMap(
			located.periods.map((period, i) => [period, located.text[i]] as const),
		),
	};
};

/**
 * Labels for a date-like period sequence. Keys are drawn from the
 * complete range between the sequence's first and last period, in
 * calendar order. Empty when no labels can be produced.
 */
const buildLabels = (periods: PeriodSequence, maxTicks: number): LabelMap =>
	buildLabelled(periods, maxTicks).labels;

export { buildLabels, buildLabelled, LabelMap };
export type { Labelled };
