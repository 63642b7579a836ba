/**
 * Growth rates of a single series, in per cent: on the same period a
 * year earlier (annual) and on the period before (periodic). Both are
 * taken over the complete range, so a missing period leaves a gap
 * rather than shortening the lag.
 */
import { completeRange, type Frequency, type Period } from "@periodplot/core";
import { err, ok, type Result } from "neverthrow";
import { ChartError } from "../utils/errors";
import type { Column, PeriodFrame } from "./frame";

type Growth = {
	index: readonly Period[];
	annual: Column;
	periodic: Column;
};

type GrowthFrequency = Exclude<Frequency, "Y">;

const GROWTH_FREQUENCIES: Readonly<
	Record<GrowthFrequency, { perYear: number; name: string }>
> = {
	D: { perYear: 365, name: "Daily Growth" },
	M: { perYear: 12, name: "Monthly Growth" },
	Q: { perYear: 4, name: "Quarterly Growth" },
};

const ANNUAL_GROWTH = "Annual Growth";

const isGrowthFrequency = (freq: Frequency): freq is GrowthFrequency =>
	freq !== "Y";

const validationError = (message: string) =>
	err(new ChartError({ message, code: "VALIDATION_ERROR" }));

/** Per cent change on the value `lag` places back; null where either is missing or the base is zero. */
const percentChange = (
	values: readonly (number | null)[],
	lag: number,
): (number | null)[] =>
	values.map((value, i) => {
		const base = i >= lag ? values[i - lag] : null;
		if (value === null || base === null || base === 0) return null;
		const change = (value / base - 1) * 100;
		return Number.isFinite(change) ? change : null;
	});

/**
 * Annual and periodic growth of one column of a frame, the first by
 * default. Needs quarterly, monthly or daily periods; daily growth
 * takes a year as 365 days.
 */
const calcGrowth = ({
	frame,
	column,
}: {
	frame: PeriodFrame;
	column?: string;
}): Result<Growth, ChartError> => {
	const source =
		column === undefined
			? frame.columns[0]
			: frame.columns.find((c) => c.name === column);
	if (!source) {
		return validationError(`No column "${column ?? ""}" in the frame`);
	}
	if (frame.index.length === 0) {
		return err(
			new ChartError({
				message: "Cannot calculate growth of an empty series",
				code: "DATA_ERROR",
			}),
		);
	}

	const freq = frame.index[0].freq;
	if (!isGrowthFrequency(freq)) {
		return validationError(
			`Growth needs quarterly, monthly or daily periods, not ${freq}`,
		);
	}
	const { perYear, name } = GROWTH_FREQUENCIES[freq];

	const byOrdinal = new Map(
		frame.index.map(
			(period, row) => [period.ordinal, source.values[row]] as const,
		),
	);
	const index = completeRange(frame.index);
	const values = index.map((period) => byOrdinal.get(period.ordinal) ?? null);

	return ok({
		index,
		annual: { name: ANNUAL_GROWTH, values: percentChange(values, perYear) },
		periodic: { name, values: percentChange(values, 1) },
	});
};

/**
 * Growth from a starting point on: a period (converted to the growth's
 * frequency from its first day) or a position, negative positions
 * counting back from the end.
 */
const growthFrom = ({
	growth,
	plotFrom,
}: {
	growth: Growth;
	plotFrom?: Period | number;
}): Result<Growth, ChartError> => {
	if (plotFrom === undefined) return ok(growth);
	const { index } = growth;

	let start: number;
	if (typeof plotFrom === "number") {
		start = plotFrom < 0 ? index.length + plotFrom : plotFrom;
		if (!Number.isInteger(start) || start < 0 || start >= index.length) {
			return validationError(
				`Cannot start at position ${plotFrom} of ${index.length} periods`,
			);
		}
	} else {
		const first = index[0];
		const target = first ? plotFrom.asFreq(first.freq, "start") : plotFrom;
		start = index.findIndex((period) => period.compare(target) >= 0);
		if (start < 0) {
			return validationError(
				`Cannot start at ${plotFrom.toString()}: the series ends before it`,
			);
		}
	}

	return ok({
		index: index.slice(start),
		annual: { ...growth.annual, values: growth.annual.values.slice(start) },
		periodic: { ...growth.periodic, values: growth.periodic.values.slice(start) },
	});
};

export { ANNUAL_GROWTH, calcGrowth, GROWTH_FREQUENCIES, growthFrom };
export type { Growth, GrowthFrequency };
