/**
 * Labellers turn the located periods into axis text. Each is a fold
 * over the periods in calendar order: a label may depend on the one
 * before it (a year is only repeated when it changes). A patch after
 * the fold makes sure the final label names its year.
 */
import type { Period } from "./period";

const MONTH_ABBREVIATIONS = [
	"Jan",
	"Feb",
	"Mar",
	"Apr",
	"May",
	"Jun",
	"Jul",
	"Aug",
	"Sep",
	"Oct",
	"Nov",
	"Dec",
] as const;

/** What a label depends on from the label before it. */
type LabelState = {
	previousMonth: number | null;
	previousYear: number | null;
	sawYearOnLast: boolean;
};

const monthAbbreviation = (period: Period): string =>
	MONTH_ABBREVIATIONS[period.month - 1];

const withYearLine = (label: string, period: Period): string =>
	`${label}\n${period.year}`;

/** Rewrite the last label in place when the fold never put a year on it. */
const patchFinalYear = (
	labels: string[],
	state: LabelState,
	periods: readonly Period[],
	addYear: (label: string, period: Period) => string,
): string[] => {
	const lastIndex = labels.length - 1;
	if (lastIndex < 0 || state.sawYearOnLast) return labels;
	labels[lastIndex] = addYear(labels[lastIndex], periods[lastIndex]);
	return labels;
};

const initialState = (previousYear: number | null): LabelState => ({
	previousMonth: null,
	previousYear,
	sawYearOnLast: false,
});

const yearLabeller = (periods: readonly Period[]): string[] =>
	periods.map((p) => String(p.year));

const quarterLabeller = (periods: readonly Period[]): string[] => {
	const labels: string[] = [];
	const state = periods.reduce<LabelState>((acc, period) => {
		const isFirstQuarter = period.quarter === 1;
		const label = `Q${period.quarter}`;
		labels.push(isFirstQuarter ? withYearLine(label, period) : label);
		return { ...acc, sawYearOnLast: isFirstQuarter };
	}, initialState(null));
	return patchFinalYear(labels, state, periods, withYearLine);
};

const monthLabeller = (periods: readonly Period[]): string[] => {
	if (periods.length === 0) return [];
	const labels: string[] = [];
	const state = periods.reduce<LabelState>((acc, period) => {
		const label = monthAbbreviation(period);
		const isNewYear = acc.previousYear !== period.year || period.month === 1;
		labels.push(isNewYear ? withYearLine(label, period) : label);
		return {
			previousMonth: period.month,
			previousYear: period.year,
			sawYearOnLast: isNewYear,
		};
	}, initialState(periods[0].year));
	return patchFinalYear(labels, state, periods, withYearLine);
};

/**
 * Add the year to a day label. A month line is folded onto the day's
 * line first ("5\nJan" becomes "5 Jan"); a bare day gets its month
 * inline, so the year always follows a day-and-month line.
 */
const withDayYear = (label: string, period: Period): string => {
	const hasMonthLine = label.includes("\n");
	const dayLine = hasMonthLine
		? label.replace("\n", " ")
		: `${label} ${monthAbbreviation(period)}`;
	return withYearLine(dayLine, period);
};

const dayLabeller = (periods: readonly Period[]): string[] => {
	const labels: string[] = [];
	const state = periods.reduce<LabelState>((acc, period) => {
		let label = String(period.day);
		if (acc.previousMonth !== period.month) {
			label = `${label}\n${monthAbbreviation(period)}`;
		}
		const isNewYear = acc.previousYear !== period.year;
		if (isNewYear) {
			label = withDayYear(label, period);
		}
		labels.push(label);
		return {
			previousMonth: period.month,
			previousYear: period.year,
			sawYearOnLast: isNewYear,
		};
	}, initialState(null));
	return patchFinalYear(labels, state, periods, withDayYear);
};

export {
	MONTH_ABBREVIATIONS,
	dayLabeller,
	monthLabeller,
	quarterLabeller,
	yearLabeller,
};
