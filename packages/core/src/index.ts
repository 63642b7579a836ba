export { computeTicksAndLabels, type TicksAndLabels } from "./axis";
export {
	BAD_SELECTION,
	GENERALISATIONS,
	GRANULARITY_FREQUENCY,
	type Granularity,
	type GranularitySelection,
	INTERVALS,
	MIN_TICKS,
	selectGranularity,
} from "./granularity";
export {
	dayLabeller,
	MONTH_ABBREVIATIONS,
	monthLabeller,
	quarterLabeller,
	yearLabeller,
} from "./labellers";
export {
	buildLabelled,
	buildLabels,
	LabelMap,
	type Labelled,
} from "./labels";
export {
	dayLocator,
	monthLocator,
	quarterLocator,
	yearLocator,
} from "./locators";
export {
	type Anchor,
	completeRange,
	FREQUENCY_CODES,
	type Frequency,
	frequencyOf,
	isFrequency,
	maxPeriod,
	minPeriod,
	Period,
	type PeriodSequence,
	parseFrequency,
	parsePeriod,
	periodRange,
	sortPeriods,
} from "./period";
export { isPeriodError, PeriodError, type PeriodErrorCode } from "./utils/errors";
export { createLogger, type Loggable, type Logger } from "./utils/logger";
