/**
 * Calendar periods at a fixed frequency (day, month, quarter, year).
 *
 * A period is an ordinal counted from the 1970 epoch at its own
 * frequency: day 0 is 1970-01-01, month 0 is 1970-01, quarter 0 is
 * 1970Q1 and year 0 is 1970. All date math is done in UTC.
 */
import { err, ok, type Result } from "neverthrow";
import { PeriodError } from "./utils/errors";

type Frequency = "D" | "M" | "Q" | "Y";

/** Which day of a period anchors a conversion to another frequency. */
type Anchor = "start" | "end";

type PeriodSequence = readonly Period[];

const FREQUENCY_CODES: readonly Frequency[] = ["D", "M", "Q", "Y"];

const EPOCH_YEAR = 1970;
const MS_PER_DAY = 86_400_000;

const isFrequency = (value: string): value is Frequency =>
	(FREQUENCY_CODES as readonly string[]).includes(value);

const floorMod = (n: number, m: number): number => ((n % m) + m) % m;

/** Day ordinal for a calendar date. Works for years before 100 as well. */
const dayOrdinal = (year: number, month: number, day: number): number => {
	const date = new Date(0);
	date.setUTCFullYear(year, month - 1, day);
	return Math.round(date.getTime() / MS_PER_DAY);
};

type CalendarDate = { year: number; month: number; day: number };

const dateFromDayOrdinal = (ordinal: number): CalendarDate => {
	const date = new Date(ordinal * MS_PER_DAY);
	return {
		year: date.getUTCFullYear(),
		month: date.getUTCMonth() + 1,
		day: date.getUTCDate(),
	};
};

class Period {
	readonly freq: Frequency;
	readonly ordinal: number;

	private constructor(freq: Frequency, ordinal: number) {
		this.freq = freq;
		this.ordinal = ordinal;
	}

	static fromOrdinal(freq: Frequency, ordinal: number): Period {
		return new Period(freq, ordinal);
	}

	/**
	 * Build the period containing the given calendar position. Missing
	 * parts default to the start of the year; a quarter may be given
	 * directly or derived from the month.
	 */
	static of(opts: {
		freq: Frequency;
		year: number;
		month?: number;
		quarter?: number;
		day?: number;
	}): Period {
		const month = opts.month ?? (opts.quarter ? (opts.quarter - 1) * 3 + 1 : 1);
		switch (opts.freq) {
			case "D":
				return new Period("D", dayOrdinal(opts.year, month, opts.day ?? 1));
			case "M":
				return new Period("M", (opts.year - EPOCH_YEAR) * 12 + month - 1);
			case "Q": {
				const quarter = opts.quarter ?? Math.floor((month - 1) / 3) + 1;
				return new Period("Q", (opts.year - EPOCH_YEAR) * 4 + quarter - 1);
			}
			case "Y":
				return new Period("Y", opts.year - EPOCH_YEAR);
		}
	}

	/** The period of the given frequency containing a day ordinal. */
	static fromDayOrdinal(freq: Frequency, ordinal: number): Period {
		if (freq === "D") return new Period("D", ordinal);
		const date = dateFromDayOrdinal(ordinal);
		return Period.of({ freq, year: date.year, month: date.month });
	}

	/** Calendar date of the first day in this period. */
	private firstDate(): CalendarDate {
		switch (this.freq) {
			case "D":
				return dateFromDayOrdinal(this.ordinal);
			case "M":
				return {
					year: EPOCH_YEAR + Math.floor(this.ordinal / 12),
					month: floorMod(this.ordinal, 12) + 1,
					day: 1,
				};
			case "Q":
				return {
					year: EPOCH_YEAR + Math.floor(this.ordinal / 4),
					month: floorMod(this.ordinal, 4) * 3 + 1,
					day: 1,
				};
			case "Y":
				return { year: EPOCH_YEAR + this.ordinal, month: 1, day: 1 };
		}
	}

	get year(): number {
		return this.firstDate().year;
	}

	/** Month of year, 1-12. */
	get month(): number {
		return this.firstDate().month;
	}

	/** Quarter of year, 1-4. */
	get quarter(): number {
		return Math.floor((this.month - 1) / 3) + 1;
	}

	/** Day of month. */
	get day(): number {
		return this.firstDate().day;
	}

	firstDay(): number {
		const { year, month, day } = this.firstDate();
		return dayOrdinal(year, month, day);
	}

	lastDay(): number {
		return this.plus(1).firstDay() - 1;
	}

	/**
	 * Re-express this period at another frequency, anchored on its first
	 * or last day. Converting to a coarser frequency gives the containing
	 * period either way.
	 */
	asFreq(freq: Frequency, how: Anchor = "end"): Period {
		if (freq === this.freq) return this;
		const anchor = how === "end" ? this.lastDay() : this.firstDay();
		return Period.fromDayOrdinal(freq, anchor);
	}

	plus(steps: number): Period {
		return new Period(this.freq, this.ordinal + steps);
	}

	compare(other: Period): number {
		if (other.freq === this.freq) return this.ordinal - other.ordinal;
		return this.firstDay() - other.firstDay();
	}

	equals(other: Period): boolean {
		return other.freq === this.freq && other.ordinal === this.ordinal;
	}

	toString(): string {
		const { year, month, day } = this.firstDate();
		const mm = String(month).padStart(2, "0");
		switch (this.freq) {
			case "D":
				return `${year}-${mm}-${String(day).padStart(2, "0")}`;
			case "M":
				return `${year}-${mm}`;
			case "Q":
				return `${year}Q${this.quarter}`;
			case "Y":
				return String(year);
		}
	}
}

/**
 * Read a frequency code. Only the first letter matters, so "Q-DEC"
 * and "q" are both quarterly.
 */
const parseFrequency = (text: string): Result<Frequency, PeriodError> => {
	const code = text.trim().charAt(0).toUpperCase();
	if (isFrequency(code)) return ok(code);
	return err(
		new PeriodError({
			message: `Unrecognised date-like frequency "${text}"`,
			code: "FREQUENCY_ERROR",
		}),
	);
};

const DAY_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;
const MONTH_PATTERN = /^(\d{4})-(\d{1,2})$/;
const QUARTER_PATTERN = /^(\d{4})-?[Qq]([1-4])$/;
const YEAR_PATTERN = /^(\d{4})$/;

const parseNatural = (text: string): Period | null => {
	const dayMatch = DAY_PATTERN.exec(text);
	if (dayMatch) {
		const [year, month, day] = dayMatch.slice(1).map(Number);
		if (month < 1 || month > 12) return null;
		const period = Period.of({ freq: "D", year, month, day });
		// Reject dates Date would roll over, e.g. 2021-02-30.
		return period.month === month && period.day === day ? period : null;
	}
	const monthMatch = MONTH_PATTERN.exec(text);
	if (monthMatch) {
		const [year, month] = monthMatch.slice(1).map(Number);
		if (month < 1 || month > 12) return null;
		return Period.of({ freq: "M", year, month });
	}
	const quarterMatch = QUARTER_PATTERN.exec(text);
	if (quarterMatch) {
		const [year, quarter] = quarterMatch.slice(1).map(Number);
		return Period.of({ freq: "Q", year, quarter });
	}
	const yearMatch = YEAR_PATTERN.exec(text);
	if (yearMatch) {
		return Period.of({ freq: "Y", year: Number(yearMatch[1]) });
	}
	return null;
};

/**
 * Parse "2020-01-05", "2020-01", "2020-Q1" / "2020Q1" or "2020". With a
 * frequency, the parsed period is converted to it from its first day,
 * or from its last when `how` is "end".
 */
const parsePeriod = (
	text: string,
	freq?: string,
	how: Anchor = "start",
): Result<Period, PeriodError> => {
	const period = parseNatural(text.trim());
	if (!period) {
		return err(
			new PeriodError({
				message: `Cannot parse "${text}" as a period`,
				code: "PARSE_ERROR",
			}),
		);
	}
	if (freq === undefined) return ok(period);
	return parseFrequency(freq).map((target) => period.asFreq(target, how));
};

/** Every consecutive period from start to end, inclusive, at start's frequency. */
const periodRange = (start: Period, end: Period): Period[] => {
	const last = end.asFreq(start.freq, "end");
	const periods: Period[] = [];
	for (let ordinal = start.ordinal; ordinal <= last.ordinal; ordinal++) {
		periods.push(Period.fromOrdinal(start.freq, ordinal));
	}
	return periods;
};

/** The single frequency shared by every period, or null if empty or mixed. */
const frequencyOf = (periods: PeriodSequence): Frequency | null => {
	if (periods.length === 0) return null;
	const freq = periods[0].freq;
	return periods.every((p) => p.freq === freq) ? freq : null;
};

const minPeriod = (periods: PeriodSequence): Period | undefined =>
	periods.reduce<Period | undefined>(
		(min, p) => (min === undefined || p.compare(min) < 0 ? p : min),
		undefined,
	);

const maxPeriod = (periods: PeriodSequence): Period | undefined =>
	periods.reduce<Period | undefined>(
		(max, p) => (max === undefined || p.compare(max) > 0 ? p : max),
		undefined,
	);

/** Gap-free range from the earliest to the latest period of a sequence. */
const completeRange = (periods: PeriodSequence): Period[] => {
	const start = minPeriod(periods);
	const end = maxPeriod(periods);
	if (!start || !end) return [];
	return periodRange(start, end);
};

const sortPeriods = (periods: PeriodSequence): Period[] =>
	[...periods].sort((a, b) => a.compare(b));

export {
	Period,
	FREQUENCY_CODES,
	isFrequency,
	parseFrequency,
	parsePeriod,
	periodRange,
	frequencyOf,
	minPeriod,
	maxPeriod,
	completeRange,
	sortPeriods,
};
export type { Frequency, Anchor, PeriodSequence };
