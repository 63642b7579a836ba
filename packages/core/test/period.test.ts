import { describe, expect, it } from "vitest";
import {
	completeRange,
	frequencyOf,
	maxPeriod,
	minPeriod,
	parseFrequency,
	parsePeriod,
	Period,
	periodRange,
} from "../src/period";

const day = (year: number, month: number, d: number) =>
	Period.of({ freq: "D", year, month, day: d });

describe("Period.of", () => {
	it("counts ordinals from the 1970 epoch at each frequency", () => {
		expect(day(1970, 1, 1).ordinal).toBe(0);
		expect(day(2020, 1, 1).ordinal).toBe(18262);
		expect(Period.of({ freq: "M", year: 2020, month: 1 }).ordinal).toBe(600);
		expect(Period.of({ freq: "Q", year: 2020, quarter: 2 }).ordinal).toBe(201);
		expect(Period.of({ freq: "Y", year: 2020 }).ordinal).toBe(50);
	});

	it("handles periods before the epoch", () => {
		const p = Period.of({ freq: "M", year: 1969, month: 12 });
		expect(p.ordinal).toBe(-1);
		expect(p.year).toBe(1969);
		expect(p.month).toBe(12);
		expect(p.toString()).toBe("1969-12");
	});

	it("derives the quarter from the month", () => {
		const p = Period.of({ freq: "Q", year: 2021, month: 8 });
		expect(p.quarter).toBe(3);
		expect(p.toString()).toBe("2021Q3");
	});

	it("exposes calendar parts of a day", () => {
		const p = day(2020, 2, 29);
		expect(p.year).toBe(2020);
		expect(p.month).toBe(2);
		expect(p.quarter).toBe(1);
		expect(p.day).toBe(29);
	});
});

describe("asFreq", () => {
	it("converts a day to its containing month and year", () => {
		const p = day(2020, 2, 29);
		expect(p.asFreq("M").toString()).toBe("2020-02");
		expect(p.asFreq("Q").toString()).toBe("2020Q1");
		expect(p.asFreq("Y").toString()).toBe("2020");
	});

	it("anchors finer conversions on the first or last day", () => {
		const p = Period.of({ freq: "M", year: 2020, month: 2 });
		expect(p.asFreq("D", "end").toString()).toBe("2020-02-29");
		expect(p.asFreq("D", "start").toString()).toBe("2020-02-01");
		expect(
			Period.of({ freq: "Q", year: 2020, quarter: 3 }).asFreq("M").toString(),
		).toBe("2020-09");
	});

	it("returns the same period for its own frequency", () => {
		const p = day(2020, 5, 5);
		expect(p.asFreq("D")).toBe(p);
	});
});

describe("compare and equals", () => {
	it("orders periods by calendar time", () => {
		expect(day(2020, 1, 2).compare(day(2020, 1, 1))).toBeGreaterThan(0);
		expect(day(2020, 1, 1).equals(day(2020, 1, 1))).toBe(true);
		expect(
			day(2020, 1, 1).equals(Period.of({ freq: "M", year: 2020, month: 1 })),
		).toBe(false);
	});
});

describe("parsePeriod", () => {
	it("parses each natural format", () => {
		expect(parsePeriod("2020-01-05")._unsafeUnwrap().toString()).toBe(
			"2020-01-05",
		);
		expect(parsePeriod("2020-01")._unsafeUnwrap().freq).toBe("M");
		expect(parsePeriod("2020-Q2")._unsafeUnwrap().toString()).toBe("2020Q2");
		expect(parsePeriod("2020q4")._unsafeUnwrap().toString()).toBe("2020Q4");
		expect(parsePeriod(" 2020 ")._unsafeUnwrap().freq).toBe("Y");
	});

	it("converts to a requested frequency from the first day", () => {
		expect(parsePeriod("2020-03", "Q")._unsafeUnwrap().toString()).toBe(
			"2020Q1",
		);
		expect(parsePeriod("2020", "D")._unsafeUnwrap().toString()).toBe(
			"2020-01-01",
		);
	});

	it("converts from the last day when anchored at the end", () => {
		expect(parsePeriod("2022", "M", "end")._unsafeUnwrap().toString()).toBe(
			"2022-12",
		);
		expect(parsePeriod("2020-05", "D", "end")._unsafeUnwrap().toString()).toBe(
			"2020-05-31",
		);
		expect(parsePeriod("2020-05", "Q", "end")._unsafeUnwrap().toString()).toBe(
			"2020Q2",
		);
	});

	it("rejects impossible dates", () => {
		const result = parsePeriod("2021-02-30");
		expect(result.isErr()).toBe(true);
		expect(result._unsafeUnwrapErr().code).toBe("PARSE_ERROR");
		expect(parsePeriod("2021-13").isErr()).toBe(true);
		expect(parsePeriod("March 2021").isErr()).toBe(true);
	});

	it("rejects unknown frequencies", () => {
		const result = parsePeriod("2020-01-01", "W");
		expect(result._unsafeUnwrapErr().code).toBe("FREQUENCY_ERROR");
	});
});

describe("parseFrequency", () => {
	it("reads the first letter of a frequency code", () => {
		expect(parseFrequency("Q-DEC")._unsafeUnwrap()).toBe("Q");
		expect(parseFrequency("m")._unsafeUnwrap()).toBe("M");
		expect(parseFrequency("H").isErr()).toBe(true);
	});
});

describe("periodRange", () => {
	it("lists consecutive periods across a month boundary", () => {
		const range = periodRange(day(2020, 1, 30), day(2020, 2, 2));
		expect(range.map(String)).toEqual([
			"2020-01-30",
			"2020-01-31",
			"2020-02-01",
			"2020-02-02",
		]);
	});

	it("is empty when the end precedes the start", () => {
		expect(periodRange(day(2020, 1, 2), day(2020, 1, 1))).toEqual([]);
	});
});

describe("sequence helpers", () => {
	const gapped = [day(2020, 1, 4), day(2020, 1, 1), day(2020, 1, 2)];

	it("finds the bounds of an unordered sequence", () => {
		expect(minPeriod(gapped)?.toString()).toBe("2020-01-01");
		expect(maxPeriod(gapped)?.toString()).toBe("2020-01-04");
		expect(minPeriod([])).toBeUndefined();
	});

	it("fills gaps in the complete range", () => {
		expect(completeRange(gapped).map(String)).toEqual([
			"2020-01-01",
			"2020-01-02",
			"2020-01-03",
			"2020-01-04",
		]);
	});

	it("reports a single frequency or null", () => {
		expect(frequencyOf(gapped)).toBe("D");
		expect(frequencyOf([])).toBeNull();
		expect(
			frequencyOf([day(2020, 1, 1), Period.of({ freq: "M", year: 2020 })]),
		).toBeNull();
	});
});
