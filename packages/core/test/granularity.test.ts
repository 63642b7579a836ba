import { afterEach, describe, expect, it, vi } from "vitest";
import {
	BAD_SELECTION,
	type Granularity,
	selectGranularity,
} from "../src/granularity";
import { Period } from "../src/period";
import { periods, range } from "./helpers";

afterEach(() => {
	vi.restoreAllMocks();
});

describe("selectGranularity", () => {
	it("labels a few days daily", () => {
		const days = range("2020-01-01", "2020-01-04");
		expect(selectGranularity(days, 10)).toEqual({
			count: 4,
			granularity: "DAY",
			interval: 1,
		});
	});

	it("moves from days to quarterly months over two and a half years", () => {
		const days = range("2020-02-01", "2022-07-15");
		expect(selectGranularity(days, 10)).toEqual({
			count: 10,
			granularity: "MONTH",
			interval: 3,
		});
	});

	it("takes the next interval when eleven quarters exceed ten ticks", () => {
		const quarters = range("2020Q2", "2022Q4");
		expect(quarters).toHaveLength(11);
		expect(selectGranularity(quarters, 10)).toEqual({
			count: 5,
			granularity: "QUARTER",
			interval: 2,
		});
	});

	it("escalates long quarterly series to multi-year intervals", () => {
		const quarters = range("2000Q2", "2022Q4");
		expect(quarters).toHaveLength(91);
		expect(selectGranularity(quarters, 10)).toEqual({
			count: 5,
			granularity: "YEAR",
			interval: 4,
		});
	});

	it("counts partial first and last months as whole ones", () => {
		// 306 days is too many for any daily interval; Jan to Dec touches
		// 12 months, so every third month gives 4 ticks.
		expect(selectGranularity(range("2020-01-31", "2020-12-01"), 4)).toEqual({
			count: 4,
			granularity: "MONTH",
			interval: 3,
		});
	});

	it("prefers a wide daily interval over coarser granularities", () => {
		// 31 days / 7 = 4 fits a budget of 4.
		expect(selectGranularity(range("2020-01-31", "2020-03-01"), 4)).toEqual({
			count: 4,
			granularity: "DAY",
			interval: 7,
		});
	});

	it("raises budgets below four to four", () => {
		const days = range("2020-01-01", "2020-01-04");
		expect(selectGranularity(days, 1).granularity).toBe("DAY");
		expect(selectGranularity(days, 1).interval).toBe(1);
		expect(selectGranularity(days, Number.NaN).count).toBe(4);
	});

	it("tolerates gaps and unordered input", () => {
		const days = periods("2020-01-04", "2020-01-01");
		expect(selectGranularity(days, 10)).toEqual({
			count: 4,
			granularity: "DAY",
			interval: 1,
		});
	});

	it("returns the BAD sentinel for an empty sequence", () => {
		expect(selectGranularity([], 10)).toEqual(BAD_SELECTION);
	});

	it("warns and returns BAD for mixed frequencies", () => {
		const write = vi
			.spyOn(process.stderr, "write")
			.mockImplementation(() => true);
		const mixed = periods("2020-01-01", "2020-02");
		expect(selectGranularity(mixed, 10)).toEqual({
			count: 0,
			granularity: "BAD",
			interval: 0,
		});
		expect(write).toHaveBeenCalledWith(
			"Warning: Unrecognised date-like period frequency (mixed frequencies)\n",
		);
	});

	it("falls back to the largest yearly interval when nothing fits", () => {
		const years = [
			Period.of({ freq: "Y", year: 1000 }),
			Period.of({ freq: "Y", year: 5999 }),
		];
		expect(selectGranularity(years, 4)).toEqual({
			count: 5,
			granularity: "YEAR",
			interval: 1000,
		});
	});

	it("never picks a finer granularity for a smaller budget", () => {
		const rank: Record<Granularity, number> = {
			DAY: 0,
			MONTH: 1,
			QUARTER: 2,
			YEAR: 3,
		};
		const days = range("2015-03-10", "2020-06-30");
		let previous = Number.POSITIVE_INFINITY;
		for (let budget = 4; budget <= 80; budget++) {
			const selection = selectGranularity(days, budget);
			if (selection.granularity === "BAD") throw new Error("unexpected BAD");
			const current = rank[selection.granularity];
			expect(current).toBeLessThanOrEqual(previous);
			previous = current;
		}
	});
});
