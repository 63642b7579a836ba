import { describe, expect, it } from "vitest";
import { buildLabelled, buildLabels, type LabelMap } from "../src/labels";
import { Period, periodRange } from "../src/period";
import { periods, range } from "./helpers";

const asRecord = (labels: LabelMap) =>
	Object.fromEntries([...labels].map(([p, text]) => [p.toString(), text]));

describe("buildLabels", () => {
	describe("days", () => {
		it("labels every day of a short run", () => {
			expect(asRecord(buildLabels(range("2020-01-01", "2020-01-04"), 10))).toEqual(
				{
					"2020-01-01": "1 Jan\n2020",
					"2020-01-02": "2",
					"2020-01-03": "3",
					"2020-01-04": "4 Jan\n2020",
				},
			);
		});

		it("starts at the first day for an odd count at interval 2", () => {
			const labels = buildLabels(range("2020-01-01", "2020-01-15"), 10);
			expect([...labels.values()]).toEqual([
				"1 Jan\n2020",
				"3",
				"5",
				"7",
				"9",
				"11",
				"13",
				"15 Jan\n2020",
			]);
		});

		it("offsets by one for an even count at interval 2", () => {
			const labels = buildLabels(range("2020-01-01", "2020-01-16"), 10);
			const keys = [...labels.keys()].map((p) => p.day);
			expect(keys).toEqual([2, 4, 6, 8, 10, 12, 14, 16]);
		});

		it("adds the month when it changes", () => {
			const labels = buildLabels(range("2020-01-25", "2020-02-05"), 10);
			expect([...labels.values()]).toEqual([
				"26 Jan\n2020",
				"28",
				"30",
				"1\nFeb",
				"3",
				"5 Feb\n2020",
			]);
		});

		it("folds the month inline when the year changes", () => {
			const labels = buildLabels(range("2019-12-28", "2020-01-03"), 10);
			expect([...labels.values()]).toEqual([
				"28 Dec\n2019",
				"29",
				"30",
				"31",
				"1 Jan\n2020",
				"2",
				"3 Jan\n2020",
			]);
		});
	});

	describe("months", () => {
		it("labels quarterly months of a daily series", () => {
			const labelled = buildLabelled(range("2020-02-01", "2022-07-15"), 10);
			expect(labelled.granularity).toBe("MONTH");
			expect(labelled.interval).toBe(3);
			expect(asRecord(labelled.labels)).toEqual({
				"2020-04-01": "Apr",
				"2020-07-01": "Jul",
				"2020-10-01": "Oct",
				"2021-01-01": "Jan\n2021",
				"2021-04-01": "Apr",
				"2021-07-01": "Jul",
				"2021-10-01": "Oct",
				"2022-01-01": "Jan\n2022",
				"2022-04-01": "Apr",
				"2022-07-01": "Jul\n2022",
			});
		});

		it("shows the year on January and on the final label", () => {
			const labels = buildLabels(range("2020-01", "2020-12"), 10);
			expect(asRecord(labels)).toEqual({
				"2020-01": "Jan\n2020",
				"2020-03": "Mar",
				"2020-05": "May",
				"2020-07": "Jul",
				"2020-09": "Sep",
				"2020-11": "Nov\n2020",
			});
		});
	});

	describe("lookup", () => {
		it("finds a label by an equal period, not only the same object", () => {
			const labels = buildLabels(range("2020-01", "2020-12"), 10);
			const january = Period.of({ freq: "M", year: 2020, month: 1 });
			expect(labels.has(january)).toBe(true);
			expect(labels.get(january)).toBe("Jan\n2020");
			expect(labels.get(Period.of({ freq: "M", year: 2020, month: 2 }))).toBe(
				undefined,
			);
		});

		it("does not match the same ordinal at another frequency", () => {
			const labels = buildLabels(range("2020-01", "2020-12"), 10);
			const month = Period.of({ freq: "M", year: 2020, month: 1 });
			expect(labels.get(Period.fromOrdinal("D", month.ordinal))).toBe(undefined);
		});
	});

	describe("quarters", () => {
		it("aligns to odd quarters at interval 2", () => {
			expect(asRecord(buildLabels(range("2020Q2", "2022Q4"), 10))).toEqual({
				"2020Q3": "Q3",
				"2021Q1": "Q1\n2021",
				"2021Q3": "Q3",
				"2022Q1": "Q1\n2022",
				"2022Q3": "Q3\n2022",
			});
		});
	});

	describe("years", () => {
		it("labels every fourth first quarter of a long quarterly series", () => {
			expect(asRecord(buildLabels(range("2000Q2", "2022Q4"), 10))).toEqual({
				"2004Q1": "2004",
				"2008Q1": "2008",
				"2012Q1": "2012",
				"2016Q1": "2016",
				"2020Q1": "2020",
			});
		});
	});

	describe("single period", () => {
		it.each([
			["2021-03-05", "5 Mar\n2021"],
			["2021-03", "Mar\n2021"],
			["2021Q2", "Q2\n2021"],
			["2021", "2021"],
		])("labels %s with its year", (text, expected) => {
			expect([...buildLabels(periods(text), 10).values()]).toEqual([expected]);
		});
	});

	it("labels the complete range of a gapped sequence", () => {
		const labels = buildLabels(periods("2020-01-01", "2020-01-04"), 10);
		expect([...labels.keys()].map(String)).toEqual([
			"2020-01-01",
			"2020-01-02",
			"2020-01-03",
			"2020-01-04",
		]);
	});

	it("is empty for an empty sequence", () => {
		expect(buildLabels([], 10).size).toBe(0);
	});
});

describe("label invariants", () => {
	const cases: [string, string][] = [
		["2019-11-17", "2020-02-03"],
		["2018-06-15", "2021-09-30"],
		["2001-01-01", "2001-01-01"],
		["2016-02-29", "2016-03-31"],
		["2010-05", "2013-02"],
		["1995-07", "2024-11"],
		["2009Q3", "2011Q2"],
		["1990Q4", "2020Q1"],
	];

	for (const [start, end] of cases) {
		const input = range(start, end);
		const first = input[0];
		const last = input[input.length - 1];

		for (const budget of [4, 6, 10, 15]) {
			it(`holds for ${start}..${end} with ${budget} ticks`, () => {
				const labelled = buildLabelled(input, budget);
				const keys = [...labelled.labels.keys()];
				const texts = [...labelled.labels.values()];

				// At most one over budget, from interval stepping.
				expect(keys.length).toBeLessThanOrEqual(budget + 1);

				for (const key of keys) {
					expect(key.compare(first)).toBeGreaterThanOrEqual(0);
					expect(key.compare(last)).toBeLessThanOrEqual(0);
				}

				const finalKey = keys[keys.length - 1];
				if (finalKey) {
					expect(texts[texts.length - 1]).toContain(String(finalKey.year));
				}
			});
		}
	}
});

describe("long sequences", () => {
	it("labels 100000 daily periods within the test timeout", () => {
		const first = Period.of({ freq: "D", year: 1900, month: 1, day: 1 });
		const days = periodRange(first, first.plus(99_999));
		const labels = buildLabels(days, 1_000_000);
		const texts = [...labels.values()];

		expect(labels.size).toBe(100_000);
		expect(texts[0]).toBe("1 Jan\n1900");
		expect(texts[texts.length - 1]).toBe("15 Oct\n2173");
	});
});
