import { describe, expect, it } from "vitest";
import { createFrame, frameValues } from "../../src/lib/frame";
import { periods } from "../helpers";

describe("createFrame", () => {
	it("sorts rows by period", () => {
		const frame = createFrame({
			index: periods("2020-03", "2020-01", "2020-02"),
			columns: [{ name: "sales", values: [3, 1, 2] }],
		})._unsafeUnwrap();
		expect(frame.index.map(String)).toEqual(["2020-01", "2020-02", "2020-03"]);
		expect(frame.columns[0].values).toEqual([1, 2, 3]);
	});

	it("keeps missing values in place", () => {
		const frame = createFrame({
			index: periods("2021Q2", "2021Q1"),
			columns: [
				{ name: "a", values: [null, 5] },
				{ name: "b", values: [7, null] },
			],
		})._unsafeUnwrap();
		expect(frame.columns[0].values).toEqual([5, null]);
		expect(frame.columns[1].values).toEqual([null, 7]);
		expect(frameValues(frame)).toEqual([5, null, null, 7]);
	});

	it("rejects a frame without columns", () => {
		const result = createFrame({ index: periods("2020"), columns: [] });
		expect(result._unsafeUnwrapErr().code).toBe("DATA_ERROR");
	});

	it("rejects a column of the wrong length", () => {
		const result = createFrame({
			index: periods("2020", "2021"),
			columns: [{ name: "short", values: [1] }],
		});
		expect(result._unsafeUnwrapErr().message).toBe(
			'Column "short" has 1 values for 2 periods',
		);
	});

	it("rejects mixed frequencies", () => {
		const result = createFrame({
			index: periods("2020", "2020-01"),
			columns: [{ name: "x", values: [1, 2] }],
		});
		expect(result._unsafeUnwrapErr().message).toBe(
			"All periods in a frame must share one frequency",
		);
	});

	it("rejects duplicate periods", () => {
		const result = createFrame({
			index: periods("2020-01", "2020-02", "2020-01"),
			columns: [{ name: "x", values: [1, 2, 3] }],
		});
		expect(result._unsafeUnwrapErr().message).toBe("Duplicate period 2020-01");
	});
});
