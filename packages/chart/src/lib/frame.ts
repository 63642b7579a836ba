/**
 * Period-indexed tabular data: one row per period, one or more numeric
 * columns. Missing values are null.
 */
import { frequencyOf, type Period } from "@periodplot/core";
import { err, ok, type Result } from "neverthrow";
import { ChartError } from "../utils/errors";

type Column = {
	name: string;
	values: readonly (number | null)[];
};

type PeriodFrame = {
	index: readonly Period[];
	columns: readonly Column[];
};

const dataError = (message: string) =>
	err(new ChartError({ message, code: "DATA_ERROR" }));

/**
 * Validate and sort a frame. The index must share one frequency and
 * hold no duplicates; every column must have one value per period.
 */
const createFrame = ({
	index,
	columns,
}: {
	index: readonly Period[];
	columns: readonly Column[];
}): Result<PeriodFrame, ChartError> => {
	if (columns.length === 0) {
		return dataError("A frame needs at least one column");
	}
	const short = columns.find((c) => c.values.length !== index.length);
	if (short) {
		return dataError(
			`Column "${short.name}" has ${short.values.length} values for ${index.length} periods`,
		);
	}
	if (index.length > 0 && frequencyOf(index) === null) {
		return dataError("All periods in a frame must share one frequency");
	}

	const order = index
		.map((period, row) => ({ period, row }))
		.sort((a, b) => a.period.compare(b.period));

	const duplicate = order.find(
		(entry, i) => i > 0 && entry.period.equals(order[i - 1].period),
	);
	if (duplicate) {
		return dataError(`Duplicate period ${duplicate.period.toString()}`);
	}

	return ok({
		index: order.map((entry) => entry.period),
		columns: columns.map((column) => ({
			name: column.name,
			values: order.map((entry) => column.values[entry.row]),
		})),
	});
};

/** Every value in every column. */
const frameValues = (frame: PeriodFrame): (number | null)[] =>
	frame.columns.flatMap((column) => [...column.values]);

export { createFrame, frameValues };
export type { Column, PeriodFrame };
