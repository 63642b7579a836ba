/**
 * Reads a CSV file into a period-indexed frame. One column holds the
 * periods; every other column is a numeric series. Empty cells are
 * missing values.
 */
import { readFile } from "fs/promises";
import { createFrame, type PeriodFrame } from "@periodplot/chart";
import { createLogger, parsePeriod } from "@periodplot/core";
import { err, ok, Result, ResultAsync } from "neverthrow";
import Papa from "papaparse";
import { CliError, fromChartError, toCliError } from "../utils/errors";

const log = createLogger("csv");

type CsvRow = Record<string, string | undefined>;

const parseError = (message: string) =>
	new CliError({ message, code: "PARSE_ERROR" });

/** Header row is line 1, so data row i is line i + 2. */
const lineOf = (row: number): number => row + 2;

function parseCell(opts: {
	cell: string | undefined;
	column: string;
	row: number;
}): Result<number | null, CliError> {
	const text = (opts.cell ?? "").trim();
	if (text === "") return ok(null);
	const value = Number(text);
	if (Number.isNaN(value)) {
		return err(
			parseError(
				`Line ${lineOf(opts.row)}: "${text}" in column "${opts.column}" is not a number`,
			),
		);
	}
	return ok(value);
}

/**
 * Build a frame from already-read CSV text. The period column defaults
 * to the first column.
 */
function parseCsvFrame(opts: {
	text: string;
	periodColumn?: string;
	freq?: string;
}): Result<PeriodFrame, CliError> {
	const parsed = Papa.parse<CsvRow>(opts.text, {
		header: true,
		skipEmptyLines: true,
		transformHeader: (header) => header.trim(),
	});
	const firstError = parsed.errors[0];
	if (firstError) {
		const where =
			firstError.row === undefined ? "" : `Line ${lineOf(firstError.row)}: `;
		return err(parseError(`${where}${firstError.message}`));
	}

	const fields = parsed.meta.fields ?? [];
	const periodColumn = opts.periodColumn ?? fields[0];
	if (periodColumn === undefined || !fields.includes(periodColumn)) {
		return err(
			new CliError({
				message: `No period column "${periodColumn ?? ""}" in the CSV header`,
				code: "VALIDATION_ERROR",
			}),
		);
	}
	const seriesColumns = fields.filter((field) => field !== periodColumn);
	log.debug(
		"%d rows, period column %s, series %o",
		parsed.data.length,
		periodColumn,
		seriesColumns,
	);

	const index = Result.combine(
		parsed.data.map((row, i) =>
			parsePeriod(row[periodColumn] ?? "", opts.freq).mapErr((error) =>
				parseError(`Line ${lineOf(i)}: ${error.message}`),
			),
		),
	);
	const columns = Result.combine(
		seriesColumns.map((column) =>
			Result.combine(
				parsed.data.map((row, i) =>
					parseCell({ cell: row[column], column, row: i }),
				),
			).map((values) => ({ name: column, values })),
		),
	);

	return index.andThen((periods) =>
		columns.andThen((series) =>
			createFrame({ index: periods, columns: series }).mapErr(fromChartError),
		),
	);
}

function readCsvFrame(opts: {
	path: string;
	periodColumn?: string;
	freq?: string;
}): ResultAsync<PeriodFrame, CliError> {
	return ResultAsync.fromPromise(
		readFile(opts.path, "utf-8"),
		toCliError({ message: `Failed to read ${opts.path}`, code: "IO_ERROR" }),
	).andThen((text) =>
		parseCsvFrame({ text, periodColumn: opts.periodColumn, freq: opts.freq }),
	);
}

export { parseCsvFrame, readCsvFrame };
