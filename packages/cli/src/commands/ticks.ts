import {
	buildLabelled,
	computeTicksAndLabels,
	parsePeriod,
	periodRange,
} from "@periodplot/core";
import { getSetting } from "@periodplot/chart";
import { err, ok, type ResultAsync, safeTry } from "neverthrow";
import { applyConfig, resolveConfig } from "../lib/config";
import { CliError } from "../utils/errors";

type TicksOptions = {
	start: string;
	end: string;
	freq?: string;
	maxTicks?: number;
	isJson?: boolean;
	/** Where to look for a local config. Defaults to the working directory. */
	projectRoot?: string;
};

const toParseError = (error: Error) =>
	new CliError({ message: error.message, code: "PARSE_ERROR", cause: error });

/** Tick labels printed one per line, with label lines joined by " / ". */
const formatTickLines = (opts: {
	ticks: readonly number[];
	labels: readonly string[];
}): string =>
	opts.ticks
		.map((tick, i) => `${tick}\t${opts.labels[i].replaceAll("\n", " / ")}\n`)
		.join("");

export function ticks(opts: TicksOptions): ResultAsync<void, CliError> {
	return safeTry(async function* () {
		applyConfig(yield* resolveConfig(opts.projectRoot));

		// The end is converted from its last day, so "--end 2022 --freq M"
		// runs through December.
		const start = yield* parsePeriod(opts.start, opts.freq).mapErr(toParseError);
		const end = yield* parsePeriod(
			opts.end,
			opts.freq ?? start.freq,
			"end",
		).mapErr(toParseError);
		if (end.compare(start) < 0) {
			return err(
				new CliError({
					message: `End ${end.toString()} is before start ${start.toString()}`,
					code: "VALIDATION_ERROR",
				}),
			);
		}

		const periods = periodRange(start, end);
		const maxTicks = opts.maxTicks ?? getSetting("maxTicks");
		const { granularity, interval } = buildLabelled(periods, maxTicks);
		const axis = computeTicksAndLabels(periods, maxTicks);

		if (opts.isJson) {
			process.stdout.write(
				`${JSON.stringify({ granularity, interval, ...axis }, null, 2)}\n`,
			);
		} else {
			process.stdout.write(formatTickLines(axis));
		}
		return ok(undefined);
	});
}

export { formatTickLines };
export type { TicksOptions };
