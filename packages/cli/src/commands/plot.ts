import {
	barPlot,
	type Chart,
	type ChartError,
	type FigureTexts,
	finalisePlot,
	GROWTH_YLABEL,
	getSetting,
	growthPlotFromFrame,
	linePlot,
	type PeriodFrame,
	seasTrendPlot,
} from "@periodplot/chart";
import { createLogger, type Period, parsePeriod } from "@periodplot/core";
import { err, ok, type Result, type ResultAsync, safeTry } from "neverthrow";
import { applyConfig, resolveConfig } from "../lib/config";
import { readCsvFrame } from "../lib/csv";
import { CliError, fromChartError } from "../utils/errors";

const log = createLogger("plot");

const PLOT_KINDS = ["line", "bar", "growth", "seas-trend"] as const;
type PlotKind = (typeof PLOT_KINDS)[number];

const isPlotKind = (value: string): value is PlotKind =>
	PLOT_KINDS.some((kind) => kind === value);

type PlotOptions = FigureTexts & {
	csv: string;
	kind?: string;
	periodColumn?: string;
	/** Series to take growth of. Defaults to the first. */
	column?: string;
	/** First period shown on a growth chart. */
	plotFrom?: string;
	freq?: string;
	tag?: string;
	preTag?: string;
	chartDir?: string;
	maxTicks?: number;
	width?: number;
	height?: number;
	isZeroIncluded?: boolean;
	isZeroLineShown?: boolean;
	isAnnotated?: boolean;
	legend?: boolean;
	dontSave?: boolean;
	/** Where to look for a local config. Defaults to the working directory. */
	projectRoot?: string;
};

const buildChart = ({
	kind,
	frame,
	plotFrom,
	opts,
}: {
	kind: PlotKind;
	frame: PeriodFrame;
	plotFrom: Period | undefined;
	opts: PlotOptions;
}): Result<Chart, ChartError> => {
	const defaultSize = getSetting("figsize");
	const shared = {
		frame,
		figsize: {
			width: opts.width ?? defaultSize.width,
			height: opts.height ?? defaultSize.height,
		},
		maxTicks: opts.maxTicks,
	};
	const lineOptions = {
		...shared,
		isZeroIncluded: opts.isZeroIncluded,
		isZeroLineShown: opts.isZeroLineShown,
		isAnnotated: opts.isAnnotated,
	};
	switch (kind) {
		case "bar":
			return barPlot(shared);
		case "line":
			return linePlot(lineOptions);
		case "seas-trend":
			// Left unset, the per-series annotation defaults apply
			return seasTrendPlot({
				...lineOptions,
				isAnnotated: opts.isAnnotated || undefined,
			});
		case "growth":
			return growthPlotFromFrame({
				...shared,
				column: opts.column,
				plotFrom,
				isZeroLineShown: opts.isZeroLineShown,
			});
	}
};

/**
 * Plot every series of a CSV file against its period column. Prints the
 * saved path, or the SVG itself when not saving.
 */
export function plot(opts: PlotOptions): ResultAsync<void, CliError> {
	return safeTry(async function* () {
		applyConfig(yield* resolveConfig(opts.projectRoot));

		const kind = opts.kind ?? "line";
		if (!isPlotKind(kind)) {
			return err(
				new CliError({
					message: `Unknown plot kind "${kind}" (expected one of ${PLOT_KINDS.join(", ")})`,
					code: "VALIDATION_ERROR",
				}),
			);
		}

		const frame = yield* readCsvFrame({
			path: opts.csv,
			periodColumn: opts.periodColumn,
			freq: opts.freq,
		});

		let plotFrom: Period | undefined;
		if (opts.plotFrom !== undefined) {
			plotFrom = yield* parsePeriod(opts.plotFrom).mapErr(
				(error) =>
					new CliError({
						message: error.message,
						code: "PARSE_ERROR",
						cause: error,
					}),
			);
		}

		const chart = yield* buildChart({ kind, frame, plotFrom, opts }).mapErr(
			fromChartError,
		);

		const finalised = yield* finalisePlot({
			chart,
			title: opts.title,
			xlabel: opts.xlabel,
			ylabel: opts.ylabel ?? (kind === "growth" ? GROWTH_YLABEL : undefined),
			lheader: opts.lheader,
			rheader: opts.rheader,
			lfooter: opts.lfooter,
			rfooter: opts.rfooter,
			legend: opts.legend,
			tag: opts.tag,
			preTag: opts.preTag,
			chartDir: opts.chartDir,
			dontSave: opts.dontSave,
		}).mapErr(fromChartError);

		if (finalised.path === null) {
			process.stdout.write(`${finalised.svg}\n`);
		} else {
			log.debug("%s chart of %d periods", kind, frame.index.length);
			process.stdout.write(`${finalised.path}\n`);
		}
		return ok(undefined);
	});
}

export type { PlotKind, PlotOptions };
