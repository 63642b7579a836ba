/**
 * Plot builders: turn a frame into a positioned chart, ready for
 * finalisePlot().
 */
import type { Period } from "@periodplot/core";
import { err, ok, type Result } from "neverthrow";
import { ChartError } from "../utils/errors";
import { getColorList } from "./color-list";
import type { PeriodFrame } from "./frame";
import { calcGrowth, type Growth, growthFrom } from "./growth";
import { getSetting } from "./settings";
import {
	type BarChartLayout,
	type BarChartOptions,
	type GrowthChartLayout,
	type GrowthChartOptions,
	type LineChartLayout,
	type LineChartOptions,
	useBarChartLayout,
	useGrowthChartLayout,
	useLineChartLayout,
} from "./svg/hooks";

type Chart = LineChartLayout | BarChartLayout | GrowthChartLayout;

/** Value axis label for growth charts. */
const GROWTH_YLABEL = "Per cent Growth";

const emptyFrameError = () =>
	new ChartError({
		message: "Nothing to plot: the frame has no periods",
		code: "DATA_ERROR",
	});

const linePlot = ({
	frame,
	...options
}: { frame: PeriodFrame } & LineChartOptions): Result<Chart, ChartError> => {
	const layout = useLineChartLayout({ frame, ...options });
	return layout ? ok(layout) : err(emptyFrameError());
};

const barPlot = ({
	frame,
	...options
}: { frame: PeriodFrame } & BarChartOptions): Result<Chart, ChartError> => {
	const layout = useBarChartLayout({ frame, ...options });
	return layout ? ok(layout) : err(emptyFrameError());
};

type GrowthPlotOptions = GrowthChartOptions & {
	/** First period to show, or a position (negative counts from the end). */
	plotFrom?: Period | number;
};

/** Periodic growth as bars under annual growth as a line. */
const growthPlot = ({
	growth,
	plotFrom,
	...options
}: { growth: Growth } & GrowthPlotOptions): Result<Chart, ChartError> =>
	growthFrom({ growth, plotFrom }).andThen((shown) => {
		const layout = useGrowthChartLayout({ growth: shown, ...options });
		return layout ? ok(layout) : err(emptyFrameError());
	});

/** calcGrowth() then growthPlot(), for one column of a frame. */
const growthPlotFromFrame = ({
	frame,
	column,
	...options
}: { frame: PeriodFrame; column?: string } & GrowthPlotOptions): Result<
	Chart,
	ChartError
> =>
	calcGrowth({ frame, column }).andThen((growth) =>
		growthPlot({ growth, ...options }),
	);

/**
 * Seasonally adjusted and trend series: the first two columns of the
 * frame, in that order. The trend is drawn wide and unlabelled, and
 * both lines run through missing values.
 */
const seasTrendPlot = ({
	frame,
	...options
}: { frame: PeriodFrame } & LineChartOptions): Result<Chart, ChartError> => {
	if (frame.columns.length < 2) {
		return err(
			new ChartError({
				message:
					"A seasonal/trend plot needs two columns: seasonally adjusted, then trend",
				code: "VALIDATION_ERROR",
			}),
		);
	}
	return linePlot({
		...options,
		frame: { index: frame.index, columns: frame.columns.slice(0, 2) },
		colors: options.colors ?? getColorList({ count: 2 }),
		strokeWidth: options.strokeWidth ?? [
			getSetting("lineNormal"),
			getSetting("lineWide"),
		],
		isAnnotated: options.isAnnotated ?? [true, false],
		isMissingDropped: options.isMissingDropped ?? true,
	});
};

export {
	barPlot,
	GROWTH_YLABEL,
	growthPlot,
	growthPlotFromFrame,
	linePlot,
	seasTrendPlot,
};
export type { Chart, GrowthPlotOptions };
