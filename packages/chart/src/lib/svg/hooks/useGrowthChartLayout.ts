/**
 * Periodic growth as bars with annual growth as a line over them, on
 * one value axis. Small charts print each bar's value at its base.
 */
import { frameValues, type PeriodFrame } from "../../frame";
import type { Growth } from "../../growth";
import { type Figsize, getSetting } from "../../settings";
import { palette } from "../colors";
import {
	type AxisLayout,
	DEFAULT_PADDING,
	type Padding,
	plotArea,
	useAxisLayout,
} from "./useAxisLayout";
import { type Bar, positionBars } from "./useBarChartLayout";
import { type LegendEntry, type LineSeries, positionLine } from "./useLineChartLayout";

type BarLabel = {
	x: number;
	y: number;
	text: string;
	/** "auto" sits above the zero line, "hanging" below it. */
	baseline: "auto" | "hanging";
	halo: string;
};

type GrowthChartLayout = {
	kind: "growth";
	figsize: Figsize;
	padding: Padding;
	axis: AxisLayout;
	bars: Bar[];
	barLabels: BarLabel[];
	line: LineSeries;
	legend: LegendEntry[];
};

type GrowthChartOptions = {
	figsize?: Figsize;
	padding?: Padding;
	maxTicks?: number;
	barColor?: string;
	lineColor?: string;
	/** Defaults by period count. */
	lineWidth?: number;
	/** Print the last annual growth rate beside the line. Defaults to true. */
	isLineAnnotated?: boolean;
	/** Print each bar's value. Defaults to true; never done for long series. */
	isBarAnnotated?: boolean;
	/** Decimal places in bar labels. */
	barDigits?: number;
	/** Defaults to shown when periodic growth has both signs. */
	isZeroLineShown?: boolean;
};

const DEFAULT_BAR_COLOR = palette.rose;
const DEFAULT_LINE_COLOR = palette.blue;
/** Series this long get the normal line width instead of the wide one. */
const THIN_LINE_MIN_PERIODS = 180;
/** Bars are only labelled below this many periods. */
const MAX_BAR_LABELS = 30;
const BAR_LABEL_GAP = 2;

const hasBothSigns = (values: readonly (number | null)[]): boolean =>
	values.some((v) => v !== null && v > 0) &&
	values.some((v) => v !== null && v < 0);

const useGrowthChartLayout = ({
	growth,
	...options
}: { growth: Growth } & GrowthChartOptions): GrowthChartLayout | null => {
	const figsize = options.figsize ?? getSetting("figsize");
	const padding = options.padding ?? DEFAULT_PADDING;
	const frame: PeriodFrame = {
		index: growth.index,
		columns: [growth.periodic, growth.annual],
	};
	const scales = useAxisLayout({
		frame,
		area: plotArea({ figsize, padding }),
		values: frameValues(frame),
		maxTicks: options.maxTicks ?? getSetting("maxTicks"),
		includeZero: true,
		isZeroLineShown:
			options.isZeroLineShown ?? hasBothSigns(growth.periodic.values),
	});
	if (!scales) return null;

	const barColor = options.barColor ?? DEFAULT_BAR_COLOR;
	const lineColor = options.lineColor ?? DEFAULT_LINE_COLOR;

	const bars = positionBars({
		frame: { index: growth.index, columns: [growth.periodic] },
		scales,
		colors: [barColor],
	});

	const line = positionLine({
		column: growth.annual,
		index: growth.index,
		scales,
		color: lineColor,
		strokeWidth:
			options.lineWidth ??
			(growth.index.length >= THIN_LINE_MIN_PERIODS
				? getSetting("lineNormal")
				: getSetting("lineWide")),
		isAnnotated: options.isLineAnnotated ?? true,
	});

	const isBarAnnotated =
		(options.isBarAnnotated ?? true) && growth.index.length < MAX_BAR_LABELS;
	const baseline = scales.yOf(0);
	const digits = options.barDigits ?? 1;
	const barLabels: BarLabel[] = isBarAnnotated
		? bars.map((bar): BarLabel => {
				const isRising = bar.value >= 0;
				return {
					x: bar.x + bar.width / 2,
					y: isRising ? baseline - BAR_LABEL_GAP : baseline + BAR_LABEL_GAP,
					text: bar.value.toFixed(digits),
					baseline: isRising ? "auto" : "hanging",
					halo: barColor,
				};
			})
		: [];

	return {
		kind: "growth",
		figsize,
		padding,
		axis: scales.layout,
		bars,
		barLabels,
		line,
		legend: [
			{ label: growth.periodic.name, color: barColor },
			{ label: growth.annual.name, color: lineColor },
		],
	};
};

export { useGrowthChartLayout };
export type { BarLabel, GrowthChartLayout, GrowthChartOptions };
