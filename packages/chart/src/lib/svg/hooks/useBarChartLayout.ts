/**
 * Computes a fully positioned grouped bar chart over a period-indexed
 * frame. Each period gets one slot; the columns share it side by side.
 * Bars rise from zero, so negative values hang below the zero line.
 */
import { getColorList } from "../../color-list";
import { frameValues, type PeriodFrame } from "../../frame";
import { type Figsize, getSetting } from "../../settings";
import { slotWidth } from "../math";
import {
	type AxisLayout,
	type AxisScales,
	DEFAULT_PADDING,
	type Padding,
	plotArea,
	useAxisLayout,
} from "./useAxisLayout";
import type { LegendEntry } from "./useLineChartLayout";

type Bar = {
	x: number;
	y: number;
	width: number;
	height: number;
	fill: string;
	value: number;
};

type BarChartLayout = {
	kind: "bar";
	figsize: Figsize;
	padding: Padding;
	axis: AxisLayout;
	bars: Bar[];
	legend: LegendEntry[];
};

type BarChartOptions = {
	figsize?: Figsize;
	padding?: Padding;
	maxTicks?: number;
	colors?: readonly string[];
};

/**
 * Bars for every column, grouped by period. Columns take colors in
 * turn; missing values leave an empty place in their group.
 */
const positionBars = ({
	frame,
	scales,
	colors,
}: {
	frame: PeriodFrame;
	scales: AxisScales;
	colors: readonly string[];
}): Bar[] => {
	const { layout, xOf, yOf } = scales;
	// Four fifths of each slot is bars, the rest is the gap between groups
	const groupWidth =
		(slotWidth({ span: layout.span, width: layout.area.width }) * 4) / 5;
	const barWidth = groupWidth / frame.columns.length;
	const baseline = yOf(0);

	return frame.columns.flatMap((column, c) =>
		column.values.flatMap((value, row) => {
			if (value === null || !Number.isFinite(value)) return [];
			const y = yOf(value);
			return [
				{
					x: xOf(frame.index[row]) - groupWidth / 2 + c * barWidth,
					y: Math.min(y, baseline),
					width: barWidth,
					height: Math.abs(y - baseline),
					fill: colors[c % colors.length],
					value,
				},
			];
		}),
	);
};

const useBarChartLayout = ({
	frame,
	...options
}: { frame: PeriodFrame } & BarChartOptions): BarChartLayout | null => {
	const figsize = options.figsize ?? getSetting("figsize");
	const padding = options.padding ?? DEFAULT_PADDING;
	const scales = useAxisLayout({
		frame,
		area: plotArea({ figsize, padding }),
		values: frameValues(frame),
		maxTicks: options.maxTicks ?? getSetting("maxTicks"),
		includeZero: true,
		isZeroLineShown: true,
	});
	if (!scales) return null;

	const colors = options.colors ?? getColorList({ count: frame.columns.length });
	const bars = positionBars({ frame, scales, colors });

	return {
		kind: "bar",
		figsize,
		padding,
		axis: scales.layout,
		bars,
		legend: frame.columns.map((column, c) => ({
			label: column.name,
			color: colors[c % colors.length],
		})),
	};
};

export { positionBars, useBarChartLayout };
export type { Bar, BarChartLayout, BarChartOptions };
