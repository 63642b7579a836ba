/**
 * Shared axis layout for period-indexed charts: the plot area, value
 * grid lines, and period ticks placed by the calendar tick engine.
 */
import { computeTicksAndLabels, type Period } from "@periodplot/core";
import type { PeriodFrame } from "../../frame";
import type { Figsize } from "../../settings";
import { zinc } from "../colors";
import { type ValueAxis, valueAxis, xFromTick, yFromValue } from "../math";
import { formatGridValue } from "../text";

type Padding = {
	top: number;
	right: number;
	bottom: number;
	left: number;
};

type PlotArea = {
	left: number;
	top: number;
	width: number;
	height: number;
};

type GridLine = {
	value: number;
	y: number;
	text: string;
};

type XTick = {
	x: number;
	text: string;
};

type AxisLayout = {
	area: PlotArea;
	/** Periods on the axis minus one: last ordinal - first ordinal. */
	span: number;
	values: ValueAxis;
	gridLines: GridLine[];
	xTicks: XTick[];
	/** Y of the zero line, when requested and zero is strictly inside the axis. */
	zeroLineY: number | null;
	gridLineColor: string;
	labelColor: string;
	axisColor: string;
};

type AxisScales = {
	layout: AxisLayout;
	xOf: (period: Period) => number;
	yOf: (value: number) => number;
};

const DEFAULT_PADDING: Readonly<Padding> = {
	top: 48,
	right: 56,
	bottom: 72,
	left: 64,
};

const plotArea = ({
	figsize,
	padding,
}: {
	figsize: Figsize;
	padding: Padding;
}): PlotArea => ({
	left: padding.left,
	top: padding.top,
	width: Math.max(figsize.width - padding.left - padding.right, 1),
	height: Math.max(figsize.height - padding.top - padding.bottom, 1),
});

const useAxisLayout = ({
	frame,
	area,
	values,
	maxTicks,
	includeZero,
	isZeroPadded,
	isZeroLineShown,
}: {
	frame: PeriodFrame;
	area: PlotArea;
	values: readonly (number | null)[];
	maxTicks: number;
	includeZero?: boolean;
	/** Leave room past zero so the zero line clears the axis edge. */
	isZeroPadded?: boolean;
	isZeroLineShown?: boolean;
}): AxisScales | null => {
	if (frame.index.length === 0) return null;
	const first = frame.index[0];
	const last = frame.index[frame.index.length - 1];
	const span = last.ordinal - first.ordinal;

	const axis = valueAxis({ values, includeZero, isZeroPadded });
	const yOf = (value: number): number =>
		yFromValue({
			value,
			min: axis.min,
			max: axis.max,
			top: area.top,
			height: area.height,
		});
	const xAt = (tick: number): number =>
		xFromTick({ tick, span, left: area.left, width: area.width });
	const xOf = (period: Period): number => xAt(period.ordinal - first.ordinal);

	const { ticks, labels } = computeTicksAndLabels(frame.index, maxTicks);

	const gridLines: GridLine[] = axis.ticks.map((value) => ({
		value,
		y: yOf(value),
		text: formatGridValue({ value }),
	}));

	const xTicks: XTick[] = ticks.map((tick, i) => ({
		x: xAt(tick),
		text: labels[i],
	}));

	const isZeroInside = axis.min < 0 && axis.max > 0;

	return {
		layout: {
			area,
			span,
			values: axis,
			gridLines,
			xTicks,
			zeroLineY: isZeroLineShown && isZeroInside ? yOf(0) : null,
			gridLineColor: zinc[200],
			labelColor: zinc[600],
			axisColor: zinc[700],
		},
		xOf,
		yOf,
	};
};

export { DEFAULT_PADDING, plotArea, useAxisLayout };
export type { AxisLayout, AxisScales, GridLine, Padding, PlotArea, XTick };
