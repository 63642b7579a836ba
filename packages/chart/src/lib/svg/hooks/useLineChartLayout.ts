/**
 * Computes a fully positioned line chart over a period-indexed frame.
 *
 * One path per column, broken wherever a value is missing. X positions
 * follow calendar spacing, so gaps in the index show as gaps in time.
 *
 * Returns everything the component needs to render -- no math in JSX.
 */
import type { Period } from "@periodplot/core";
import { getColorList } from "../../color-list";
import { type Column, frameValues, type PeriodFrame } from "../../frame";
import { type Figsize, getSetting } from "../../settings";
import { formatEndPoint } from "../text";
import {
	type AxisLayout,
	type AxisScales,
	DEFAULT_PADDING,
	type Padding,
	plotArea,
	useAxisLayout,
} from "./useAxisLayout";

type LinePoint = {
	x: number;
	y: number;
	value: number;
};

type EndPoint = {
	x: number;
	y: number;
	text: string;
};

type LineSeries = {
	name: string;
	color: string;
	strokeWidth: number;
	points: LinePoint[];
	pathD: string;
	endPoint: EndPoint | null;
};

type LegendEntry = {
	label: string;
	color: string;
};

type LineChartLayout = {
	kind: "line";
	figsize: Figsize;
	padding: Padding;
	axis: AxisLayout;
	series: LineSeries[];
	legend: LegendEntry[];
};

type LineChartOptions = {
	figsize?: Figsize;
	padding?: Padding;
	maxTicks?: number;
	colors?: readonly string[];
	/** Stroke width for every line, or one per column. Defaults by point count. */
	strokeWidth?: number | readonly number[];
	/** Print the last value beside every line, or per column. */
	isAnnotated?: boolean | readonly boolean[];
	/** Join the points either side of a missing value instead of breaking the line. */
	isMissingDropped?: boolean;
	/** Stretch the value axis a little past zero. */
	isZeroIncluded?: boolean;
	/** Draw a line at zero when it falls inside the value axis. */
	isZeroLineShown?: boolean;
};

/** Lines over more points than this are drawn at normal width. */
const WIDE_LINE_MAX_POINTS = 24;
const END_POINT_GAP = 4;

/** SVG path data; a missing value ends a segment and the next point starts a new one. */
const buildPathD = ({
	points,
}: {
	points: readonly (LinePoint | null)[];
}): string => {
	const segments: string[] = [];
	let isPenDown = false;
	for (const p of points) {
		if (p === null) {
			isPenDown = false;
			continue;
		}
		segments.push(`${isPenDown ? "L" : "M"} ${p.x} ${p.y}`);
		isPenDown = true;
	}
	return segments.join(" ");
};

/** One column as a positioned line. */
const positionLine = ({
	column,
	index,
	scales,
	color,
	strokeWidth,
	isAnnotated,
	isMissingDropped,
}: {
	column: Column;
	index: readonly Period[];
	scales: AxisScales;
	color: string;
	strokeWidth: number;
	isAnnotated?: boolean;
	isMissingDropped?: boolean;
}): LineSeries => {
	const positioned = column.values.map((value, row) =>
		value === null || !Number.isFinite(value)
			? null
			: {
					x: scales.xOf(index[row]),
					y: scales.yOf(value),
					value,
				},
	);
	const points = positioned.filter((p): p is LinePoint => p !== null);
	const last = points[points.length - 1];
	return {
		name: column.name,
		color,
		strokeWidth,
		points,
		pathD: buildPathD({ points: isMissingDropped ? points : positioned }),
		endPoint:
			isAnnotated && last
				? {
						x: last.x + END_POINT_GAP,
						y: last.y,
						text: formatEndPoint({ value: last.value }),
					}
				: null,
	};
};

const useLineChartLayout = ({
	frame,
	...options
}: { frame: PeriodFrame } & LineChartOptions): LineChartLayout | null => {
	const figsize = options.figsize ?? getSetting("figsize");
	const padding = options.padding ?? DEFAULT_PADDING;
	const scales = useAxisLayout({
		frame,
		area: plotArea({ figsize, padding }),
		values: frameValues(frame),
		maxTicks: options.maxTicks ?? getSetting("maxTicks"),
		includeZero: options.isZeroIncluded,
		isZeroPadded: options.isZeroIncluded,
		isZeroLineShown: options.isZeroLineShown,
	});
	if (!scales) return null;

	const colors = options.colors ?? getColorList({ count: frame.columns.length });
	const defaultWidth =
		frame.index.length > WIDE_LINE_MAX_POINTS
			? getSetting("lineNormal")
			: getSetting("lineWide");
	const { strokeWidth, isAnnotated } = options;

	const series: LineSeries[] = frame.columns.map((column, c) =>
		positionLine({
			column,
			index: frame.index,
			scales,
			color: colors[c % colors.length],
			strokeWidth:
				(typeof strokeWidth === "number" ? strokeWidth : strokeWidth?.[c]) ??
				defaultWidth,
			isAnnotated:
				typeof isAnnotated === "boolean" ? isAnnotated : isAnnotated?.[c],
			isMissingDropped: options.isMissingDropped,
		}),
	);

	return {
		kind: "line",
		figsize,
		padding,
		axis: scales.layout,
		series,
		legend: series.map((s) => ({ label: s.name, color: s.color })),
	};
};

export { buildPathD, positionLine, useLineChartLayout };
export type {
	EndPoint,
	LegendEntry,
	LineChartLayout,
	LineChartOptions,
	LinePoint,
	LineSeries,
};
