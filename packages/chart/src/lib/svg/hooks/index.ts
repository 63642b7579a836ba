export {
	type AxisLayout,
	type AxisScales,
	DEFAULT_PADDING,
	type GridLine,
	type Padding,
	type PlotArea,
	plotArea,
	useAxisLayout,
	type XTick,
} from "./useAxisLayout";
export {
	type Bar,
	type BarChartLayout,
	type BarChartOptions,
	positionBars,
	useBarChartLayout,
} from "./useBarChartLayout";
export {
	type BarLabel,
	type GrowthChartLayout,
	type GrowthChartOptions,
	useGrowthChartLayout,
} from "./useGrowthChartLayout";
export {
	buildPathD,
	type EndPoint,
	type LegendEntry,
	type LineChartLayout,
	type LineChartOptions,
	type LinePoint,
	type LineSeries,
	positionLine,
	useLineChartLayout,
} from "./useLineChartLayout";
export {
	type FigureLayout,
	type FigureTexts,
	type PlacedLegendEntry,
	type PlacedText,
	useFigureLayout,
} from "./useFigureLayout";
