export { BarChart, type BarChartProps } from "./components/BarChart";
export { Figure, type FigureProps } from "./components/Figure";
export { GrowthChart, type GrowthChartProps } from "./components/GrowthChart";
export { LineChart, type LineChartProps } from "./components/LineChart";
export { getColorList } from "./lib/color-list";
export {
	type Finalised,
	type FinaliseOptions,
	finalisePlot,
	renderChart,
} from "./lib/finalise";
export { type Column, createFrame, frameValues, type PeriodFrame } from "./lib/frame";
export {
	ANNUAL_GROWTH,
	calcGrowth,
	GROWTH_FREQUENCIES,
	type Growth,
	type GrowthFrequency,
	growthFrom,
} from "./lib/growth";
export {
	barPlot,
	type Chart,
	GROWTH_YLABEL,
	growthPlot,
	growthPlotFromFrame,
	type GrowthPlotOptions,
	linePlot,
	seasTrendPlot,
} from "./lib/plots";
export {
	applySettings,
	clearChartDir,
	DEFAULT_SETTINGS,
	type Figsize,
	getSetting,
	resetSettings,
	type Settings,
	setChartDir,
	setSetting,
} from "./lib/settings";
export * from "./lib/svg";
export {
	ChartError,
	type ChartErrorCode,
	isChartError,
	toChartError,
} from "./utils/errors";
