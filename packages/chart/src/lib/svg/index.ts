/**
 * Server-side SVG chart library.
 *
 * Pure utilities for building SVG charts rendered as Hono JSX.
 *
 * @module
 *
 * **colors** -- Palettes and hue spreading for many series.
 *
 * **math** -- Nice value ticks, value-to-pixel and period-to-pixel mapping.
 *
 * **text** -- Label formatting and chart file names.
 *
 * **primitives** -- Generic SVG JSX elements (Rect, Line, Text, Path).
 *
 * **hooks/** -- Layout functions that compute all chart positions and sizes.
 */

export { palette, spreadHues, zinc } from "./colors";
export * from "./hooks";
export {
	niceTicks,
	slotWidth,
	type ValueAxis,
	valueAxis,
	xFromTick,
	yFromValue,
} from "./math";
export type {
	LineProps,
	PathProps,
	RectProps,
	TextProps,
} from "./primitives";
export { Line, Path, Rect, Text } from "./primitives";
export {
	chartFileName,
	fileTitle,
	formatEndPoint,
	formatGridValue,
} from "./text";
