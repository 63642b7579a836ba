/**
 * Generic SVG JSX elements. These know nothing about charts --
 * they are thin wrappers that reduce attribute boilerplate.
 */
import type { FC } from "hono/jsx";

type RectProps = {
	x: number;
	y: number;
	width: number;
	height: number;
	fill: string;
	rx?: number;
	opacity?: number;
	stroke?: string;
};

const Rect: FC<RectProps> = ({ x, y, width, height, fill, rx, opacity, stroke }) => {
	return (
		<rect
			x={x}
			y={y}
			width={width}
			height={height}
			rx={rx}
			fill={fill}
			opacity={opacity}
			stroke={stroke}
		/>
	);
};

/**
 * A line segment with optional dash pattern and opacity.
 */
type LineProps = {
	x1: number;
	y1: number;
	x2: number;
	y2: number;
	stroke: string;
	strokeWidth?: number;
	strokeOpacity?: number;
	isDashed?: boolean;
	/** Custom dash pattern, e.g. "3,4". Only used when isDashed is true. */
	dashArray?: string;
};

const Line: FC<LineProps> = ({
	x1,
	y1,
	x2,
	y2,
	stroke,
	strokeWidth,
	strokeOpacity,
	isDashed,
	dashArray,
}) => {
	return (
		<line
			x1={x1}
			y1={y1}
			x2={x2}
			y2={y2}
			stroke={stroke}
			stroke-width={strokeWidth ?? 1}
			stroke-opacity={strokeOpacity}
			stroke-dasharray={isDashed ? (dashArray ?? "2,2") : undefined}
		/>
	);
};

/**
 * A text label. Newlines in the text become stacked lines, each
 * `lineHeight` font sizes below the previous one.
 */
type TextProps = {
	x: number;
	y: number;
	fill: string;
	children: string | number;
	fontSize?: number;
	anchor?: "start" | "middle" | "end";
	baseline?: "auto" | "middle" | "hanging";
	/** Degrees, around (x, y). */
	rotate?: number;
	isItalic?: boolean;
	isBold?: boolean;
	lineHeight?: number;
	/** Outline color drawn behind the glyphs, so text reads over bars. */
	halo?: string;
};

const Text: FC<TextProps> = ({
	x,
	y,
	fill,
	children,
	fontSize,
	anchor,
	baseline,
	rotate,
	isItalic,
	isBold,
	lineHeight,
	halo,
}) => {
	const size = fontSize ?? 10;
	const lines = String(children).split("\n");
	return (
		<text
			x={x}
			y={y}
			fill={fill}
			font-size={size}
			font-family="sans-serif"
			font-style={isItalic ? "italic" : undefined}
			font-weight={isBold ? "bold" : undefined}
			text-anchor={anchor}
			dominant-baseline={baseline}
			stroke={halo}
			stroke-width={halo ? 2 : undefined}
			paint-order={halo ? "stroke" : undefined}
			transform={rotate ? `rotate(${rotate} ${x} ${y})` : undefined}
		>
			{lines.length === 1
				? lines[0]
				: lines.map((line, i) => (
						<tspan x={x} dy={i === 0 ? 0 : size * (lineHeight ?? 1.2)}>
							{line}
						</tspan>
					))}
		</text>
	);
};

/**
 * An SVG path for drawing lines. Supports both stroke and optional fill.
 */
type PathProps = {
	d: string;
	stroke: string;
	strokeWidth?: number;
	strokeOpacity?: number;
	fill?: string;
	fillOpacity?: number;
};

const Path: FC<PathProps> = ({
	d,
	stroke,
	strokeWidth,
	strokeOpacity,
	fill,
	fillOpacity,
}) => {
	return (
		<path
			d={d}
			stroke={stroke}
			stroke-width={strokeWidth ?? 2}
			stroke-opacity={strokeOpacity}
			fill={fill ?? "none"}
			fill-opacity={fillOpacity}
			stroke-linejoin="round"
			stroke-linecap="round"
		/>
	);
};

export { Rect, Line, Text, Path };
export type { RectProps, LineProps, TextProps, PathProps };
