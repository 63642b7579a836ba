import type { FC, PropsWithChildren } from "hono/jsx";
import type { FigureLayout } from "../lib/svg/hooks";
import { Line, Rect, Text } from "../lib/svg/primitives";

type FigureProps = {
	layout: FigureLayout;
};

/**
 * The outer <svg>: background, titles, corner notes and legend, with
 * the chart drawn inside.
 */
const Figure: FC<PropsWithChildren<FigureProps>> = ({ layout, children }) => {
	const { title, xlabel, ylabel } = layout;
	return (
		<svg
			xmlns="http://www.w3.org/2000/svg"
			width={layout.width}
			height={layout.height}
			viewBox={`0 0 ${layout.width} ${layout.height}`}
		>
			<Rect
				x={0}
				y={0}
				width={layout.width}
				height={layout.height}
				fill={layout.background}
			/>

			{title && (
				<Text
					x={title.x}
					y={title.y}
					fill={layout.textColor}
					fontSize={16}
					anchor={title.anchor}
					baseline="middle"
					isBold
				>
					{title.text}
				</Text>
			)}

			{children}

			{xlabel && (
				<Text
					x={xlabel.x}
					y={xlabel.y}
					fill={layout.textColor}
					fontSize={11}
					anchor={xlabel.anchor}
				>
					{xlabel.text}
				</Text>
			)}
			{ylabel && (
				<Text
					x={ylabel.x}
					y={ylabel.y}
					fill={layout.textColor}
					fontSize={11}
					anchor={ylabel.anchor}
					rotate={ylabel.rotate}
				>
					{ylabel.text}
				</Text>
			)}

			{/* Corner notes */}
			{layout.notes.map((note) => (
				<Text
					x={note.x}
					y={note.y}
					fill={layout.noteColor}
					fontSize={8}
					anchor={note.anchor}
					isItalic
				>
					{note.text}
				</Text>
			))}

			{/* Legend */}
			{layout.legend.map((entry) => (
				<>
					<Line
						x1={entry.x}
						y1={entry.y}
						x2={entry.x + entry.swatchWidth}
						y2={entry.y}
						stroke={entry.color}
						strokeWidth={3}
					/>
					<Text
						x={entry.x + entry.swatchWidth + 4}
						y={entry.y}
						fill={layout.textColor}
						fontSize={10}
						baseline="middle"
					>
						{entry.label}
					</Text>
				</>
			))}
		</svg>
	);
};

export { Figure };
export type { FigureProps };
