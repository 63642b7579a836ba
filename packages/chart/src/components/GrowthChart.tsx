import type { FC } from "hono/jsx";
import type { GrowthChartLayout } from "../lib/svg/hooks";
import { Path, Rect, Text } from "../lib/svg/primitives";
import { Axes } from "./Axes";

type GrowthChartProps = {
	layout: GrowthChartLayout;
};

const GrowthChart: FC<GrowthChartProps> = ({ layout }) => {
	const { line } = layout;
	return (
		<g>
			<Axes axis={layout.axis} />

			{layout.bars.map((bar) => (
				<Rect
					x={bar.x}
					y={bar.y}
					width={bar.width}
					height={bar.height}
					fill={bar.fill}
				/>
			))}

			{layout.barLabels.map((label) => (
				<Text
					x={label.x}
					y={label.y}
					fill="#ffffff"
					fontSize={8}
					anchor="middle"
					baseline={label.baseline}
					halo={label.halo}
				>
					{label.text}
				</Text>
			))}

			<Path d={line.pathD} stroke={line.color} strokeWidth={line.strokeWidth} />
			{line.endPoint ? (
				<Text
					x={line.endPoint.x}
					y={line.endPoint.y}
					fill={line.color}
					fontSize={9}
					anchor="start"
					baseline="middle"
				>
					{line.endPoint.text}
				</Text>
			) : null}
		</g>
	);
};

export { GrowthChart };
export type { GrowthChartProps };
