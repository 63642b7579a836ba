import type { FC } from "hono/jsx";
import type { BarChartLayout } from "../lib/svg/hooks";
import { Rect } from "../lib/svg/primitives";
import { Axes } from "./Axes";

type BarChartProps = {
	layout: BarChartLayout;
};

const BarChart: FC<BarChartProps> = ({ layout }) => {
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
		</g>
	);
};

export { BarChart };
export type { BarChartProps };
