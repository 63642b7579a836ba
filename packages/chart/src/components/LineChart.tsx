import type { FC } from "hono/jsx";
import type { LineChartLayout } from "../lib/svg/hooks";
import { Path, Text } from "../lib/svg/primitives";
import { Axes } from "./Axes";

type LineChartProps = {
	layout: LineChartLayout;
};

const LineChart: FC<LineChartProps> = ({ layout }) => {
	return (
		<g>
			<Axes axis={layout.axis} />

			{/* Lines */}
			{layout.series.map((s) => (
				<Path d={s.pathD} stroke={s.color} strokeWidth={s.strokeWidth} />
			))}

			{/* End-point annotations */}
			{layout.series.map((s) =>
				s.endPoint ? (
					<Text
						x={s.endPoint.x}
						y={s.endPoint.y}
						fill={s.color}
						fontSize={9}
						anchor="start"
						baseline="middle"
					>
						{s.endPoint.text}
					</Text>
				) : null,
			)}
		</g>
	);
};

export { LineChart };
export type { LineChartProps };
