import type { FC } from "hono/jsx";
import type { AxisLayout } from "../lib/svg/hooks";
import { Line, Text } from "../lib/svg/primitives";

type AxesProps = {
	axis: AxisLayout;
};

const TICK_LENGTH = 4;

/**
 * Value grid, period ticks and the x baseline. Drawn beneath the series.
 */
const Axes: FC<AxesProps> = ({ axis }) => {
	const { area } = axis;
	const bottom = area.top + area.height;
	return (
		<g>
			{/* Grid lines */}
			{axis.gridLines.map((gl) => (
				<>
					<Line
						x1={area.left}
						y1={gl.y}
						x2={area.left + area.width}
						y2={gl.y}
						stroke={axis.gridLineColor}
					/>
					<Text
						x={area.left - 6}
						y={gl.y}
						fill={axis.labelColor}
						fontSize={10}
						anchor="end"
						baseline="middle"
					>
						{gl.text}
					</Text>
				</>
			))}

			{axis.zeroLineY !== null && (
				<Line
					x1={area.left}
					y1={axis.zeroLineY}
					x2={area.left + area.width}
					y2={axis.zeroLineY}
					stroke={axis.axisColor}
					isDashed
				/>
			)}

			<Line
				x1={area.left}
				y1={bottom}
				x2={area.left + area.width}
				y2={bottom}
				stroke={axis.axisColor}
			/>

			{/* X ticks */}
			{axis.xTicks.map((tick) => (
				<>
					<Line
						x1={tick.x}
						y1={bottom}
						x2={tick.x}
						y2={bottom + TICK_LENGTH}
						stroke={axis.axisColor}
					/>
					<Text
						x={tick.x}
						y={bottom + TICK_LENGTH + 10}
						fill={axis.labelColor}
						fontSize={10}
						anchor="middle"
					>
						{tick.text}
					</Text>
				</>
			))}
		</g>
	);
};

export { Axes };
export type { AxesProps };
