/**
 * Places the figure furniture around a chart: title, axis labels, the
 * four corner notes and the legend.
 */
import type { Figsize } from "../../settings";
import { zinc } from "../colors";
import type { Padding } from "./useAxisLayout";
import type { LegendEntry } from "./useLineChartLayout";

type FigureTexts = {
	title?: string;
	xlabel?: string;
	ylabel?: string;
	/** Top-left corner note. */
	lheader?: string;
	rheader?: string;
	/** Bottom-left corner note, usually the source. */
	lfooter?: string;
	rfooter?: string;
};

type PlacedText = {
	x: number;
	y: number;
	text: string;
	anchor: "start" | "middle" | "end";
	rotate?: number;
};

type PlacedLegendEntry = LegendEntry & {
	x: number;
	y: number;
	swatchWidth: number;
};

type FigureLayout = {
	width: number;
	height: number;
	background: string;
	textColor: string;
	noteColor: string;
	title: PlacedText | null;
	xlabel: PlacedText | null;
	ylabel: PlacedText | null;
	notes: PlacedText[];
	legend: PlacedLegendEntry[];
};

const EDGE = 8;
const LEGEND_ROW = 14;
const SWATCH_WIDTH = 14;

const place = (
	text: string | undefined,
	at: Omit<PlacedText, "text">,
): PlacedText | null => (text ? { ...at, text } : null);

const useFigureLayout = ({
	figsize,
	padding,
	texts,
	legend,
	isLegendShown,
}: {
	figsize: Figsize;
	padding: Padding;
	texts: FigureTexts;
	legend: readonly LegendEntry[];
	isLegendShown: boolean;
}): FigureLayout => {
	const { width, height } = figsize;
	const plotMiddleX = padding.left + (width - padding.left - padding.right) / 2;
	const plotMiddleY = padding.top + (height - padding.top - padding.bottom) / 2;

	const notes = [
		place(texts.lheader, { x: EDGE, y: EDGE + 4, anchor: "start" }),
		place(texts.rheader, { x: width - EDGE, y: EDGE + 4, anchor: "end" }),
		place(texts.lfooter, { x: EDGE, y: height - EDGE, anchor: "start" }),
		place(texts.rfooter, { x: width - EDGE, y: height - EDGE, anchor: "end" }),
	].filter((note): note is PlacedText => note !== null);

	return {
		width,
		height,
		background: "#ffffff",
		textColor: zinc[900],
		noteColor: zinc[500],
		title: place(texts.title, {
			x: width / 2,
			y: padding.top / 2,
			anchor: "middle",
		}),
		xlabel: place(texts.xlabel, {
			x: plotMiddleX,
			y: height - EDGE - 14,
			anchor: "middle",
		}),
		ylabel: place(texts.ylabel, {
			x: EDGE + 8,
			y: plotMiddleY,
			anchor: "middle",
			rotate: -90,
		}),
		notes,
		legend: isLegendShown
			? legend.map((entry, i) => ({
					...entry,
					x: padding.left + EDGE,
					y: padding.top + EDGE + i * LEGEND_ROW,
					swatchWidth: SWATCH_WIDTH,
				}))
			: [],
	};
};

export { useFigureLayout };
export type { FigureLayout, FigureTexts, PlacedLegendEntry, PlacedText };
