/**
 * Finishing a chart: wrap it in a titled figure, render to SVG and
 * save it to the chart directory.
 */
import { mkdir, writeFile } from "fs/promises";
import type { FC } from "hono/jsx";
import { errAsync, ResultAsync } from "neverthrow";
import { join } from "path";
import { createLogger } from "@periodplot/core";
import { BarChart } from "../components/BarChart";
import { Figure } from "../components/Figure";
import { GrowthChart } from "../components/GrowthChart";
import { LineChart } from "../components/LineChart";
import { ChartError, toChartError } from "../utils/errors";
import type { Chart } from "./plots";
import { getSetting } from "./settings";
import { type FigureTexts, useFigureLayout } from "./svg/hooks";
import { chartFileName } from "./svg/text";

const log = createLogger("finalise");

type FinaliseOptions = FigureTexts & {
	/** Show the legend. Defaults to shown when there is more than one series. */
	legend?: boolean;
	/** Prefix for the file name. */
	preTag?: string;
	/** Suffix for the file name, after the title. */
	tag?: string;
	chartDir?: string;
	fileType?: string;
	/** Render only, write nothing. */
	dontSave?: boolean;
};

type Finalised = {
	svg: string;
	/** Where the chart was written, or null when not saved. */
	path: string | null;
};

const ChartBody: FC<{ chart: Chart }> = ({ chart }) => {
	switch (chart.kind) {
		case "line":
			return <LineChart layout={chart} />;
		case "bar":
			return <BarChart layout={chart} />;
		case "growth":
			return <GrowthChart layout={chart} />;
	}
};

const renderChart = async ({
	chart,
	...options
}: { chart: Chart } & FinaliseOptions): Promise<string> => {
	const figure = useFigureLayout({
		figsize: chart.figsize,
		padding: chart.padding,
		texts: options,
		legend: chart.legend,
		isLegendShown: options.legend ?? chart.legend.length > 1,
	});
	const element = (
		<Figure layout={figure}>
			<ChartBody chart={chart} />
		</Figure>
	);
	return (await element).toString();
};

const finalisePlot = ({
	chart,
	...options
}: { chart: Chart } & FinaliseOptions): ResultAsync<Finalised, ChartError> => {
	const fileType = (options.fileType ?? getSetting("fileType")).toLowerCase();
	if (!options.dontSave && fileType !== "svg") {
		return errAsync(
			new ChartError({
				message: `Cannot save a ${fileType} chart; only svg is supported`,
				code: "VALIDATION_ERROR",
			}),
		);
	}

	const rendered = ResultAsync.fromPromise(
		renderChart({ chart, ...options }),
		toChartError({ message: "Failed to render chart", code: "DATA_ERROR" }),
	);
	if (options.dontSave) {
		return rendered.map((svg) => ({ svg, path: null }));
	}

	const chartDir = options.chartDir ?? getSetting("chartDir");
	const path = join(
		chartDir,
		chartFileName({
			title: options.title ?? "",
			preTag: options.preTag ?? "",
			tag: options.tag ?? "",
			fileType,
		}),
	);
	return rendered.andThen((svg) =>
		ResultAsync.fromPromise(
			(async () => {
				await mkdir(chartDir, { recursive: true });
				await writeFile(path, svg, "utf-8");
				log.debug("saved %s", path);
				return { svg, path };
			})(),
			toChartError({ message: `Failed to write ${path}`, code: "IO_ERROR" }),
		),
	);
};

export { finalisePlot, renderChart };
export type { Finalised, FinaliseOptions };
