#!/usr/bin/env tsx

import { createLogger } from "@periodplot/core";
import { Command, InvalidArgumentError } from "commander";
import { clear } from "./commands/clear";
import { plot } from "./commands/plot";
import { ticks } from "./commands/ticks";
import { wrapCommand } from "./utils/errors";

import packageJson from "../package.json";

const log = createLogger("cli");

function parsePositiveNumber(value: string): number {
	const parsed = Number(value);
	if (!Number.isFinite(parsed) || parsed <= 0) {
		throw new InvalidArgumentError("Expected a positive number.");
	}
	return parsed;
}

const program = new Command();

program
	.name("periodplot")
	.description("Label calendar period axes and chart period-indexed data")
	.version(packageJson.version);

program
	.command("ticks")
	.description("Print the tick positions and labels for a period range")
	.requiredOption("--start <period>", "First period, e.g. 2020-01 or 2020Q1")
	.requiredOption("--end <period>", "Last period")
	.option("--freq <code>", "Frequency to convert to (D, M, Q or Y)")
	.option("--max-ticks <n>", "Tick budget", parsePositiveNumber)
	.option("--json", "Output as JSON to stdout")
	.action(
		wrapCommand(
			(opts: {
				start: string;
				end: string;
				freq?: string;
				maxTicks?: number;
				json?: boolean;
			}) =>
				ticks({
					start: opts.start,
					end: opts.end,
					freq: opts.freq,
					maxTicks: opts.maxTicks,
					isJson: opts.json,
				}),
		),
	);

program
	.command("plot")
	.description("Chart every series of a CSV file against its period column")
	.argument("<csv>", "CSV file with a period column and numeric columns")
	.option("--kind <kind>", "line, bar, growth or seas-trend", "line")
	.option("--period-column <name>", "Column holding the periods (default: first)")
	.option("--column <name>", "Series to take growth of (default: first)")
	.option("--plot-from <period>", "First period shown on a growth chart")
	.option("--freq <code>", "Frequency to convert periods to (D, M, Q or Y)")
	.option("--title <text>", "Chart title, also used for the file name")
	.option("--xlabel <text>", "X axis label")
	.option("--ylabel <text>", "Y axis label")
	.option("--lheader <text>", "Top-left note")
	.option("--rheader <text>", "Top-right note")
	.option("--lfooter <text>", "Bottom-left note")
	.option("--rfooter <text>", "Bottom-right note")
	.option("--tag <text>", "File name suffix", "")
	.option("--pre-tag <text>", "File name prefix", "")
	.option("--chart-dir <dir>", "Directory to save the chart in")
	.option("--max-ticks <n>", "Tick budget", parsePositiveNumber)
	.option("--width <px>", "Figure width", parsePositiveNumber)
	.option("--height <px>", "Figure height", parsePositiveNumber)
	.option("--zero-y", "Stretch the value axis to include zero")
	.option("--y0", "Draw a line at zero")
	.option("--annotate", "Print the last value of each line")
	.option("--legend", "Always show the legend")
	.option("--dont-save", "Print the SVG to stdout instead of saving it")
	.action(
		wrapCommand(
			(
				csv: string,
				opts: {
					kind: string;
					periodColumn?: string;
					column?: string;
					plotFrom?: string;
					freq?: string;
					title?: string;
					xlabel?: string;
					ylabel?: string;
					lheader?: string;
					rheader?: string;
					lfooter?: string;
					rfooter?: string;
					tag: string;
					preTag: string;
					chartDir?: string;
					maxTicks?: number;
					width?: number;
					height?: number;
					zeroY?: boolean;
					y0?: boolean;
					annotate?: boolean;
					legend?: boolean;
					dontSave?: boolean;
				},
			) =>
				plot({
					csv,
					kind: opts.kind,
					periodColumn: opts.periodColumn,
					column: opts.column,
					plotFrom: opts.plotFrom,
					freq: opts.freq,
					title: opts.title,
					xlabel: opts.xlabel,
					ylabel: opts.ylabel,
					lheader: opts.lheader,
					rheader: opts.rheader,
					lfooter: opts.lfooter,
					rfooter: opts.rfooter,
					tag: opts.tag,
					preTag: opts.preTag,
					chartDir: opts.chartDir,
					maxTicks: opts.maxTicks,
					width: opts.width,
					height: opts.height,
					isZeroIncluded: opts.zeroY,
					isZeroLineShown: opts.y0,
					isAnnotated: opts.annotate,
					legend: opts.legend,
					dontSave: opts.dontSave,
				}),
		),
	);

program
	.command("clear")
	.description("Remove chart images from the chart directory")
	.option("--chart-dir <dir>", "Directory to clear")
	.action(
		wrapCommand((opts: { chartDir?: string }) =>
			clear({ chartDir: opts.chartDir }),
		),
	);

program.parseAsync().catch((error: unknown) => {
	log.error(error instanceof Error ? error : String(error));
	process.exit(1);
});
