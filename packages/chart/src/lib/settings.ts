/**
 * Process-wide chart settings. Plot and finalise options fall back to
 * these when a value is not given per chart.
 *
 * setChartDir() creates the directory it is given; clearChartDir()
 * removes image files from the current one.
 */
import { mkdir, readdir, unlink } from "fs/promises";
import { ResultAsync } from "neverthrow";
import { extname, join } from "path";
import { createLogger } from "@periodplot/core";
import { palette, zinc } from "./svg/colors";
import type { ChartError } from "../utils/errors";
import { toChartError } from "../utils/errors";

const log = createLogger("settings");

type Figsize = { width: number; height: number };

type Settings = {
	fileType: string;
	/** Figure size in pixels. */
	figsize: Figsize;
	lineNormal: number;
	lineWide: number;
	maxTicks: number;
	/** Color lists keyed by series count, used by getColorList(). */
	colors: Readonly<Record<number, readonly string[]>>;
	chartDir: string;
};

const DEFAULT_SETTINGS: Readonly<Settings> = {
	fileType: "svg",
	figsize: { width: 900, height: 450 },
	lineNormal: 1.5,
	lineWide: 2.5,
	maxTicks: 10,
	colors: {
		1: [palette.rose],
		5: [palette.blue, palette.orange, palette.emerald, palette.rose, zinc[500]],
		9: [
			palette.blue,
			palette.orange,
			palette.emerald,
			palette.rose,
			palette.purple,
			palette.amber,
			palette.pink,
			palette.cyan,
			zinc[500],
		],
	},
	chartDir: ".",
};

const IMAGE_EXTENSIONS = new Set([".svg", ".png", ".jpg", ".jpeg"]);

let current: Settings = { ...DEFAULT_SETTINGS };

function getSetting<K extends keyof Settings>(key: K): Settings[K] {
	return current[key];
}

function setSetting<K extends keyof Settings>(key: K, value: Settings[K]): void {
	current = { ...current };
	current[key] = value;
}

function applySettings(overrides: Partial<Settings>): void {
	current = { ...current, ...overrides };
}

function resetSettings(): void {
	current = { ...DEFAULT_SETTINGS };
}

/**
 * Set the directory charts are saved to, creating it if needed.
 * An empty string means the working directory.
 */
function setChartDir(chartDir: string): ResultAsync<string, ChartError> {
	const dir = chartDir || ".";
	return ResultAsync.fromPromise(
		mkdir(dir, { recursive: true }),
		toChartError({
			message: `Failed to create chart directory ${dir}`,
			code: "IO_ERROR",
		}),
	).map(() => {
		setSetting("chartDir", dir);
		return dir;
	});
}

/**
 * Remove image files from the chart directory. Returns how many were
 * removed.
 */
function clearChartDir(): ResultAsync<number, ChartError> {
	const dir = getSetting("chartDir");
	return ResultAsync.fromPromise(
		(async () => {
			const entries = await readdir(dir, { withFileTypes: true });
			const images = entries.filter(
				(entry) =>
					entry.isFile() &&
					IMAGE_EXTENSIONS.has(extname(entry.name).toLowerCase()),
			);
			await Promise.all(images.map((entry) => unlink(join(dir, entry.name))));
			log.debug("removed %d images from %s", images.length, dir);
			return images.length;
		})(),
		toChartError({
			message: `Failed to clear chart directory ${dir}`,
			code: "IO_ERROR",
		}),
	);
}

export {
	DEFAULT_SETTINGS,
	applySettings,
	clearChartDir,
	getSetting,
	resetSettings,
	setChartDir,
	setSetting,
};
export type { Figsize, Settings };
