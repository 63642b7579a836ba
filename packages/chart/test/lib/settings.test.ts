import { mkdtemp, readdir, rm, stat, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	applySettings,
	clearChartDir,
	DEFAULT_SETTINGS,
	getSetting,
	resetSettings,
	setChartDir,
	setSetting,
} from "../../src/lib/settings";

let dir: string;

beforeEach(async () => {
	dir = await mkdtemp(join(tmpdir(), "periodplot-settings-"));
});

afterEach(async () => {
	resetSettings();
	await rm(dir, { recursive: true, force: true });
});

describe("settings", () => {
	it("starts from the defaults", () => {
		expect(getSetting("fileType")).toBe("svg");
		expect(getSetting("figsize")).toEqual({ width: 900, height: 450 });
		expect(getSetting("maxTicks")).toBe(10);
		expect(getSetting("chartDir")).toBe(".");
	});

	it("sets one value", () => {
		setSetting("maxTicks", 6);
		expect(getSetting("maxTicks")).toBe(6);
		expect(DEFAULT_SETTINGS.maxTicks).toBe(10);
	});

	it("applies several values and resets them", () => {
		applySettings({ lineWide: 4, fileType: "png" });
		expect(getSetting("lineWide")).toBe(4);
		expect(getSetting("fileType")).toBe("png");
		resetSettings();
		expect(getSetting("lineWide")).toBe(2.5);
	});
});

describe("setChartDir", () => {
	it("creates the directory and remembers it", async () => {
		const target = join(dir, "charts", "nested");
		const result = await setChartDir(target);
		expect(result.isOk()).toBe(true);
		expect(getSetting("chartDir")).toBe(target);
		expect((await stat(target)).isDirectory()).toBe(true);
	});
});

describe("clearChartDir", () => {
	it("removes image files only", async () => {
		await writeFile(join(dir, "a.svg"), "<svg/>");
		await writeFile(join(dir, "b.PNG"), "");
		await writeFile(join(dir, "notes.txt"), "keep");
		setSetting("chartDir", dir);

		const result = await clearChartDir();
		expect(result._unsafeUnwrap()).toBe(2);
		expect(await readdir(dir)).toEqual(["notes.txt"]);
	});

	it("fails on a missing directory", async () => {
		setSetting("chartDir", join(dir, "missing"));
		const result = await clearChartDir();
		expect(result._unsafeUnwrapErr().code).toBe("IO_ERROR");
	});
});
