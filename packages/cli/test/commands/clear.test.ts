import { readdir, rm, writeFile } from "fs/promises";
import { join } from "path";
import { resetSettings } from "@periodplot/chart";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { clear } from "../../src/commands/clear";
import { captureStream, makeTempProject } from "../helpers";

let project: string;

beforeEach(async () => {
	project = await makeTempProject();
});

afterEach(async () => {
	vi.restoreAllMocks();
	vi.unstubAllEnvs();
	resetSettings();
	await rm(project, { recursive: true, force: true });
});

describe("clear", () => {
	it("removes chart images and reports the count", async () => {
		await writeFile(join(project, "a.svg"), "<svg/>");
		await writeFile(join(project, "b.svg"), "<svg/>");
		await writeFile(join(project, "data.csv"), "period,x\n");
		const stderr = captureStream(process.stderr);

		const result = await clear({ chartDir: project, projectRoot: project });
		expect(result.isOk()).toBe(true);
		expect(stderr.text()).toBe(`Removed 2 charts from ${project}.\n`);
		expect(await readdir(project)).toEqual(["data.csv"]);
	});

	it("says so when there is nothing to clear", async () => {
		const stderr = captureStream(process.stderr);
		await clear({ chartDir: project, projectRoot: project });
		expect(stderr.text()).toBe(`No charts to clear in ${project}.\n`);
	});

	it("fails on a missing directory", async () => {
		const result = await clear({
			chartDir: join(project, "missing"),
			projectRoot: project,
		});
		expect(result._unsafeUnwrapErr().code).toBe("CHART_ERROR");
	});
});
