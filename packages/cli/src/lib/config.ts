/**
 * Config management for the periodplot CLI.
 * Global config: ~/.periodplot/config.json
 * Local (per-project) config: .periodplot/config.json (in the working directory)
 *
 * resolveConfig() checks local first, then falls back to global.
 */

import { readFile } from "fs/promises";
import { applySettings, type Settings } from "@periodplot/chart";
import { err, ok, okAsync, Result, ResultAsync } from "neverthrow";
import { join } from "path";
import { z } from "zod";
import { CliError, toCliError } from "../utils/errors";

const configSchema = z
	.object({
		chartDir: z.string().optional(),
		maxTicks: z.number().int().positive().optional(),
		fileType: z.string().min(1).optional(),
		figsize: z
			.object({
				width: z.number().positive(),
				height: z.number().positive(),
			})
			.optional(),
	})
	.strict();

type PeriodplotConfig = z.infer<typeof configSchema>;

const CONFIG_DIR_NAME = ".periodplot";
const CONFIG_FILE_NAME = "config.json";

function home(): string {
	return process.env.HOME || process.env.USERPROFILE || "/";
}

function getConfigDir(): string {
	return join(home(), CONFIG_DIR_NAME);
}

function getConfigPath(): string {
	return join(getConfigDir(), CONFIG_FILE_NAME);
}

function getLocalConfigPath(projectRoot: string): string {
	return join(projectRoot, CONFIG_DIR_NAME, CONFIG_FILE_NAME);
}

const isNotFound = (error: unknown): boolean =>
	error instanceof Error && "code" in error && error.code === "ENOENT";

const parseJson = (configPath: string) =>
	Result.fromThrowable(
		(text: string): unknown => JSON.parse(text),
		toCliError({
			message: `Config at ${configPath} is not valid JSON`,
			code: "PARSE_ERROR",
		}),
	);

function parseConfig(opts: {
	configPath: string;
	text: string;
}): Result<PeriodplotConfig, CliError> {
	return parseJson(opts.configPath)(opts.text).andThen(
		(raw): Result<PeriodplotConfig, CliError> => {
			const parsed = configSchema.safeParse(raw);
			if (parsed.success) return ok(parsed.data);
			const issues = parsed.error.issues
				.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
				.join("; ");
			return err(
				new CliError({
					message: `Invalid config at ${opts.configPath}: ${issues}`,
					code: "VALIDATION_ERROR",
				}),
			);
		},
	);
}

function readConfigFromPath(
	configPath: string,
): ResultAsync<PeriodplotConfig | null, CliError> {
	return ResultAsync.fromPromise(
		readFile(configPath, "utf-8").catch((error: unknown) => {
			if (isNotFound(error)) return null;
			throw error;
		}),
		toCliError({ message: "Failed to read config", code: "CONFIG_ERROR" }),
	).andThen((text) =>
		text === null
			? ok<PeriodplotConfig | null, CliError>(null)
			: parseConfig({ configPath, text }),
	);
}

/**
 * Read the global config from ~/.periodplot/config.json.
 */
function readConfig(): ResultAsync<PeriodplotConfig | null, CliError> {
	return readConfigFromPath(getConfigPath());
}

/**
 * Read the local (per-project) config from .periodplot/config.json.
 */
function readLocalConfig(
	projectRoot: string,
): ResultAsync<PeriodplotConfig | null, CliError> {
	return readConfigFromPath(getLocalConfigPath(projectRoot));
}

/**
 * Resolve config by checking local (per-project) first, then global.
 * Returns the first one found, or null if neither exists.
 */
function resolveConfig(
	projectRoot: string = process.cwd(),
): ResultAsync<PeriodplotConfig | null, CliError> {
	return readLocalConfig(projectRoot).andThen((localConfig) =>
		localConfig !== null
			? okAsync<PeriodplotConfig | null, CliError>(localConfig)
			: readConfig(),
	);
}

/** Make the config's values the chart settings defaults. */
function applyConfig(config: PeriodplotConfig | null): void {
	if (!config) return;
	const overrides: Partial<Settings> = {};
	if (config.chartDir !== undefined) overrides.chartDir = config.chartDir;
	if (config.maxTicks !== undefined) overrides.maxTicks = config.maxTicks;
	if (config.fileType !== undefined) overrides.fileType = config.fileType;
	if (config.figsize !== undefined) overrides.figsize = config.figsize;
	applySettings(overrides);
}

export {
	applyConfig,
	configSchema,
	getConfigDir,
	getConfigPath,
	getLocalConfigPath,
	parseConfig,
	readConfig,
	readLocalConfig,
	resolveConfig,
};
export type { PeriodplotConfig };
