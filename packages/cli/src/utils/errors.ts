import type { ChartError } from "@periodplot/chart";
import { createLogger } from "@periodplot/core";
import type { ResultAsync } from "neverthrow";

const log = createLogger("cli");

type CliErrorCode =
	| "CONFIG_ERROR"
	| "IO_ERROR"
	| "PARSE_ERROR"
	| "VALIDATION_ERROR"
	| "CHART_ERROR";

class CliError extends Error {
	readonly _tag = "CliError" as const;
	readonly code: CliErrorCode;

	constructor(opts: { message: string; code: CliErrorCode; cause?: unknown }) {
		super(opts.message, { cause: opts.cause });
		this.name = "CliError";
		this.code = opts.code;
	}
}

const isCliError = (error: unknown): error is CliError => {
	return error instanceof CliError;
};

/**
 * Creates an error handler for ResultAsync.fromPromise that wraps
 * the caught value into a CliError.
 */
const toCliError =
	(opts: { message: string; code: CliErrorCode }) =>
	(cause: unknown): CliError =>
		new CliError({ ...opts, cause });

/** Chart failures keep their message; the chart code is folded into CHART_ERROR. */
const fromChartError = (error: ChartError): CliError =>
	new CliError({ message: error.message, code: "CHART_ERROR", cause: error });

type CommandFn = (...args: never[]) => ResultAsync<void, CliError>;

// Wraps a command that returns ResultAsync<void, CliError> with consistent error handling.
// On Err, prints to stderr and exits with the given code.
function wrapCommand<T extends CommandFn>(
	fn: T,
	opts?: { exitCode?: number },
): (...args: Parameters<T>) => Promise<void> {
	const exitCode = opts?.exitCode ?? 1;
	return async (...args: Parameters<T>) => {
		const result = await fn(...args);
		if (result.isErr()) {
			log.error(result.error);
			process.exit(exitCode);
		}
	};
}

export {
	CliError,
	type CliErrorCode,
	fromChartError,
	isCliError,
	toCliError,
	wrapCommand,
};
