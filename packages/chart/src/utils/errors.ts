type ChartErrorCode = "DATA_ERROR" | "VALIDATION_ERROR" | "IO_ERROR";

class ChartError extends Error {
	readonly _tag = "ChartError" as const;
	readonly code: ChartErrorCode;

	constructor(opts: { message: string; code: ChartErrorCode; cause?: unknown }) {
		super(opts.message, { cause: opts.cause });
		this.name = "ChartError";
		this.code = opts.code;
	}
}

const isChartError = (error: unknown): error is ChartError => {
	return error instanceof ChartError;
};

/**
 * Creates an error handler for ResultAsync.fromPromise that wraps
 * the caught value into a ChartError.
 */
const toChartError =
	(opts: { message: string; code: ChartErrorCode }) =>
	(cause: unknown): ChartError =>
		new ChartError({ ...opts, cause });

export { ChartError, type ChartErrorCode, isChartError, toChartError };
