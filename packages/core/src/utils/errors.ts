type PeriodErrorCode = "PARSE_ERROR" | "FREQUENCY_ERROR";

class PeriodError extends Error {
	readonly _tag = "PeriodError" as const;
	readonly code: PeriodErrorCode;

	constructor(opts: {
		message: string;
		code: PeriodErrorCode;
		cause?: unknown;
	}) {
		super(opts.message, { cause: opts.cause });
		this.name = "PeriodError";
		this.code = opts.code;
	}
}

const isPeriodError = (error: unknown): error is PeriodError => {
	return error instanceof PeriodError;
};

export { PeriodError, type PeriodErrorCode, isPeriodError };
