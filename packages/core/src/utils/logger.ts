import createDebug from "debug";

const BASE_NAMESPACE = "periodplot";

type Loggable = string | Error;

const toLine = (prefix: string, value: Loggable): string => {
	const message = typeof value === "string" ? value : value.message;
	return `${prefix}${message}\n`;
};

/**
 * Per-module logger. Each module names itself once at load
 * (`createLogger("ticks")`, `createLogger("csv")`, ...) and traces its
 * decisions through `debug`, shown with DEBUG=periodplot:ticks or
 * DEBUG=periodplot:*. Granularity choices, CSV parsing, cleared chart
 * directories and saved chart paths are traced this way.
 *
 * info, warn and error always print, to stderr: stdout carries only
 * what a command produces (tick tables, saved paths, an SVG document),
 * so it can be piped.
 */
function createLogger(namespace: string) {
	const debug = createDebug(`${BASE_NAMESPACE}:${namespace}`);

	return {
		debug,

		info(message: string) {
			process.stderr.write(toLine("", message));
		},

		/** A recoverable problem with the input, such as mixed period frequencies. */
		warn(value: Loggable) {
			process.stderr.write(toLine("Warning: ", value));
		},

		error(value: Loggable) {
			process.stderr.write(toLine("Error: ", value));
		},
	};
}

type Logger = ReturnType<typeof createLogger>;

export { createLogger, type Loggable, type Logger };
