import { Period, parsePeriod, periodRange } from "../src/period";

/** Consecutive periods between two parseable period strings. */
const range = (start: string, end: string): Period[] =>
	periodRange(parsePeriod(start)._unsafeUnwrap(), parsePeriod(end)._unsafeUnwrap());

const periods = (...texts: string[]): Period[] =>
	texts.map((text) => parsePeriod(text)._unsafeUnwrap());

export { periods, range };
