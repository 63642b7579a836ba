import { type Period, parsePeriod } from "@periodplot/core";

const periods = (...texts: string[]): Period[] =>
	texts.map((text) => parsePeriod(text)._unsafeUnwrap());

const NO_PADDING = { top: 0, right: 0, bottom: 0, left: 0 };

/** 40 x 100 pixels, so four monthly slots are 10 pixels wide. */
const SMALL_FIGURE = { width: 40, height: 100 };

export { NO_PADDING, periods, SMALL_FIGURE };
