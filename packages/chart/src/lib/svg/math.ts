/**
 * Pure math for chart layout: value ticks and value/tick-to-pixel mapping.
 */

/**
 * Human-readable tick values covering [min, max], stepped by 1, 2 or 5
 * times a power of ten.
 */
const niceTicks = ({
	min,
	max,
	target,
}: {
	min: number;
	max: number;
	target: number;
}): number[] => {
	if (min === max) return [min];

	const roughStep = (max - min) / Math.max(target, 1);
	const magnitude = 10 ** Math.floor(Math.log10(roughStep));
	const normalized = roughStep / magnitude;

	let step: number;
	if (normalized <= 1.5) step = magnitude;
	else if (normalized <= 3.5) step = 2 * magnitude;
	else if (normalized <= 7.5) step = 5 * magnitude;
	else step = 10 * magnitude;

	const niceMin = Math.floor(min / step) * step;
	const niceMax = Math.ceil(max / step) * step;

	const ticks: number[] = [];
	for (let v = niceMin; v <= niceMax + step * 0.5; v += step) {
		ticks.push(Math.round(v * 1e10) / 1e10);
	}
	return ticks;
};

type ValueAxis = {
	min: number;
	max: number;
	ticks: number[];
};

/** Share of the value range kept clear beyond zero by a padded axis. */
const ZERO_PAD = 0.02;

/**
 * Value axis for a set of data values: the nice ticks spanning the
 * finite values, widened to include zero when asked. A padded axis also
 * reaches a little past zero, so zero lies strictly inside it. An axis
 * with no finite values runs from 0 to 1.
 */
const valueAxis = ({
	values,
	includeZero,
	isZeroPadded,
	target = 5,
}: {
	values: readonly (number | null)[];
	includeZero?: boolean;
	isZeroPadded?: boolean;
	target?: number;
}): ValueAxis => {
	const finite = values.filter(
		(v): v is number => v !== null && Number.isFinite(v),
	);
	let low = finite.length > 0 ? Math.min(...finite) : 0;
	let high = finite.length > 0 ? Math.max(...finite) : 1;
	if (includeZero) {
		low = Math.min(low, 0);
		high = Math.max(high, 0);
	}
	if (isZeroPadded) {
		const pad = (high - low) * ZERO_PAD;
		if (low > -pad) low = -pad;
		if (high < pad) high = pad;
	}
	if (low === high) {
		if (low === 0) {
			high = 1;
		} else {
			const pad = Math.abs(low) * 0.1;
			low -= pad;
			high += pad;
		}
	}
	const ticks = niceTicks({ min: low, max: high, target });
	return { min: ticks[0], max: ticks[ticks.length - 1], ticks };
};

/** Y pixel for a value. min -> bottom edge, max -> top edge. */
const yFromValue = ({
	value,
	min,
	max,
	top,
	height,
}: {
	value: number;
	min: number;
	max: number;
	top: number;
	height: number;
}): number => {
	if (max === min) return top + height / 2;
	return top + height - ((value - min) / (max - min)) * height;
};

/**
 * X pixel for a period tick. The axis holds `span + 1` equal slots,
 * one per period of the complete range, and each tick sits in the
 * middle of its slot.
 */
const xFromTick = ({
	tick,
	span,
	left,
	width,
}: {
	tick: number;
	span: number;
	left: number;
	width: number;
}): number => left + ((tick + 0.5) / (span + 1)) * width;

/** Pixel width of one period slot. */
const slotWidth = ({ span, width }: { span: number; width: number }): number =>
	width / (span + 1);

export { niceTicks, valueAxis, xFromTick, yFromValue, slotWidth };
export type { ValueAxis };
