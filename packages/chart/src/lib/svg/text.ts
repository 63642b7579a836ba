/**
 * Text formatting helpers for chart labels and file names.
 */

const MAX_TITLE_LENGTH = 150;

/** Value printed beside the last point of a line: fewer decimals for bigger numbers. */
const formatEndPoint = ({ value }: { value: number }): string => {
	const magnitude = Math.abs(value);
	const digits = magnitude >= 100 ? 0 : magnitude >= 10 ? 1 : 2;
	return value.toFixed(digits);
};

/** Y-axis grid label. */
const formatGridValue = ({ value }: { value: number }): string =>
	String(Math.round(value * 1e10) / 1e10);

/** "Retail Sales (% change)" -> "retail-sales-change-" */
const fileTitle = ({ title }: { title: string }): string =>
	title
		.slice(0, MAX_TITLE_LENGTH)
		.replace(/[^0-9A-Za-z]/g, "-")
		.toLowerCase()
		.replace(/-+/g, "-");

/** "<preTag><title>-<tag>.<fileType>" */
const chartFileName = ({
	title,
	preTag,
	tag,
	fileType,
}: {
	title: string;
	preTag: string;
	tag: string;
	fileType: string;
}): string =>
	`${preTag}${fileTitle({ title })}-${tag}.${fileType.toLowerCase()}`;

export { chartFileName, fileTitle, formatEndPoint, formatGridValue };
