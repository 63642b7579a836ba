import { getSetting } from "./settings";
import { spreadHues } from "./svg/colors";

/**
 * Colors for a number of series. Uses the settings table entry for
 * exactly that count when there is one, otherwise the first `count`
 * colors of the next larger entry, otherwise spread hues.
 */
const getColorList = ({ count }: { count: number }): string[] => {
	if (count <= 0) return [];
	const table = getSetting("colors");
	const exact = table[count];
	if (exact) return [...exact];

	const larger = Object.keys(table)
		.map(Number)
		.filter((size) => size > count)
		.sort((a, b) => a - b);
	if (larger.length > 0) return table[larger[0]].slice(0, count);

	return spreadHues({ count });
};

export { getColorList };
