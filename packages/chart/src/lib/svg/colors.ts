/**
 * Color palettes for SVG charts.
 */
const zinc = {
	950: "#0a0a0b",
	900: "#18181b",
	800: "#27272a",
	700: "#3f3f46",
	600: "#52525b",
	500: "#71717a",
	400: "#a1a1aa",
	200: "#e4e4e7",
	100: "#f4f4f5",
} as const;

const palette = {
	blue: "#2563eb",
	amber: "#d97706",
	emerald: "#059669",
	rose: "#e11d48",
	purple: "#9333ea",
	cyan: "#0891b2",
	pink: "#db2777",
	orange: "#ea580c",
} as const;

/** Evenly spaced hues, for more series than the color table covers. */
const spreadHues = ({ count }: { count: number }): string[] =>
	Array.from(
		{ length: count },
		(_, i) => `hsl(${Math.round((i * 360) / count)}, 65%, 45%)`,
	);

export { zinc, palette, spreadHues };
