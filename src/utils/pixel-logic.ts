export type Point = Readonly<{ x: number; y: number }>;

export type Region = Readonly<{
	x: number;
	y: number;
	width: number;
	height: number;
}>;

export const point = (x: number, y: number): Point => ({ x, y });

export const clamp = (v: number, min: number, max: number): number => {
	if (!Number.isFinite(v)) return min;
	return Math.max(min, Math.min(max, v));
};

export const clamp01 = (v: number): number => clamp(v, 0, 1);

export const fullRegion = (width: number, height: number): Region => ({
	x: 0,
	y: 0,
	width,
	height,
});

/** Intersection of a region with a `width x height` grid; empty when disjoint. */
export const clipRegion = (
	region: Region,
	width: number,
	height: number,
): Region => {
	const x0 = clamp(region.x, 0, width);
	const y0 = clamp(region.y, 0, height);
	const x1 = clamp(region.x + region.width, 0, width);
	const y1 = clamp(region.y + region.height, 0, height);
	return {
		x: x0,
		y: y0,
		width: Math.max(0, x1 - x0),
		height: Math.max(0, y1 - y0),
	};
};
