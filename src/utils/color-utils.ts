export type ColorModel = "gray" | "rgb" | "rgba" | "hsv" | "xyz";

export const CHANNEL_COUNT: Readonly<Record<ColorModel, number>> = {
	gray: 1,
	rgb: 3,
	rgba: 4,
	hsv: 3,
	xyz: 3,
};

/** Index of the alpha channel, or -1 for models without one. */
export const alphaIndex = (model: ColorModel): number =>
	model === "rgba" ? 3 : -1;

// Luma weights shared by rgb -> gray conversion and the grayscale filter
export const LUMA_R = 0.21;
export const LUMA_G = 0.72;
export const LUMA_B = 0.07;

export const luma = (r: number, g: number, b: number): number =>
	LUMA_R * r + LUMA_G * g + LUMA_B * b;

const srgbToLinear = (c: number): number =>
	c > 0.04045 ? ((c + 0.055) / 1.055) ** 2.4 : c / 12.92;

const linearToSrgb = (c: number): number =>
	c > 0.0031308 ? 1.055 * c ** (1 / 2.4) - 0.055 : 12.92 * c;

/** sRGB (D65) to CIE XYZ, with Y = 1 for white. */
const rgbToXyz = (r: number, g: number, b: number): [number, number, number] => {
	const R = srgbToLinear(r);
	const G = srgbToLinear(g);
	const B = srgbToLinear(b);
	return [
		R * 0.4124 + G * 0.3576 + B * 0.1805,
		R * 0.2126 + G * 0.7152 + B * 0.0722,
		R * 0.0193 + G * 0.1192 + B * 0.9505,
	];
};

const xyzToRgb = (x: number, y: number, z: number): [number, number, number] => [
	linearToSrgb(x * 3.2406 - y * 1.5372 - z * 0.4986),
	linearToSrgb(-x * 0.9689 + y * 1.8758 + z * 0.0415),
	linearToSrgb(x * 0.0557 - y * 0.204 + z * 1.057),
];

/** Hue, saturation and value all in [0, 1]. */
export const rgbToHsv = (
	r: number,
	g: number,
	b: number,
): [number, number, number] => {
	const max = Math.max(r, g, b);
	const min = Math.min(r, g, b);
	const d = max - min;
	const s = max === 0 ? 0 : d / max;
	let h = 0;
	if (d !== 0) {
		if (max === r) h = ((g - b) / d + (g < b ? 6 : 0)) / 6;
		else if (max === g) h = ((b - r) / d + 2) / 6;
		else h = ((r - g) / d + 4) / 6;
	}
	return [h, s, max];
};

export const hsvToRgb = (
	h: number,
	s: number,
	v: number,
): [number, number, number] => {
	const i = Math.floor(h * 6);
	const f = h * 6 - i;
	const p = v * (1 - s);
	const q = v * (1 - f * s);
	const t = v * (1 - (1 - f) * s);
	switch (((i % 6) + 6) % 6) {
		case 0:
			return [v, t, p];
		case 1:
			return [q, v, p];
		case 2:
			return [p, v, t];
		case 3:
			return [p, q, v];
		case 4:
			return [t, p, v];
		default:
			return [v, p, q];
	}
};

const toRgba = (model: ColorModel, v: ArrayLike<number>): Float64Array => {
	const out = new Float64Array(4);
	out[3] = 1;
	switch (model) {
		case "gray":
			out[0] = v[0];
			out[1] = v[0];
			out[2] = v[0];
			break;
		case "rgb":
			out[0] = v[0];
			out[1] = v[1];
			out[2] = v[2];
			break;
		case "rgba":
			out[0] = v[0];
			out[1] = v[1];
			out[2] = v[2];
			out[3] = v[3];
			break;
		case "hsv":
			out.set(hsvToRgb(v[0], v[1], v[2]));
			break;
		case "xyz":
			out.set(xyzToRgb(v[0], v[1], v[2]));
			break;
	}
	return out;
};

const fromRgba = (model: ColorModel, rgba: Float64Array, out: Float64Array) => {
	const [r, g, b, a] = rgba;
	switch (model) {
		case "gray":
			out[0] = luma(r, g, b);
			break;
		case "rgb":
			out[0] = r;
			out[1] = g;
			out[2] = b;
			break;
		case "rgba":
			out[0] = r;
			out[1] = g;
			out[2] = b;
			out[3] = a;
			break;
		case "hsv":
			out.set(rgbToHsv(r, g, b));
			break;
		case "xyz":
			out.set(rgbToXyz(r, g, b));
			break;
	}
};

/**
 * Converts channel values between color models through an RGBA hub.
 * Missing alpha becomes 1; gray broadcasts to every color channel.
 */
export const convertChannels = (
	from: ColorModel,
	to: ColorModel,
	values: ArrayLike<number>,
	out: Float64Array = new Float64Array(CHANNEL_COUNT[to]),
): Float64Array => {
	if (from === to) {
		for (let c = 0; c < CHANNEL_COUNT[to]; c++) out[c] = values[c];
		return out;
	}
	fromRgba(to, toRgba(from, values), out);
	return out;
};
