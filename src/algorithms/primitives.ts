import { gammaStore } from "../store.js";
import type { Filter, PointFilter } from "../types.js";
import { type ColorModel, alphaIndex, luma } from "../utils/color-utils.js";
import { Pixel } from "../utils/pixel.js";
import { type Point, type Region, clamp01, point } from "../utils/pixel-logic.js";
import type { Input } from "./input.js";

/** `1 - x` on every channel. */
export class Invert implements PointFilter {
	readonly requiresIntermediateImage = false;
	readonly pointwise = true;

	computeAt(pt: Point, input: Input, dest: Pixel): void {
		input
			.getPixel(pt)
			.mapInPlace((x) => 1 - x)
			.copyTo(dest);
	}
}

/** Average of the default lookup (source 0 or an upstream result) and source 1. */
export class Blend implements Filter {
	readonly requiresIntermediateImage = false;

	computeAt(pt: Point, input: Input, dest: Pixel): void {
		const a = input.getPixel(pt);
		const b = input.getPixel(pt, 1);
		a.add(b).div(2).copyTo(dest);
	}
}

/** Encodes linear values: `x^(1/gamma)`. */
export class GammaLog implements PointFilter {
	readonly requiresIntermediateImage = false;
	readonly pointwise = true;

	constructor(readonly gamma: number = gammaStore.get()) {}

	computeAt(pt: Point, input: Input, dest: Pixel): void {
		const inv = 1 / this.gamma;
		input
			.getPixel(pt)
			.mapInPlace((x) => x ** inv)
			.copyTo(dest);
	}
}

/** Decodes to linear values: `x^gamma`. */
export class GammaLin implements PointFilter {
	readonly requiresIntermediateImage = false;
	readonly pointwise = true;

	constructor(readonly gamma: number = gammaStore.get()) {}

	computeAt(pt: Point, input: Input, dest: Pixel): void {
		input
			.getPixel(pt)
			.mapInPlace((x) => x ** this.gamma)
			.copyTo(dest);
	}
}

const keepAlpha = (src: Pixel, dest: Pixel) => {
	const a = alphaIndex(dest.model);
	if (a >= 0) dest.set(a, src.alpha);
};

/** Scales HSV saturation by `factor`, clamped to [0, 1]. */
export class Saturation implements PointFilter {
	readonly requiresIntermediateImage = false;
	readonly pointwise = true;

	constructor(readonly factor: number) {}

	computeAt(pt: Point, input: Input, dest: Pixel): void {
		const src = input.getPixel(pt);
		const hsv = src.convert("hsv");
		hsv.set(1, clamp01(hsv.get(1) * this.factor));
		hsv.copyTo(dest);
		keepAlpha(src, dest);
	}
}

export class Brightness implements PointFilter {
	readonly requiresIntermediateImage = false;
	readonly pointwise = true;

	constructor(readonly factor: number) {}

	computeAt(pt: Point, input: Input, dest: Pixel): void {
		input
			.getPixel(pt)
			.mapColorInPlace((x) => x * this.factor)
			.copyTo(dest);
	}
}

/** `(x - 0.5) * factor + 0.5` on color channels. */
export class Contrast implements PointFilter {
	readonly requiresIntermediateImage = false;
	readonly pointwise = true;

	constructor(readonly factor: number) {}

	computeAt(pt: Point, input: Input, dest: Pixel): void {
		input
			.getPixel(pt)
			.mapColorInPlace((x) => (x - 0.5) * this.factor + 0.5)
			.copyTo(dest);
	}
}

/**
 * Copies the window `region` of the source to the destination origin.
 * Points outside the window, or whose source is outside the image, are
 * left unchanged. Reads another location than the one written, so it
 * samples a materialized image when placed after another filter.
 */
export class Crop implements Filter {
	readonly requiresIntermediateImage = true;

	constructor(readonly region: Region) {}

	computeAt(pt: Point, input: Input, dest: Pixel): void {
		if (pt.x >= this.region.width || pt.y >= this.region.height) return;
		const sx = pt.x + this.region.x;
		const sy = pt.y + this.region.y;
		const { width, height } = input.dimensions();
		if (sx < 0 || sy < 0 || sx >= width || sy >= height) return;
		input.getPixel(point(sx, sy)).copyTo(dest);
	}
}

/** Luma `0.21R + 0.72G + 0.07B`, alpha kept. */
export class ToGrayscale implements PointFilter {
	readonly requiresIntermediateImage = false;
	readonly pointwise = true;

	computeAt(pt: Point, input: Input, dest: Pixel): void {
		const src = input.getPixel(pt).convert("rgba");
		const l = luma(src.get(0), src.get(1), src.get(2));
		Pixel.rgba(l, l, l, src.get(3)).copyTo(dest);
	}
}

/** Broadcasts channel 0 to every color channel; opaque unless the source has alpha. */
export class ToColor implements PointFilter {
	readonly requiresIntermediateImage = false;
	readonly pointwise = true;

	computeAt(pt: Point, input: Input, dest: Pixel): void {
		const src = input.getPixel(pt);
		const v = src.get(0);
		Pixel.rgba(v, v, v, src.alpha).copyTo(dest);
	}
}

/** Passes the source pixel through `model` on its way to the destination. */
export class Convert implements PointFilter {
	readonly requiresIntermediateImage = false;
	readonly pointwise = true;

	constructor(readonly model: ColorModel) {}

	computeAt(pt: Point, input: Input, dest: Pixel): void {
		input.getPixel(pt).convert(this.model).copyTo(dest);
	}
}
