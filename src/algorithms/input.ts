import { InvalidArgumentError } from "../errors.js";
import type { ColorModel } from "../utils/color-utils.js";
import type { Image } from "../utils/image.js";
import { Pixel } from "../utils/pixel.js";
import type { Point } from "../utils/pixel-logic.js";

export type InputCache =
	| { readonly kind: "pixel"; readonly pixel: Pixel }
	| { readonly kind: "image"; readonly image: Image };

/**
 * Read-only view over the source images of one evaluation, plus at most one
 * cached pixel or intermediate image produced by an upstream filter.
 *
 * Lookups without a source index read the cached image, then the cached
 * pixel, then source 0. An explicit index always reads that source.
 */
export class Input {
	constructor(
		readonly images: ReadonlyArray<Image>,
		private readonly cache?: InputCache,
	) {}

	static of(...images: Image[]): Input {
		return new Input(images);
	}

	/** Same sources, with `pixel` standing in for every default lookup. */
	withPixel(pixel: Pixel): Input {
		return new Input(this.images, { kind: "pixel", pixel });
	}

	/** Same sources, with `image` standing in for every default lookup. */
	withImage(image: Image): Input {
		return new Input(this.images, { kind: "image", image });
	}

	get cachedPixel(): Pixel | undefined {
		return this.cache?.kind === "pixel" ? this.cache.pixel : undefined;
	}

	get cachedImage(): Image | undefined {
		return this.cache?.kind === "image" ? this.cache.image : undefined;
	}

	source(index = 0): Image {
		const image = this.images[index];
		if (!image) {
			throw new InvalidArgumentError(
				`Input: no source image at index ${index} (have ${this.images.length})`,
			);
		}
		return image;
	}

	/** The image default lookups sample from when no pixel is cached. */
	private sampled(): Image {
		return this.cache?.kind === "image" ? this.cache.image : this.source(0);
	}

	/** Size of the grid default lookups read from. */
	dimensions(): { width: number; height: number } {
		if (this.cache?.kind === "pixel") {
			throw new InvalidArgumentError("Input: a cached pixel has no dimensions");
		}
		const image = this.sampled();
		return { width: image.width, height: image.height };
	}

	get colorModel(): ColorModel {
		if (this.cache?.kind === "pixel") return this.cache.pixel.model;
		return this.sampled().model;
	}

	newPixel(): Pixel {
		return Pixel.zeros(this.colorModel);
	}

	getPixel(pt: Point, index?: number): Pixel {
		if (index !== undefined) return this.source(index).getPixel(pt);
		if (this.cache?.kind === "pixel") return this.cache.pixel.clone();
		return this.sampled().getPixel(pt);
	}

	getF(pt: Point, channel: number, index?: number): number {
		if (index !== undefined) return this.source(index).getF(pt.x, pt.y, channel);
		if (this.cache?.kind === "pixel") return this.cache.pixel.get(channel);
		return this.sampled().getF(pt.x, pt.y, channel);
	}
}
