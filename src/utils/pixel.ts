import { InvalidArgumentError } from "../errors.js";
import {
	CHANNEL_COUNT,
	type ColorModel,
	alphaIndex,
	convertChannels,
} from "./color-utils.js";

/**
 * A fixed-length vector of normalized channel values tagged with its color
 * model. Arithmetic returns new pixels; the `*InPlace` variants and
 * `copyTo` are the only mutators.
 */
export class Pixel {
	readonly data: Float64Array;

	constructor(
		readonly model: ColorModel,
		data?: ArrayLike<number>,
	) {
		const channels = CHANNEL_COUNT[model];
		if (data && data.length !== channels) {
			throw new InvalidArgumentError(
				`Pixel: ${model} takes ${channels} channels, got ${data.length}`,
			);
		}
		this.data = new Float64Array(channels);
		if (data) this.data.set(data);
	}

	static zeros(model: ColorModel): Pixel {
		return new Pixel(model);
	}

	static gray(value: number): Pixel {
		return new Pixel("gray", [value]);
	}

	static rgba(r: number, g: number, b: number, a = 1): Pixel {
		return new Pixel("rgba", [r, g, b, a]);
	}

	get length(): number {
		return this.data.length;
	}

	get hasAlpha(): boolean {
		return alphaIndex(this.model) >= 0;
	}

	/** Alpha value, or 1 for models without an alpha channel. */
	get alpha(): number {
		const a = alphaIndex(this.model);
		return a >= 0 ? this.data[a] : 1;
	}

	get(channel: number): number {
		return this.data[channel];
	}

	set(channel: number, value: number): void {
		this.data[channel] = value;
	}

	clone(): Pixel {
		return new Pixel(this.model, this.data);
	}

	convert(model: ColorModel): Pixel {
		if (model === this.model) return this.clone();
		return new Pixel(model, convertChannels(this.model, model, this.data));
	}

	/** Writes this pixel, converted to `dest.model`, into `dest`. */
	copyTo(dest: Pixel): void {
		convertChannels(this.model, dest.model, this.data, dest.data);
	}

	map(fn: (value: number, channel: number) => number): Pixel {
		return this.clone().mapInPlace(fn);
	}

	mapInPlace(fn: (value: number, channel: number) => number): this {
		for (let c = 0; c < this.data.length; c++) {
			this.data[c] = fn(this.data[c], c);
		}
		return this;
	}

	/** Applies `fn` to every channel except alpha. */
	mapColorInPlace(fn: (value: number, channel: number) => number): this {
		const a = alphaIndex(this.model);
		for (let c = 0; c < this.data.length; c++) {
			if (c !== a) this.data[c] = fn(this.data[c], c);
		}
		return this;
	}

	add(other: Pixel): Pixel {
		const o = other.model === this.model ? other : other.convert(this.model);
		return this.map((v, c) => v + o.data[c]);
	}

	sub(other: Pixel): Pixel {
		const o = other.model === this.model ? other : other.convert(this.model);
		return this.map((v, c) => v - o.data[c]);
	}

	scale(k: number): Pixel {
		return this.map((v) => v * k);
	}

	div(k: number): Pixel {
		return this.map((v) => v / k);
	}

	toArray(): number[] {
		return Array.from(this.data);
	}
}
