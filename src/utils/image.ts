import { evaluate } from "../algorithms/evaluate.js";
import { Input } from "../algorithms/input.js";
import { InvalidArgumentError } from "../errors.js";
import type { ElementType, Filter, PixelBuffer, RawImage } from "../types.js";
import { CHANNEL_COUNT, type ColorModel, convertChannels } from "./color-utils.js";
import { Pixel } from "./pixel.js";
import { type Point, clamp01 } from "./pixel-logic.js";

const BYTES_PER_ELEMENT: Readonly<Record<ElementType, number>> = {
	u8: 1,
	u16: 2,
	f32: 4,
	f64: 8,
};

// Integer element types store [0, 1] scaled to their full range
const INTEGER_MAX: Readonly<Record<ElementType, number>> = {
	u8: 255,
	u16: 65535,
	f32: 0,
	f64: 0,
};

const view = (type: ElementType, buffer: ArrayBufferLike): PixelBuffer => {
	switch (type) {
		case "u8":
			return new Uint8Array(buffer);
		case "u16":
			return new Uint16Array(buffer);
		case "f32":
			return new Float32Array(buffer);
		case "f64":
			return new Float64Array(buffer);
	}
};

const allocate = (
	type: ElementType,
	length: number,
	shared: boolean,
): PixelBuffer => {
	const bytes = BYTES_PER_ELEMENT[type] * length;
	return view(type, shared ? new SharedArrayBuffer(bytes) : new ArrayBuffer(bytes));
};

export interface ImageOptions {
	type?: ElementType;
	shared?: boolean;
}

export interface NewLikeOptions extends ImageOptions {
	model?: ColorModel;
}

/**
 * Dense row-major image buffer. Channel values are read as normalized floats
 * and clamped to the element type's range on write.
 */
export class Image {
	readonly channels: number;

	constructor(
		readonly width: number,
		readonly height: number,
		readonly model: ColorModel,
		readonly type: ElementType,
		readonly data: PixelBuffer,
	) {
		if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0) {
			throw new InvalidArgumentError(
				`Image: invalid dimensions ${width}x${height}`,
			);
		}
		this.channels = CHANNEL_COUNT[model];
		const expected = width * height * this.channels;
		if (data.length !== expected) {
			throw new InvalidArgumentError(
				`Image: ${width}x${height} ${model} needs ${expected} elements, got ${data.length}`,
			);
		}
	}

	static create(
		width: number,
		height: number,
		model: ColorModel = "rgb",
		{ type = "f32", shared = false }: ImageOptions = {},
	): Image {
		const length = Math.max(0, width * height * CHANNEL_COUNT[model]);
		return new Image(width, height, model, type, allocate(type, length, shared));
	}

	/** Builds an image from normalized channel values in row-major order. */
	static fromValues(
		width: number,
		height: number,
		model: ColorModel,
		values: ArrayLike<number>,
		options: ImageOptions = {},
	): Image {
		const image = Image.create(width, height, model, options);
		if (values.length !== image.data.length) {
			throw new InvalidArgumentError(
				`Image.fromValues: expected ${image.data.length} values, got ${values.length}`,
			);
		}
		for (let i = 0; i < values.length; i++) image.store(i, values[i]);
		return image;
	}

	static fromRaw(raw: RawImage): Image {
		return new Image(raw.width, raw.height, raw.model, raw.type, view(raw.type, raw.buffer));
	}

	get shared(): boolean {
		return this.data.buffer instanceof SharedArrayBuffer;
	}

	toRaw(): RawImage {
		return {
			width: this.width,
			height: this.height,
			model: this.model,
			type: this.type,
			buffer: this.data.buffer,
		};
	}

	inBounds(x: number, y: number): boolean {
		return x >= 0 && y >= 0 && x < this.width && y < this.height;
	}

	private offset(x: number, y: number): number {
		if (!this.inBounds(x, y)) {
			throw new RangeError(
				`Image: (${x}, ${y}) outside ${this.width}x${this.height}`,
			);
		}
		return (y * this.width + x) * this.channels;
	}

	private load(i: number): number {
		const max = INTEGER_MAX[this.type];
		return max ? this.data[i] / max : this.data[i];
	}

	private store(i: number, value: number): void {
		const max = INTEGER_MAX[this.type];
		this.data[i] = max ? Math.round(clamp01(value) * max) : value;
	}

	getF(x: number, y: number, channel: number): number {
		return this.load(this.offset(x, y) + channel);
	}

	setF(x: number, y: number, channel: number, value: number): void {
		this.store(this.offset(x, y) + channel, value);
	}

	getPixel(pt: Point): Pixel {
		const o = this.offset(pt.x, pt.y);
		const px = Pixel.zeros(this.model);
		for (let c = 0; c < this.channels; c++) px.data[c] = this.load(o + c);
		return px;
	}

	/** Writes `px`, converted to this image's model. */
	setPixel(pt: Point, px: Pixel): void {
		const o = this.offset(pt.x, pt.y);
		const values =
			px.model === this.model ? px.data : convertChannels(px.model, this.model, px.data);
		for (let c = 0; c < this.channels; c++) this.store(o + c, values[c]);
	}

	newLike({ model = this.model, type = this.type, shared = false }: NewLikeOptions = {}): Image {
		return Image.create(this.width, this.height, model, { type, shared });
	}

	copyFrom(other: Image): void {
		if (
			other.width !== this.width ||
			other.height !== this.height ||
			other.model !== this.model
		) {
			throw new InvalidArgumentError("Image.copyFrom: shape mismatch");
		}
		if (other.type === this.type) {
			this.data.set(other.data);
			return;
		}
		for (let i = 0; i < this.data.length; i++) this.store(i, other.load(i));
	}

	/** Same pixels in a buffer backed by a SharedArrayBuffer. */
	toShared(): Image {
		const copy = this.newLike({ shared: true });
		copy.data.set(this.data);
		return copy;
	}

	/** Evaluates `filter` with this image as the only source. */
	apply(filter: Filter, dest: Image = this.newLike()): Image {
		return evaluate(filter, Input.of(this), dest);
	}
}
