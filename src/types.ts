import type { Input } from "./algorithms/input.js";
import type { ColorModel } from "./utils/color-utils.js";
import type { Image } from "./utils/image.js";
import type { Pixel } from "./utils/pixel.js";
import type { Point, Region } from "./utils/pixel-logic.js";

// Domain Types
export type ElementType = "u8" | "u16" | "f32" | "f64";

export type PixelBuffer = Uint8Array | Uint16Array | Float32Array | Float64Array;

export type EdgeStrategy = "constant" | "extend" | "wrap" | "mirror";

export type AsyncMode = "pixel" | "row";

export type StepResult = "pending" | "done";

/**
 * A pure function from (point, input) to one output pixel. Implementations
 * must not mutate shared state, so the same filter value can be evaluated
 * for any point in any order, including from several workers at once.
 */
export interface Filter {
	/** True when evaluation at one point reads other points of upstream output. */
	readonly requiresIntermediateImage: boolean;
	/** Set on filters that read the current point of source 0 and nothing else. */
	readonly pointwise?: boolean;
	/**
	 * Writes the output pixel at `pt` into `dest`. `dest` holds the
	 * destination's current value on entry; leaving it untouched is a no-op.
	 */
	computeAt(pt: Point, input: Input, dest: Pixel): void;
	/**
	 * Runs once per evaluation before any `computeAt`, and returns the filter
	 * to evaluate for that call. Intermediate buffers are allocated here only.
	 */
	beforeCompute?(input: Input, output: Image): Filter;
}

/** Filters that can run in place: they only ever read the point being written. */
export interface PointFilter extends Filter {
	readonly pointwise: true;
	readonly requiresIntermediateImage: false;
}

export type JoinFunction = (pt: Point, a: Pixel, b: Pixel) => Pixel;

export interface RawImage {
	readonly width: number;
	readonly height: number;
	readonly model: ColorModel;
	readonly type: ElementType;
	readonly buffer: ArrayBufferLike;
}

export interface KernelRecipe {
	type: "kernel";
	data: number[][];
	edge?: EdgeStrategy;
	border?: number;
	normalize?: boolean;
}

/** Serializable description of a built-in filter tree. */
export type FilterRecipe =
	| { type: "invert" }
	| { type: "blend" }
	| { type: "gammaLog"; gamma?: number }
	| { type: "gammaLin"; gamma?: number }
	| { type: "saturation"; factor: number }
	| { type: "brightness"; factor: number }
	| { type: "contrast"; factor: number }
	| { type: "crop"; region: Region }
	| { type: "toGrayscale" }
	| { type: "toColor" }
	| { type: "convert"; model: ColorModel }
	| KernelRecipe
	| { type: "then"; a: FilterRecipe; b: FilterRecipe }
	| { type: "andThen"; a: FilterRecipe; b: FilterRecipe };

export interface Band {
	readonly start: number;
	readonly end: number;
}

export interface BandWorkerApi {
	/**
	 * Evaluates rows `[band.start, band.end)` into `output`; resolves to the
	 * pixel count. `staged` is an upstream result read by default lookups.
	 */
	evalBand(
		recipe: FilterRecipe,
		sources: RawImage[],
		output: RawImage,
		band: Band,
		staged?: RawImage,
	): Promise<number>;
}

export interface AsyncOptions {
	mode?: AsyncMode;
	stepsPerTick?: number;
	onProgress?: (percent: number) => void;
}
