import { TaskStateError } from "../errors.js";
import type { Filter, JoinFunction, PointFilter } from "../types.js";
import type { ColorModel } from "../utils/color-utils.js";
import type { Image } from "../utils/image.js";
import { createLogger } from "../utils/logger.js";
import type { Pixel } from "../utils/pixel.js";
import type { Point } from "../utils/pixel-logic.js";
import { evaluate, prepare } from "./evaluate.js";
import type { Input } from "./input.js";

const log = createLogger("Compose");

/** `b` bound to an Input that exposes a fully materialized output of `a`. */
class Staged implements Filter {
	readonly requiresIntermediateImage = true;

	constructor(
		private readonly b: Filter,
		private readonly staged: Input,
	) {}

	computeAt(pt: Point, _input: Input, dest: Pixel): void {
		this.b.computeAt(pt, this.staged, dest);
	}
}

/**
 * Runs `a`, then `b` on its result.
 *
 * When `b` samples neighbors, `a` is first evaluated over the whole output
 * into an intermediate image. Otherwise the two are fused per point: `a`
 * writes a scratch pixel that `b` reads in place of the source image.
 */
export class Then implements Filter {
	readonly requiresIntermediateImage: boolean;
	readonly pointwise: boolean;

	constructor(
		readonly a: Filter,
		readonly b: Filter,
	) {
		this.requiresIntermediateImage =
			a.requiresIntermediateImage || b.requiresIntermediateImage;
		this.pointwise = a.pointwise === true && b.pointwise === true;
	}

	beforeCompute(input: Input, output: Image): Filter {
		if (this.b.requiresIntermediateImage) {
			log.debug(
				`materializing ${output.width}x${output.height} intermediate image`,
			);
			const intermediate = output.newLike({ type: "f32" });
			evaluate(this.a, input, intermediate);
			const staged = input.withImage(intermediate);
			return new Staged(prepare(this.b, staged, output), staged);
		}
		return new Then(prepare(this.a, input, output), prepare(this.b, input, output));
	}

	computeAt(pt: Point, input: Input, dest: Pixel): void {
		if (this.b.requiresIntermediateImage) {
			throw new TaskStateError(
				"Then: a spatial second stage needs beforeCompute to materialize its input",
			);
		}
		const scratch = dest.clone();
		this.a.computeAt(pt, input, scratch);
		this.b.computeAt(pt, input.withPixel(scratch), dest);
	}
}

/** Evaluates `a` and `b` independently and merges them in `model`. */
export class Join implements Filter {
	readonly requiresIntermediateImage: boolean;
	readonly pointwise: boolean;

	constructor(
		readonly a: Filter,
		readonly b: Filter,
		readonly combine: JoinFunction,
		readonly model: ColorModel = "rgba",
	) {
		this.requiresIntermediateImage =
			a.requiresIntermediateImage || b.requiresIntermediateImage;
		this.pointwise = a.pointwise === true && b.pointwise === true;
	}

	beforeCompute(input: Input, output: Image): Filter {
		return new Join(
			prepare(this.a, input, output),
			prepare(this.b, input, output),
			this.combine,
			this.model,
		);
	}

	computeAt(pt: Point, input: Input, dest: Pixel): void {
		const pa = dest.clone();
		this.a.computeAt(pt, input, pa);
		const pb = dest.clone();
		this.b.computeAt(pt, input, pb);
		this.combine(pt, pa.convert(this.model), pb.convert(this.model)).copyTo(dest);
	}
}

/** Both filters write into the same destination pixel, `b` last. */
export class AndThen implements Filter {
	readonly requiresIntermediateImage: boolean;
	readonly pointwise: boolean;

	constructor(
		readonly a: Filter,
		readonly b: Filter,
	) {
		this.requiresIntermediateImage =
			a.requiresIntermediateImage || b.requiresIntermediateImage;
		this.pointwise = a.pointwise === true && b.pointwise === true;
	}

	beforeCompute(input: Input, output: Image): Filter {
		return new AndThen(prepare(this.a, input, output), prepare(this.b, input, output));
	}

	computeAt(pt: Point, input: Input, dest: Pixel): void {
		this.a.computeAt(pt, input, dest);
		this.b.computeAt(pt, input, dest);
	}
}

// Not named `then`: a module exporting `then` is treated as a thenable by `import()`.
export function sequence(a: PointFilter, b: PointFilter): PointFilter;
export function sequence(a: Filter, b: Filter): Filter;
export function sequence(a: Filter, b: Filter): Filter {
	return new Then(a, b);
}

export function join(
	a: PointFilter,
	b: PointFilter,
	combine: JoinFunction,
	model?: ColorModel,
): PointFilter;
export function join(
	a: Filter,
	b: Filter,
	combine: JoinFunction,
	model?: ColorModel,
): Filter;
export function join(
	a: Filter,
	b: Filter,
	combine: JoinFunction,
	model?: ColorModel,
): Filter {
	return new Join(a, b, combine, model);
}

export function andThen(a: PointFilter, b: PointFilter): PointFilter;
export function andThen(a: Filter, b: Filter): Filter;
export function andThen(a: Filter, b: Filter): Filter {
	return new AndThen(a, b);
}

/** Left fold of `sequence`: `pipeline(a, b, c)` is `sequence(sequence(a, b), c)`. */
export function pipeline(first: PointFilter, ...rest: PointFilter[]): PointFilter;
export function pipeline(first: Filter, ...rest: Filter[]): Filter;
export function pipeline(first: Filter, ...rest: Filter[]): Filter {
	return rest.reduce<Filter>((acc, next) => new Then(acc, next), first);
}
