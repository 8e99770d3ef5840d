import type { Filter, PointFilter } from "../types.js";
import type { Image } from "../utils/image.js";
import { createLogger } from "../utils/logger.js";
import {
	type Region,
	clipRegion,
	fullRegion,
	point,
} from "../utils/pixel-logic.js";
import { Input } from "./input.js";

const log = createLogger("Evaluate");

/** Runs the filter's once-per-evaluation hook and returns the filter to use. */
export const prepare = (filter: Filter, input: Input, output: Image): Filter =>
	filter.beforeCompute ? filter.beforeCompute(input, output) : filter;

/** Computes one point into `output`; `dest` starts as the current value. */
export const computeInto = (
	filter: Filter,
	x: number,
	y: number,
	input: Input,
	output: Image,
): void => {
	const pt = point(x, y);
	const dest = output.getPixel(pt);
	filter.computeAt(pt, input, dest);
	output.setPixel(pt, dest);
};

const run = (
	filter: Filter,
	region: Region,
	input: Input,
	output: Image,
): number => {
	const { x: x0, y: y0, width, height } = region;
	for (let y = y0; y < y0 + height; y++) {
		for (let x = x0; x < x0 + width; x++) {
			computeInto(filter, x, y, input, output);
		}
	}
	return width * height;
};

/** Evaluates every point of `output` in row-major order. */
export const evaluate = (filter: Filter, input: Input, output: Image): Image => {
	log.debug(`evaluating ${output.width}x${output.height} ${output.model}`);
	const prepared = prepare(filter, input, output);
	run(prepared, fullRegion(output.width, output.height), input, output);
	return output;
};

/** Evaluates only the points of `region`; points outside `output` are skipped. */
export const evaluateRegion = (
	filter: Filter,
	region: Region,
	input: Input,
	output: Image,
): Image => {
	const clipped = clipRegion(region, output.width, output.height);
	log.debug(
		`evaluating region ${clipped.width}x${clipped.height} at (${clipped.x}, ${clipped.y})`,
	);
	const prepared = prepare(filter, input, output);
	run(prepared, clipped, input, output);
	return output;
};

/** Evaluates rows `[start, end)`; returns the number of pixels written. */
export const evaluateRows = (
	filter: Filter,
	input: Input,
	output: Image,
	start: number,
	end: number,
): number => {
	const prepared = prepare(filter, input, output);
	const band = clipRegion(
		{ x: 0, y: start, width: output.width, height: end - start },
		output.width,
		output.height,
	);
	return run(prepared, band, input, output);
};

/**
 * Evaluates a point filter with `image` as both source and destination.
 * Each pixel is read before it is written, and the filter sees an Input
 * holding only that pixel, so no other location is observable.
 */
export const evaluateInPlace = (filter: PointFilter, image: Image): Image => {
	const empty = new Input([]);
	const prepared = prepare(filter, empty, image);
	for (let y = 0; y < image.height; y++) {
		for (let x = 0; x < image.width; x++) {
			const pt = point(x, y);
			const dest = image.getPixel(pt);
			prepared.computeAt(pt, empty.withPixel(dest.clone()), dest);
			image.setPixel(pt, dest);
		}
	}
	return image;
};
