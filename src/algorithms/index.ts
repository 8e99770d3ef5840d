export { AsyncFilter, evalAsync, toAsync } from "./async-filter.js";
export { AndThen, Join, Then, andThen, join, pipeline, sequence } from "./compose.js";
export {
	computeInto,
	evaluate,
	evaluateInPlace,
	evaluateRegion,
	evaluateRows,
	prepare,
} from "./evaluate.js";
export { Input, type InputCache } from "./input.js";
export { Kernel, type KernelOptions, mapEdge } from "./kernel.js";
export {
	Blend,
	Brightness,
	Contrast,
	Convert,
	Crop,
	GammaLin,
	GammaLog,
	Invert,
	Saturation,
	ToColor,
	ToGrayscale,
} from "./primitives.js";
export {
	FILTERS,
	buildFilter,
	describeRecipe,
	kernelRecipe,
	recipeRequiresIntermediate,
	resolveRecipe,
} from "./recipe.js";
