import { constantBorderStore, gammaStore } from "../store.js";
import type { Filter, FilterRecipe, KernelRecipe } from "../types.js";
import { AndThen, Then } from "./compose.js";
import { Kernel } from "./kernel.js";
import {
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

/** Display names of every recipe type. */
export const FILTERS: Readonly<Record<FilterRecipe["type"], string>> = {
	invert: "Invert",
	blend: "Blend",
	gammaLog: "Gamma (log)",
	gammaLin: "Gamma (linear)",
	saturation: "Saturation",
	brightness: "Brightness",
	contrast: "Contrast",
	crop: "Crop",
	toGrayscale: "To grayscale",
	toColor: "To color",
	convert: "Convert",
	kernel: "Kernel",
	then: "Then",
	andThen: "And then",
};

/** Rebuilds the filter a recipe describes. */
export const buildFilter = (recipe: FilterRecipe): Filter => {
	switch (recipe.type) {
		case "invert":
			return new Invert();
		case "blend":
			return new Blend();
		case "gammaLog":
			return new GammaLog(recipe.gamma);
		case "gammaLin":
			return new GammaLin(recipe.gamma);
		case "saturation":
			return new Saturation(recipe.factor);
		case "brightness":
			return new Brightness(recipe.factor);
		case "contrast":
			return new Contrast(recipe.factor);
		case "crop":
			return new Crop(recipe.region);
		case "toGrayscale":
			return new ToGrayscale();
		case "toColor":
			return new ToColor();
		case "convert":
			return new Convert(recipe.model);
		case "kernel": {
			const kernel = new Kernel(recipe.data, {
				edge: recipe.edge,
				border: recipe.border,
			});
			return recipe.normalize ? kernel.normalize() : kernel;
		}
		case "then":
			return new Then(buildFilter(recipe.a), buildFilter(recipe.b));
		case "andThen":
			return new AndThen(buildFilter(recipe.a), buildFilter(recipe.b));
	}
};

export const kernelRecipe = (kernel: Kernel): KernelRecipe => ({
	type: "kernel",
	data: kernel.toArray(),
	edge: kernel.edgeStrategy,
	border: kernel.border,
});

/**
 * Fills the defaults a recipe leaves to configuration. Worker threads have
 * their own stores, so recipes are resolved before they leave the caller.
 */
export const resolveRecipe = (recipe: FilterRecipe): FilterRecipe => {
	switch (recipe.type) {
		case "gammaLog":
		case "gammaLin":
			return { ...recipe, gamma: recipe.gamma ?? gammaStore.get() };
		case "kernel":
			return {
				...recipe,
				edge: recipe.edge ?? "constant",
				border: recipe.border ?? constantBorderStore.get(),
			};
		case "then":
		case "andThen":
			return { ...recipe, a: resolveRecipe(recipe.a), b: resolveRecipe(recipe.b) };
		default:
			return recipe;
	}
};

/** Mirrors `requiresIntermediateImage` of the filter the recipe builds. */
export const recipeRequiresIntermediate = (recipe: FilterRecipe): boolean => {
	switch (recipe.type) {
		case "kernel":
		case "crop":
			return true;
		case "then":
		case "andThen":
			return recipeRequiresIntermediate(recipe.a) || recipeRequiresIntermediate(recipe.b);
		default:
			return false;
	}
};

/** One-line description for logs, e.g. `Then(Invert, Kernel 3x3)`. */
export const describeRecipe = (recipe: FilterRecipe): string => {
	switch (recipe.type) {
		case "then":
		case "andThen":
			return `${FILTERS[recipe.type]}(${describeRecipe(recipe.a)}, ${describeRecipe(recipe.b)})`;
		case "kernel":
			return `Kernel ${recipe.data.length}x${recipe.data[0]?.length ?? 0}`;
		default:
			return FILTERS[recipe.type];
	}
};
