import { buildFilter, describeRecipe } from "../algorithms/recipe.js";
import { evaluateRows } from "../algorithms/evaluate.js";
import { Input } from "../algorithms/input.js";
import type { Band, BandWorkerApi, FilterRecipe, RawImage } from "../types.js";
import { Image } from "../utils/image.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("BandWorker");

// Shared by the worker thread entry and the in-process pool.
export const bandApi: BandWorkerApi = {
	async evalBand(
		recipe: FilterRecipe,
		sources: RawImage[],
		output: RawImage,
		band: Band,
		staged?: RawImage,
	): Promise<number> {
		log.debug(`${describeRecipe(recipe)} rows ${band.start}..${band.end}`);
		const filter = buildFilter(recipe);
		const input = Input.of(...sources.map((raw) => Image.fromRaw(raw)));
		return evaluateRows(
			filter,
			staged ? input.withImage(Image.fromRaw(staged)) : input,
			Image.fromRaw(output),
			band.start,
			band.end,
		);
	},
};

export type BandApi = typeof bandApi;
