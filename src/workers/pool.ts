import { MessageChannel, Worker } from "node:worker_threads";
import * as Comlink from "comlink";
import {
	describeRecipe,
	recipeRequiresIntermediate,
	resolveRecipe,
} from "../algorithms/recipe.js";
import { InvalidArgumentError, WorkerExitError } from "../errors.js";
import { isProcessingStore, logLevelStore, workerCountStore } from "../store.js";
import type { BandWorkerApi, FilterRecipe, RawImage } from "../types.js";
import type { Image } from "../utils/image.js";
import { createLogger } from "../utils/logger.js";
import { bandApi } from "./band.core.js";
import { ensureShared, partitionRows, portEndpoint } from "./utils.js";

const log = createLogger("Pool");

export interface BandPool {
	readonly size: number;
	readonly workers: ReadonlyArray<Comlink.Remote<BandWorkerApi>>;
	/** Rejects when a worker dies; never settles otherwise. */
	readonly failed: Promise<never>;
	terminate(): Promise<void>;
}

export interface ThreadPoolOptions {
	/** Worker script; defaults to `band.worker.js` beside this module. */
	entry?: URL;
	/** Node flags for the workers, e.g. a loader for TypeScript sources. */
	execArgv?: string[];
}

const checkSize = (size: number): number => {
	if (!Number.isInteger(size) || size < 1) {
		throw new InvalidArgumentError(`pool size must be a positive integer, got ${size}`);
	}
	return size;
};

/**
 * Starts `size` worker threads. The default entry is resolved beside this
 * module, so without `entry` the pool runs from the compiled output.
 */
export const createThreadPool = (
	size = workerCountStore.get(),
	{ entry = new URL("./band.worker.js", import.meta.url), execArgv }: ThreadPoolOptions = {},
): BandPool => {
	checkSize(size);
	const threads = Array.from(
		{ length: size },
		() =>
			new Worker(entry, {
				workerData: { logLevel: logLevelStore.get() },
				execArgv,
			}),
	);
	let stopping = false;
	const failed = new Promise<never>((_, reject) => {
		threads.forEach((thread, i) => {
			thread.once("error", (err) => {
				log.error(`worker ${i} failed`, err);
				reject(err);
			});
			// Band workers never exit on their own
			thread.once("exit", (code) => {
				if (stopping) return;
				const err = new WorkerExitError(`worker ${i} exited with code ${code}`);
				log.error(err.message);
				reject(err);
			});
		});
	});
	// Observed through Promise.race in evaluateParallel.
	failed.catch(() => undefined);
	log.info(`started ${size} worker threads`);

	return {
		size,
		workers: threads.map((thread) => Comlink.wrap<BandWorkerApi>(portEndpoint(thread))),
		failed,
		terminate: async () => {
			stopping = true;
			await Promise.all(threads.map((thread) => thread.terminate()));
			log.info("worker threads terminated");
		},
	};
};

/** Same protocol over in-process MessageChannels; bands run on this thread. */
export const createInlinePool = (size = 1): BandPool => {
	checkSize(size);
	const channels = Array.from({ length: size }, () => new MessageChannel());
	for (const { port1 } of channels) {
		Comlink.expose(bandApi, portEndpoint(port1));
	}
	return {
		size,
		workers: channels.map(({ port2 }) => Comlink.wrap<BandWorkerApi>(portEndpoint(port2))),
		failed: new Promise<never>(() => undefined),
		terminate: async () => {
			for (const { port1, port2 } of channels) {
				port1.close();
				port2.close();
			}
		},
	};
};

interface StageContext {
	readonly pool: BandPool;
	readonly sources: RawImage[];
	readonly staged?: RawImage;
}

const runBands = async (
	recipe: FilterRecipe,
	output: Image,
	{ pool, sources, staged }: StageContext,
): Promise<number> => {
	const raw = output.toRaw();
	const jobs = partitionRows(output.height, pool.size).map((band, i) => {
		const worker = pool.workers[i];
		if (!worker) throw new InvalidArgumentError(`pool has no worker ${i}`);
		return worker.evalBand(recipe, sources, raw, band, staged);
	});
	const counts = await Promise.race([Promise.all(jobs), pool.failed]);
	return counts.reduce((sum, n) => sum + n, 0);
};

/**
 * Splits a recipe at every point where sequential evaluation would build an
 * intermediate image. Each intermediate is filled once, in bands, and the
 * next stage reads it as its staged input.
 */
const runStages = async (
	recipe: FilterRecipe,
	output: Image,
	ctx: StageContext,
): Promise<number> => {
	if (recipe.type === "then" && recipeRequiresIntermediate(recipe.b)) {
		const intermediate = output.newLike({ type: "f32", shared: true });
		await runStages(recipe.a, intermediate, ctx);
		return runStages(recipe.b, output, { ...ctx, staged: intermediate.toRaw() });
	}
	if (recipe.type === "then" && recipeRequiresIntermediate(recipe.a)) {
		// Stands in for the fused scratch pixel: starts from the output, full precision
		const intermediate = output.newLike({ type: "f64", shared: true });
		intermediate.copyFrom(output);
		await runStages(recipe.a, intermediate, ctx);
		return runStages(recipe.b, output, { ...ctx, staged: intermediate.toRaw() });
	}
	if (recipe.type === "andThen" && recipeRequiresIntermediate(recipe)) {
		await runStages(recipe.a, output, ctx);
		return runStages(recipe.b, output, ctx);
	}
	return runBands(recipe, output, ctx);
};

/**
 * Evaluates the filter a recipe describes by splitting `output` into row
 * bands, one per pool worker. Sources and output travel as shared memory;
 * an output that is not shared is filled through a shared copy.
 *
 * Only recipe-expressible filters cross threads. `join` and user-defined
 * filters carry functions that cannot be cloned; evaluate those with
 * `evaluate` or `evalAsync`.
 */
export const evaluateParallel = async (
	recipe: FilterRecipe,
	sources: ReadonlyArray<Image>,
	output: Image,
	pool: BandPool,
): Promise<Image> => {
	const resolved = resolveRecipe(recipe);
	const target = ensureShared(output);
	const rawSources = sources.map((source) => ensureShared(source).toRaw());

	log.info(
		`${describeRecipe(resolved)} over ${output.width}x${output.height} on ${pool.size} workers`,
	);
	isProcessingStore.set(true);
	try {
		const written = await runStages(resolved, target, { pool, sources: rawSources });
		log.debug(`wrote ${written} pixels`);
	} catch (err) {
		log.error("parallel evaluation failed", err);
		throw err;
	} finally {
		isProcessingStore.set(false);
	}

	if (target !== output) output.copyFrom(target);
	return output;
};
