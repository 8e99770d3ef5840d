import { setImmediate as nextTick } from "node:timers/promises";
import { TaskStateError } from "../errors.js";
import {
	asyncModeStore,
	isProcessingStore,
	progressStore,
	stepsPerTickStore,
} from "../store.js";
import type { AsyncMode, AsyncOptions, Filter, StepResult } from "../types.js";
import type { Image } from "../utils/image.js";
import { createLogger } from "../utils/logger.js";
import { type Point, point } from "../utils/pixel-logic.js";
import { computeInto, prepare } from "./evaluate.js";
import type { Input } from "./input.js";

const log = createLogger("AsyncFilter");

/**
 * Resumable evaluation of a filter, one row or one pixel per `step()`.
 *
 * The task never waits on anything: "pending" only means more work remains.
 * A caller that stops stepping leaves rows below the cursor untouched.
 */
export class AsyncFilter {
	private x = 0;
	private y = 0;
	private steps = 0;
	private prepared: Filter | undefined;

	constructor(
		private readonly filter: Filter,
		private readonly input: Input,
		readonly output: Image,
		readonly mode: AsyncMode = asyncModeStore.get(),
	) {}

	get cursor(): Point {
		return point(this.x, this.y);
	}

	get isDone(): boolean {
		return this.output.width === 0 || this.y >= this.output.height;
	}

	get stepsTaken(): number {
		return this.steps;
	}

	get stepsTotal(): number {
		const { width, height } = this.output;
		if (width === 0) return 0;
		return this.mode === "row" ? height : width * height;
	}

	/** Completed share of the work, 0..100. */
	get progress(): number {
		const total = this.stepsTotal;
		return total === 0 ? 100 : (this.steps / total) * 100;
	}

	step(): StepResult {
		if (this.isDone) {
			throw new TaskStateError("AsyncFilter: step() called after completion");
		}
		const filter = (this.prepared ??= prepare(this.filter, this.input, this.output));
		const { width, height } = this.output;

		if (this.mode === "row") {
			for (let x = 0; x < width; x++) {
				computeInto(filter, x, this.y, this.input, this.output);
			}
			this.y += 1;
		} else {
			computeInto(filter, this.x, this.y, this.input, this.output);
			this.x += 1;
			if (this.x >= width) {
				this.x = 0;
				this.y += 1;
			}
		}

		this.steps += 1;
		return this.y < height ? "pending" : "done";
	}
}

export const toAsync = (
	filter: Filter,
	input: Input,
	output: Image,
	mode: AsyncMode = asyncModeStore.get(),
): AsyncFilter => new AsyncFilter(filter, input, output, mode);

/**
 * Drives an AsyncFilter to completion on the event loop, yielding every
 * `stepsPerTick` steps and publishing progress to `progressStore`.
 */
export const evalAsync = async (
	filter: Filter,
	input: Input,
	output: Image,
	{ mode, stepsPerTick = stepsPerTickStore.get(), onProgress }: AsyncOptions = {},
): Promise<Image> => {
	const task = toAsync(filter, input, output, mode);
	const report = (percent: number) => {
		progressStore.set(percent);
		onProgress?.(percent);
	};

	log.debug(
		`starting ${task.mode} task over ${output.width}x${output.height}, ${task.stepsTotal} steps`,
	);
	isProcessingStore.set(true);
	report(0);
	try {
		let sinceYield = 0;
		while (!task.isDone) {
			task.step();
			sinceYield += 1;
			if (sinceYield >= stepsPerTick && !task.isDone) {
				sinceYield = 0;
				report(task.progress);
				await nextTick();
			}
		}
		report(100);
		log.debug(`task finished after ${task.stepsTaken} steps`);
		return output;
	} finally {
		isProcessingStore.set(false);
	}
};
