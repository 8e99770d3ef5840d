import { afterEach, describe, expect, it, vi } from "vitest";
import { evaluate } from "../algorithms/evaluate.js";
import { Input } from "../algorithms/input.js";
import { buildFilter } from "../algorithms/recipe.js";
import { InvalidArgumentError } from "../errors.js";
import { isProcessingStore } from "../store.js";
import type { FilterRecipe } from "../types.js";
import { Image } from "../utils/image.js";
import { setLogSink } from "../utils/logger.js";
import { type BandPool, createInlinePool, evaluateParallel } from "./pool.js";
import { partitionRows } from "./utils.js";

const pools: BandPool[] = [];
const inline = (size: number) => {
	const pool = createInlinePool(size);
	pools.push(pool);
	return pool;
};

afterEach(async () => {
	await Promise.all(pools.splice(0).map((pool) => pool.terminate()));
	setLogSink(null);
	vi.restoreAllMocks();
});

const binomial = [
	[1, 2, 1],
	[2, 4, 2],
	[1, 2, 1],
];

const source = (w: number, h: number) =>
	Image.fromValues(
		w,
		h,
		"rgb",
		Array.from({ length: w * h * 3 }, (_, i) => ((i * 7) % 11) / 10),
	);

describe("partitionRows", () => {
	it("splits rows into contiguous bands, larger bands first", () => {
		expect(partitionRows(10, 3)).toEqual([
			{ start: 0, end: 4 },
			{ start: 4, end: 7 },
			{ start: 7, end: 10 },
		]);
	});

	it("never makes more bands than rows", () => {
		expect(partitionRows(2, 4)).toEqual([
			{ start: 0, end: 1 },
			{ start: 1, end: 2 },
		]);
		expect(partitionRows(0, 4)).toEqual([]);
	});
});

describe("evaluateParallel", () => {
	it("matches sequential evaluation bit for bit", async () => {
		const recipe: FilterRecipe = {
			type: "then",
			a: { type: "invert" },
			b: { type: "kernel", data: binomial, edge: "mirror", normalize: true },
		};
		const src = source(5, 7);
		const expected = evaluate(buildFilter(recipe), Input.of(src), src.newLike());
		const out = await evaluateParallel(recipe, [src], src.newLike(), inline(3));
		expect(out.shared).toBe(false);
		expect(Array.from(out.data)).toEqual(Array.from(expected.data));
		expect(isProcessingStore.get()).toBe(false);
	});

	it("writes straight into a shared output", async () => {
		const src = source(3, 2);
		const out = src.newLike({ shared: true });
		const result = await evaluateParallel({ type: "invert" }, [src], out, inline(2));
		expect(result).toBe(out);
		expect(out.getF(0, 0, 0)).toBeCloseTo(1 - src.getF(0, 0, 0), 6);
	});

	it("passes every source to the bands", async () => {
		const a = Image.fromValues(2, 2, "gray", [0.25, 0.25, 0.25, 0.25]);
		const b = Image.fromValues(2, 2, "gray", [0.75, 0.75, 0.75, 0.75]);
		const out = await evaluateParallel({ type: "blend" }, [a, b], a.newLike(), inline(2));
		expect(Array.from(out.data)).toEqual([0.5, 0.5, 0.5, 0.5]);
	});

	it("materializes a spatial stage's input once for all bands", async () => {
		const recipe: FilterRecipe = {
			type: "then",
			a: { type: "invert" },
			b: { type: "kernel", data: binomial, edge: "extend", normalize: true },
		};
		const src = source(8, 8);
		const spy = vi.spyOn(Image.prototype, "newLike");
		const intermediates = () =>
			spy.mock.calls.filter(([opts]) => opts?.type === "f32").length;

		evaluate(buildFilter(recipe), Input.of(src), src.newLike());
		expect(intermediates()).toBe(1);

		spy.mockClear();
		await evaluateParallel(recipe, [src], src.newLike(), inline(4));
		expect(intermediates()).toBe(1);
	});

	it("matches sequential evaluation when a point stage follows a spatial one", async () => {
		const recipe: FilterRecipe = {
			type: "then",
			a: {
				type: "then",
				a: { type: "invert" },
				b: { type: "kernel", data: binomial, edge: "wrap", normalize: true },
			},
			b: { type: "gammaLin", gamma: 2.2 },
		};
		const src = source(6, 5);
		const expected = evaluate(buildFilter(recipe), Input.of(src), src.newLike());
		const out = await evaluateParallel(recipe, [src], src.newLike(), inline(3));
		expect(Array.from(out.data)).toEqual(Array.from(expected.data));
	});

	it("runs both halves of a spatial andThen over the whole output", async () => {
		const recipe: FilterRecipe = {
			type: "andThen",
			a: { type: "kernel", data: binomial, edge: "mirror", normalize: true },
			b: { type: "crop", region: { x: 1, y: 1, width: 3, height: 2 } },
		};
		const values = Array.from({ length: 5 * 4 * 3 }, (_, i) => ((i * 5) % 13) / 12);
		const src = Image.fromValues(5, 4, "rgb", values, { type: "u8" });
		const expected = evaluate(buildFilter(recipe), Input.of(src), src.newLike());
		const out = await evaluateParallel(recipe, [src], src.newLike(), inline(2));
		expect(out.type).toBe("u8");
		expect(Array.from(out.data)).toEqual(Array.from(expected.data));
	});

	it("rejects and logs when a worker fails", async () => {
		const lines: unknown[] = [];
		setLogSink((_level, message) => {
			lines.push(message);
		});
		const boom = new Error("worker exited");
		const pool: BandPool = { ...inline(1), failed: Promise.reject(boom) };
		const src = source(2, 2);
		await expect(evaluateParallel({ type: "invert" }, [src], src.newLike(), pool)).rejects.toBe(
			boom,
		);
		expect(lines).toContain("[Pool] parallel evaluation failed");
		expect(isProcessingStore.get()).toBe(false);
	});
});

describe("createInlinePool", () => {
	it("rejects a size below one", () => {
		expect(() => createInlinePool(0)).toThrow(InvalidArgumentError);
	});
});
