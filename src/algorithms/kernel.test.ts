import { describe, expect, it } from "vitest";
import { InvalidArgumentError, KernelShapeError } from "../errors.js";
import type { EdgeStrategy } from "../types.js";
import { Image } from "../utils/image.js";
import { evaluate } from "./evaluate.js";
import { Input } from "./input.js";
import { Kernel, mapEdge } from "./kernel.js";

const row = (values: number[]) =>
	Image.fromValues(values.length, 1, "gray", values, { type: "f64" });

// Samples one column to the left, so edge handling shows up at x = 0
const shiftRight = (edge: EdgeStrategy) => new Kernel([[1, 0, 0]], { edge, border: 0 });

describe("mapEdge", () => {
	it("reflects without repeating the edge sample under mirror", () => {
		expect(mapEdge("mirror", -1, 4)).toBe(1);
		expect(mapEdge("mirror", -2, 4)).toBe(2);
		expect(mapEdge("mirror", 5, 4)).toBe(3);
		expect(mapEdge("mirror", 10, 4)).toBe(2);
		expect(mapEdge("mirror", 3, 0)).toBe(0);
	});

	it("wraps modulo the extent", () => {
		expect(mapEdge("wrap", -1, 4)).toBe(4);
		expect(mapEdge("wrap", 5, 4)).toBe(0);
		expect(mapEdge("wrap", -6, 4)).toBe(4);
	});

	it("clamps under extend and passes through under constant", () => {
		expect(mapEdge("extend", -3, 4)).toBe(0);
		expect(mapEdge("extend", 9, 4)).toBe(4);
		expect(mapEdge("constant", -2, 4)).toBe(-2);
	});

	it("maps past a 32-wide row", () => {
		expect([-1, 32].map((v) => mapEdge("extend", v, 31))).toEqual([0, 31]);
		expect([-1, -2, 32, 33].map((v) => mapEdge("wrap", v, 31))).toEqual([31, 30, 0, 1]);
		expect([-1, -2, 32, 33].map((v) => mapEdge("mirror", v, 31))).toEqual([1, 2, 30, 29]);
	});

	it("leaves in-range coordinates alone", () => {
		for (const edge of ["constant", "extend", "wrap", "mirror"] as const) {
			for (const max of [0, 1, 4, 31]) {
				for (let v = 0; v <= max; v++) expect(mapEdge(edge, v, max)).toBe(v);
			}
		}
	});
});

describe("Kernel", () => {
	it("rejects empty and ragged data", () => {
		expect(() => new Kernel([])).toThrow(KernelShapeError);
		expect(() => new Kernel([[]])).toThrow(KernelShapeError);
		expect(() => new Kernel([[1, 2], [3]])).toThrow(KernelShapeError);
	});

	it("rejects combining kernels of different shapes", () => {
		expect(() => Kernel.square(3).add(Kernel.square(5))).toThrow(KernelShapeError);
	});

	it("normalizes to a unit sum", () => {
		const k = new Kernel([
			[1, 2],
			[3, 4],
		]).normalize();
		expect(k.toArray()).toEqual([
			[0.1, 0.2],
			[0.3, 0.4],
		]);
		expect(k.sum()).toBeCloseTo(1, 12);
	});

	it("returns itself when normalizing a zero-sum kernel", () => {
		const k = Kernel.laplacian();
		expect(k.normalize()).toBe(k);
	});

	it("builds a centered, normalized gaussian", () => {
		const g = Kernel.gaussian(5, 1.4);
		expect(g.sum()).toBeCloseTo(1, 12);
		expect(g.weight(0, 0)).toBeCloseTo(g.weight(4, 4), 15);
		expect(g.weight(0, 2)).toBeCloseTo(g.weight(2, 0), 15);
		expect(g.weight(2, 2)).toBeGreaterThan(g.weight(1, 2));
		expect(() => Kernel.gaussian(4, 1)).toThrow(InvalidArgumentError);
		expect(() => Kernel.gaussian(3, 0)).toThrow(InvalidArgumentError);
	});

	it("adds the two sobel kernels", () => {
		expect(Kernel.sobel().toArray()).toEqual([
			[2, 2, 0],
			[2, 0, -2],
			[0, -2, -2],
		]);
	});

	it("keeps edge and border through arithmetic", () => {
		const k = Kernel.boxBlur(3).withEdgeStrategy("wrap").withBorder(0.5);
		const doubled = k.add(k);
		expect(doubled.edgeStrategy).toBe("wrap");
		expect(doubled.border).toBe(0.5);
		expect(doubled.weight(1, 1)).toBeCloseTo(2 / 9, 15);
	});

	it.each([
		["constant", [0, 0.1, 0.2]],
		["extend", [0.1, 0.1, 0.2]],
		["wrap", [0.3, 0.1, 0.2]],
		["mirror", [0.2, 0.1, 0.2]],
	] as const)("samples past the left edge under %s", (edge, expected) => {
		const src = row([0.1, 0.2, 0.3]);
		const out = evaluate(shiftRight(edge), Input.of(src), src.newLike());
		expect(Array.from(out.data)).toEqual(expected);
	});

	it("reads the border value for constant samples", () => {
		const src = row([0.1, 0.2, 0.3]);
		const k = new Kernel([[1, 0, 0]], { edge: "constant", border: 0.75 });
		const out = evaluate(k, Input.of(src), src.newLike());
		expect(out.getF(0, 0, 0)).toBe(0.75);
	});

	it("averages a uniform image to itself with extend", () => {
		const src = Image.fromValues(3, 3, "gray", new Array(9).fill(0.5), { type: "f64" });
		const out = evaluate(
			Kernel.boxBlur(3).withEdgeStrategy("extend"),
			Input.of(src),
			src.newLike(),
		);
		for (const v of out.data) expect(v).toBeCloseTo(0.5, 12);
	});

	it("darkens corners and edges under a zero constant border", () => {
		const src = Image.fromValues(3, 3, "gray", new Array(9).fill(1), { type: "f64" });
		const out = evaluate(Kernel.boxBlur(3).withBorder(0), Input.of(src), src.newLike());
		expect(out.getF(0, 0, 0)).toBeCloseTo(4 / 9, 12);
		expect(out.getF(1, 0, 0)).toBeCloseTo(6 / 9, 12);
		expect(out.getF(1, 1, 0)).toBeCloseTo(1, 12);
	});

	it("runs even-sized kernels", () => {
		const src = row([0.25, 0.5]);
		const k = new Kernel([[1, 1]], { edge: "extend" });
		const out = evaluate(k, Input.of(src), src.newLike());
		// offsets -1 and 0
		expect(Array.from(out.data)).toEqual([0.5, 0.75]);
	});
});
