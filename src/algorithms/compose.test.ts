import { describe, expect, it } from "vitest";
import { TaskStateError } from "../errors.js";
import { Image } from "../utils/image.js";
import { Pixel } from "../utils/pixel.js";
import { type Point, point } from "../utils/pixel-logic.js";
import { AndThen, Join, Then, andThen, join, pipeline, sequence } from "./compose.js";
import { evaluate } from "./evaluate.js";
import { Input } from "./input.js";
import { Kernel } from "./kernel.js";
import { Brightness, Invert } from "./primitives.js";

const values = [0.1, 0.2, 0.3, 0.4, 0.5, 0.6, 0.7, 0.8, 0.9, 0.15, 0.25, 0.35];
const rgb = () => Image.fromValues(2, 2, "rgb", values, { type: "f64" });

describe("sequence", () => {
	it("fuses point filters without an intermediate image", () => {
		const src = rgb();
		const fused = src.apply(sequence(new Brightness(0.5), new Invert()));
		const stepwise = src.apply(new Brightness(0.5)).apply(new Invert());
		expect(Array.from(fused.data)).toEqual(Array.from(stepwise.data));
	});

	it("undoes itself when inverting twice", () => {
		const src = rgb();
		const out = src.apply(sequence(new Invert(), new Invert()));
		out.data.forEach((v, i) => expect(v).toBeCloseTo(values[i], 12));
	});

	it("materializes the first stage when the second samples neighbors", () => {
		const src = rgb();
		const blur = Kernel.boxBlur(3).withEdgeStrategy("extend");
		const chained = src.apply(new Then(new Invert(), blur));

		const intermediate = src.apply(new Invert(), src.newLike({ type: "f32" }));
		const manual = evaluate(blur, Input.of(intermediate), src.newLike());
		expect(Array.from(chained.data)).toEqual(Array.from(manual.data));
	});

	it("propagates its stages' requirements", () => {
		const pointwise = new Then(new Invert(), new Invert());
		expect(pointwise.requiresIntermediateImage).toBe(false);
		expect(pointwise.pointwise).toBe(true);

		const spatial = new Then(new Invert(), Kernel.boxBlur(3));
		expect(spatial.requiresIntermediateImage).toBe(true);
		expect(spatial.pointwise).toBe(false);
	});

	it("refuses to run a spatial second stage unprepared", () => {
		const chained = new Then(new Invert(), Kernel.boxBlur(3));
		expect(() =>
			chained.computeAt(point(0, 0), Input.of(rgb()), Pixel.zeros("rgb")),
		).toThrow(TaskStateError);
	});
});

describe("join", () => {
	it("merges both results per point", () => {
		const seen: Point[] = [];
		const merged = join(new Invert(), new Brightness(0.5), (pt, a, b) => {
			seen.push(pt);
			return a.sub(b);
		});
		const out = rgb().apply(merged);
		out.data.forEach((v, i) => expect(v).toBeCloseTo(1 - 1.5 * values[i], 12));
		expect(seen).toEqual([point(0, 0), point(1, 0), point(0, 1), point(1, 1)]);
	});

	it("hands the combiner pixels in the requested model", () => {
		const models: string[] = [];
		const merged = new Join(
			new Invert(),
			new Invert(),
			(_pt, a, b) => {
				models.push(a.model, b.model);
				return a;
			},
			"hsv",
		);
		rgb().apply(merged);
		expect(new Set(models)).toEqual(new Set(["hsv"]));
	});
});

describe("andThen", () => {
	it("lets the second filter overwrite the first", () => {
		const src = rgb();
		const both = src.apply(andThen(new Invert(), new Brightness(2)));
		const second = src.apply(new Brightness(2));
		expect(Array.from(both.data)).toEqual(Array.from(second.data));
		expect(both.data[0]).toBeCloseTo(0.2, 12);
	});

	it("is a point filter when both halves are", () => {
		expect(new AndThen(new Invert(), new Invert()).pointwise).toBe(true);
	});
});

describe("pipeline", () => {
	it("folds left", () => {
		const a = new Invert();
		const b = new Brightness(2);
		const c = new Invert();
		const p = pipeline(a, b, c);
		expect(p).toBeInstanceOf(Then);
		if (!(p instanceof Then)) return;
		expect(p.b).toBe(c);
		expect(p.a).toBeInstanceOf(Then);
		if (!(p.a instanceof Then)) return;
		expect(p.a.a).toBe(a);
		expect(p.a.b).toBe(b);
	});

	it("returns a lone filter unchanged", () => {
		const a = new Invert();
		expect(pipeline(a)).toBe(a);
	});
});

describe("module loading", () => {
	it("settles a dynamic import of the combinators", async () => {
		const mod = await import("./compose.js");
		expect(mod.sequence).toBe(sequence);
		expect("then" in mod).toBe(false);
	});

	it("settles a dynamic import of the package entry", async () => {
		const entry = await import("../index.js");
		expect(entry.Then).toBe(Then);
		expect("then" in entry).toBe(false);
	});
});
