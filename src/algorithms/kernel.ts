import { InvalidArgumentError, KernelShapeError } from "../errors.js";
import { constantBorderStore } from "../store.js";
import type { EdgeStrategy, Filter } from "../types.js";
import type { Pixel } from "../utils/pixel.js";
import { type Point, point } from "../utils/pixel-logic.js";
import type { Input } from "./input.js";

/**
 * Maps a possibly out-of-range coordinate onto `[0, max]`.
 *
 * `constant` passes the value through; the kernel substitutes its border
 * value for coordinates that are still out of range.
 */
export const mapEdge = (
	strategy: EdgeStrategy,
	value: number,
	max: number,
): number => {
	switch (strategy) {
		case "constant":
			return value;
		case "extend":
			return value < 0 ? 0 : value > max ? max : value;
		case "wrap": {
			const n = max + 1;
			return ((value % n) + n) % n;
		}
		case "mirror": {
			// Reflect without repeating the edge sample: -1 -> 1, max + 1 -> max - 1
			if (max <= 0) return 0;
			const period = 2 * max;
			const r = ((value % period) + period) % period;
			return r <= max ? r : period - r;
		}
	}
};

export interface KernelOptions {
	edge?: EdgeStrategy;
	/** Value read for out-of-range samples under the `constant` strategy. */
	border?: number;
}

type Weights = ReadonlyArray<ReadonlyArray<number>>;

/** Immutable 2D convolution kernel, evaluated as a spatial filter. */
export class Kernel implements Filter {
	readonly requiresIntermediateImage = true;
	readonly rows: number;
	readonly cols: number;
	readonly edgeStrategy: EdgeStrategy;
	readonly border: number;
	private readonly weights: Float64Array;

	constructor(data: Weights, options: KernelOptions = {}) {
		const rows = data.length;
		const cols = rows > 0 ? data[0].length : 0;
		if (rows === 0 || cols === 0) {
			throw new KernelShapeError("Kernel: data must have at least one row and column");
		}
		const weights = new Float64Array(rows * cols);
		data.forEach((row, j) => {
			if (row.length !== cols) {
				throw new KernelShapeError(
					`Kernel: row ${j} has ${row.length} columns, expected ${cols}`,
				);
			}
			weights.set(row, j * cols);
		});
		this.rows = rows;
		this.cols = cols;
		this.weights = weights;
		this.edgeStrategy = options.edge ?? "constant";
		this.border = options.border ?? constantBorderStore.get();
	}

	static zeros(rows: number, cols: number): Kernel {
		return Kernel.create(rows, cols, () => 0);
	}

	static square(n: number): Kernel {
		return Kernel.zeros(n, n);
	}

	/** Fills a kernel by calling `f(col, row)` for every cell. */
	static create(
		rows: number,
		cols: number,
		f: (col: number, row: number) => number,
	): Kernel {
		const data: number[][] = [];
		for (let j = 0; j < rows; j++) {
			const row: number[] = [];
			for (let i = 0; i < cols; i++) row.push(f(i, j));
			data.push(row);
		}
		return new Kernel(data);
	}

	/** Normalized, centered `n x n` gaussian; `n` must be odd. */
	static gaussian(n: number, std: number): Kernel {
		if (!Number.isInteger(n) || n < 1 || n % 2 === 0) {
			throw new InvalidArgumentError(`Kernel.gaussian: size must be odd, got ${n}`);
		}
		if (!(std > 0)) {
			throw new InvalidArgumentError(`Kernel.gaussian: std must be positive, got ${std}`);
		}
		const c = n >> 1;
		const std2 = std * std;
		const a = 1 / (2 * Math.PI * std2);
		return Kernel.create(n, n, (i, j) => {
			const d2 = (i - c) * (i - c) + (j - c) * (j - c);
			return a * Math.exp(-d2 / (2 * std2));
		}).normalize();
	}

	static gaussian3x3(): Kernel {
		return Kernel.gaussian(3, 1.4);
	}

	static gaussian5x5(): Kernel {
		return Kernel.gaussian(5, 1.4);
	}

	static gaussian7x7(): Kernel {
		return Kernel.gaussian(7, 1.4);
	}

	static gaussian9x9(): Kernel {
		return Kernel.gaussian(9, 1.4);
	}

	static boxBlur(n: number): Kernel {
		return Kernel.create(n, n, () => 1).normalize();
	}

	static sobelX(): Kernel {
		return new Kernel([
			[1, 0, -1],
			[2, 0, -2],
			[1, 0, -1],
		]);
	}

	static sobelY(): Kernel {
		return new Kernel([
			[1, 2, 1],
			[0, 0, 0],
			[-1, -2, -1],
		]);
	}

	static sobel(): Kernel {
		return Kernel.sobelX().add(Kernel.sobelY());
	}

	static laplacian(): Kernel {
		return new Kernel([
			[0, -1, 0],
			[-1, 4, -1],
			[0, -1, 0],
		]);
	}

	weight(row: number, col: number): number {
		return this.weights[row * this.cols + col];
	}

	sum(): number {
		let total = 0;
		for (const w of this.weights) total += w;
		return total;
	}

	toArray(): number[][] {
		const out: number[][] = [];
		for (let j = 0; j < this.rows; j++) {
			out.push(Array.from(this.weights.subarray(j * this.cols, (j + 1) * this.cols)));
		}
		return out;
	}

	private withWeights(weights: ArrayLike<number>, options: KernelOptions = {}): Kernel {
		const flat = Array.from(weights);
		const data: number[][] = [];
		for (let j = 0; j < this.rows; j++) {
			data.push(flat.slice(j * this.cols, (j + 1) * this.cols));
		}
		return new Kernel(data, {
			edge: options.edge ?? this.edgeStrategy,
			border: options.border ?? this.border,
		});
	}

	/** Kernel scaled so its weights sum to 1; unchanged when the sum is 0. */
	normalize(): Kernel {
		const total = this.sum();
		if (total === 0) return this;
		return this.withWeights(this.weights.map((w) => w / total));
	}

	withEdgeStrategy(edge: EdgeStrategy): Kernel {
		return this.withWeights(this.weights, { edge });
	}

	withBorder(border: number): Kernel {
		return this.withWeights(this.weights, { border });
	}

	private combine(other: Kernel, op: (a: number, b: number) => number, name: string): Kernel {
		if (other.rows !== this.rows || other.cols !== this.cols) {
			throw new KernelShapeError(
				`Kernel.${name}: ${this.rows}x${this.cols} and ${other.rows}x${other.cols} differ`,
			);
		}
		return this.withWeights(this.weights.map((w, i) => op(w, other.weights[i])));
	}

	add(other: Kernel): Kernel {
		return this.combine(other, (a, b) => a + b, "add");
	}

	sub(other: Kernel): Kernel {
		return this.combine(other, (a, b) => a - b, "sub");
	}

	mul(other: Kernel): Kernel {
		return this.combine(other, (a, b) => a * b, "mul");
	}

	div(other: Kernel): Kernel {
		return this.combine(other, (a, b) => a / b, "div");
	}

	computeAt(pt: Point, input: Input, dest: Pixel): void {
		const { width, height } = input.dimensions();
		const acc = input.newPixel();
		const channels = acc.length;
		const r2 = this.rows >> 1;
		const c2 = this.cols >> 1;

		for (let ky = 0; ky < this.rows; ky++) {
			const sy = mapEdge(this.edgeStrategy, pt.y + ky - r2, height - 1);
			const rowOutside = sy < 0 || sy >= height;
			for (let kx = 0; kx < this.cols; kx++) {
				const w = this.weights[ky * this.cols + kx];
				const sx = mapEdge(this.edgeStrategy, pt.x + kx - c2, width - 1);
				if (rowOutside || sx < 0 || sx >= width) {
					for (let c = 0; c < channels; c++) acc.data[c] += this.border * w;
					continue;
				}
				const src = point(sx, sy);
				for (let c = 0; c < channels; c++) {
					acc.data[c] += input.getF(src, c) * w;
				}
			}
		}
		acc.copyTo(dest);
	}
}
