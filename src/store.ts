import { availableParallelism } from "node:os";
import { atom, computed } from "nanostores";
import { InvalidArgumentError } from "./errors.js";
import type { AsyncMode } from "./types.js";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: ReadonlyArray<LogLevel> = [
	"debug",
	"info",
	"warn",
	"error",
	"silent",
];

const defaultWorkers = Math.max(1, availableParallelism() - 1);

// Engine defaults, read at call time
export const asyncModeStore = atom<AsyncMode>("row");
export const stepsPerTickStore = atom<number>(64);
export const workerCountStore = atom<number>(defaultWorkers);
export const gammaStore = atom<number>(2.2);
export const constantBorderStore = atom<number>(0);
export const logLevelStore = atom<LogLevel>("warn");

// Progress of the running cooperative or parallel evaluation
export const isProcessingStore = atom<boolean>(false);
export const progressStore = atom<number>(0);

export const engineConfig = computed(
	[
		asyncModeStore,
		stepsPerTickStore,
		workerCountStore,
		gammaStore,
		constantBorderStore,
		logLevelStore,
	],
	(asyncMode, stepsPerTick, workerCount, gamma, constantBorder, logLevel) => ({
		asyncMode,
		stepsPerTick,
		workerCount,
		gamma,
		constantBorder,
		logLevel,
	}),
);

export type EngineConfig = ReturnType<typeof engineConfig.get>;

const positiveInteger = (name: string, value: number): number => {
	if (!Number.isInteger(value) || value < 1) {
		throw new InvalidArgumentError(`${name} must be a positive integer, got ${value}`);
	}
	return value;
};

const finite = (name: string, value: number): number => {
	if (!Number.isFinite(value)) {
		throw new InvalidArgumentError(`${name} must be a finite number, got ${value}`);
	}
	return value;
};

/** Validates and applies a partial configuration. */
export const configure = (options: Partial<EngineConfig>): void => {
	const { asyncMode, stepsPerTick, workerCount, gamma, constantBorder, logLevel } =
		options;
	if (asyncMode !== undefined) {
		if (asyncMode !== "row" && asyncMode !== "pixel") {
			throw new InvalidArgumentError(`asyncMode must be "row" or "pixel", got ${asyncMode}`);
		}
		asyncModeStore.set(asyncMode);
	}
	if (stepsPerTick !== undefined) {
		stepsPerTickStore.set(positiveInteger("stepsPerTick", stepsPerTick));
	}
	if (workerCount !== undefined) {
		workerCountStore.set(positiveInteger("workerCount", workerCount));
	}
	if (gamma !== undefined) {
		const g = finite("gamma", gamma);
		if (g <= 0) throw new InvalidArgumentError(`gamma must be positive, got ${g}`);
		gammaStore.set(g);
	}
	if (constantBorder !== undefined) {
		constantBorderStore.set(finite("constantBorder", constantBorder));
	}
	if (logLevel !== undefined) {
		if (!LOG_LEVELS.includes(logLevel)) {
			throw new InvalidArgumentError(`unknown log level ${logLevel}`);
		}
		logLevelStore.set(logLevel);
	}
};

export const ENV_PREFIX = "PIXEL_FILTERS_";

/** Reads `PIXEL_FILTERS_*` variables; unset variables leave their atom alone. */
export const configureFromEnv = (
	env: Record<string, string | undefined> = process.env,
): void => {
	const read = (key: string) => {
		const value = env[ENV_PREFIX + key]?.trim();
		return value ? value : undefined;
	};
	const num = (key: string) => {
		const value = read(key);
		return value === undefined ? undefined : Number(value);
	};
	const mode = read("ASYNC_MODE");
	const level = read("LOG_LEVEL");
	configure({
		asyncMode: mode === undefined ? undefined : toAsyncMode(mode),
		stepsPerTick: num("STEPS_PER_TICK"),
		workerCount: num("WORKERS"),
		gamma: num("GAMMA"),
		constantBorder: num("BORDER"),
		logLevel: level === undefined ? undefined : toLogLevel(level),
	});
};

const toAsyncMode = (value: string): AsyncMode => {
	if (value === "row" || value === "pixel") return value;
	throw new InvalidArgumentError(`asyncMode must be "row" or "pixel", got ${value}`);
};

const toLogLevel = (value: string): LogLevel => {
	const level = LOG_LEVELS.find((l) => l === value);
	if (!level) throw new InvalidArgumentError(`unknown log level ${value}`);
	return level;
};
