export * from "./algorithms/index.js";
export * from "./errors.js";
export * from "./store.js";
export type * from "./types.js";
export * from "./utils/color-utils.js";
export { Image, type ImageOptions, type NewLikeOptions } from "./utils/image.js";
export { type Logger, type LogSink, createLogger, setLogSink } from "./utils/logger.js";
export * from "./utils/pixel-logic.js";
export { Pixel } from "./utils/pixel.js";
export {
	type BandPool,
	type ThreadPoolOptions,
	createInlinePool,
	createThreadPool,
	evaluateParallel,
} from "./workers/pool.js";
export { partitionRows } from "./workers/utils.js";
