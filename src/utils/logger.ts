import { type LogLevel, logLevelStore } from "../store.js";

export type LogSink = (level: Exclude<LogLevel, "silent">, ...args: unknown[]) => void;

const RANK: Readonly<Record<LogLevel, number>> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
	silent: 4,
};

const consoleSink: LogSink = (level, ...args) => {
	switch (level) {
		case "debug":
			console.debug(...args);
			break;
		case "info":
			console.log(...args);
			break;
		case "warn":
			console.warn(...args);
			break;
		case "error":
			console.error(...args);
			break;
	}
};

let sink: LogSink = consoleSink;

/** Replaces console output, e.g. to capture lines in tests. `null` restores the console. */
export const setLogSink = (next: LogSink | null): void => {
	sink = next ?? consoleSink;
};

export interface Logger {
	debug(message: string, ...args: unknown[]): void;
	info(message: string, ...args: unknown[]): void;
	warn(message: string, ...args: unknown[]): void;
	error(message: string, ...args: unknown[]): void;
}

/** Lines are prefixed `[scope]` and dropped below `logLevelStore`. */
export const createLogger = (scope: string): Logger => {
	const emit =
		(level: Exclude<LogLevel, "silent">) =>
		(message: string, ...args: unknown[]) => {
			if (RANK[level] < RANK[logLevelStore.get()]) return;
			sink(level, `[${scope}] ${message}`, ...args);
		};
	return {
		debug: emit("debug"),
		info: emit("info"),
		warn: emit("warn"),
		error: emit("error"),
	};
};
