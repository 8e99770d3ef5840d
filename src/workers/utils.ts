import type { Endpoint } from "comlink";
import type { Band } from "../types.js";
import type { Image } from "../utils/image.js";

/** The part of a `worker_threads` MessagePort or Worker that comlink needs. */
export interface NodePort {
	postMessage(value: unknown, transferList?: readonly ArrayBuffer[]): void;
	on(event: "message", listener: (value: unknown) => void): unknown;
	off(event: "message", listener: (value: unknown) => void): unknown;
	start?(): void;
}

/**
 * Adapts a Node port to comlink's DOM-style endpoint: payloads are wrapped
 * in a MessageEvent, and only ArrayBuffers are forwarded as transferables.
 */
export const portEndpoint = (port: NodePort): Endpoint => {
	const handlers = new WeakMap<
		EventListenerOrEventListenerObject,
		(data: unknown) => void
	>();
	return {
		postMessage: (message: unknown, transfer?: Transferable[]) => {
			port.postMessage(
				message,
				transfer?.filter((t): t is ArrayBuffer => t instanceof ArrayBuffer),
			);
		},
		addEventListener: (_type: string, listener: EventListenerOrEventListenerObject) => {
			const handler = (data: unknown) => {
				const event = new MessageEvent("message", { data });
				if (typeof listener === "function") listener(event);
				else listener.handleEvent(event);
			};
			handlers.set(listener, handler);
			port.on("message", handler);
		},
		removeEventListener: (_type: string, listener: EventListenerOrEventListenerObject) => {
			const handler = handlers.get(listener);
			if (!handler) return;
			handlers.delete(listener);
			port.off("message", handler);
		},
		start: port.start?.bind(port),
	};
};

/** Splits `[0, height)` into at most `parts` contiguous, disjoint row bands. */
export const partitionRows = (height: number, parts: number): Band[] => {
	const count = Math.min(Math.max(1, Math.floor(parts)), height);
	const bands: Band[] = [];
	const base = Math.floor(height / Math.max(1, count));
	const extra = height % Math.max(1, count);
	let start = 0;
	for (let i = 0; i < count; i++) {
		const end = start + base + (i < extra ? 1 : 0);
		bands.push({ start, end });
		start = end;
	}
	return bands;
};

/** Workers can only write into memory they share with the caller. */
export const ensureShared = (image: Image): Image =>
	image.shared ? image : image.toShared();
