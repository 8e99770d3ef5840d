import { parentPort, workerData } from "node:worker_threads";
import * as Comlink from "comlink";
import { LOG_LEVELS, logLevelStore } from "../store.js";
import { bandApi } from "./band.core.js";
import { portEndpoint } from "./utils.js";

if (!parentPort) {
	throw new Error("band.worker must be started with worker_threads");
}

const level: unknown = workerData?.logLevel;
const known = LOG_LEVELS.find((l) => l === level);
if (known) logLevelStore.set(known);

Comlink.expose(bandApi, portEndpoint(parentPort));
