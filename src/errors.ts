/**
 * Base class for errors raised by the engine. Filters themselves never throw
 * for valid coordinates; these cover construction and configuration mistakes.
 */
export class FilterEngineError extends Error {
	constructor(
		message: string,
		public readonly code: string,
	) {
		super(message);
		this.name = "FilterEngineError";
	}
}

/** Kernel data is empty or ragged, or two kernels of different shapes were combined. */
export class KernelShapeError extends FilterEngineError {
	constructor(detail: string) {
		super(detail, "KERNEL_SHAPE");
		this.name = "KernelShapeError";
	}
}

export class InvalidArgumentError extends FilterEngineError {
	constructor(detail: string) {
		super(detail, "INVALID_ARGUMENT");
		this.name = "InvalidArgumentError";
	}
}

/** A cooperative task was stepped after it completed, or a bound filter was used unprepared. */
export class TaskStateError extends FilterEngineError {
	constructor(detail: string) {
		super(detail, "TASK_STATE");
		this.name = "TaskStateError";
	}
}

/** A worker thread exited while the pool was still in use. */
export class WorkerExitError extends FilterEngineError {
	constructor(detail: string) {
		super(detail, "WORKER_EXIT");
		this.name = "WorkerExitError";
	}
}
