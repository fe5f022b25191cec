/**
 * Error conditions raised by the reactive system itself.
 *
 * Errors thrown by user code (computed functions, effects, cleanups) are
 * never wrapped: they propagate as-is.
 */

/** Base class for every error raised by the library. */
export class ReactivityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A computed was read while it was still evaluating, or effects kept
 * re-triggering each other past the flush limit.
 */
export class CyclicDependencyError extends ReactivityError {}

/** `endBatch()` was called more times than `startBatch()`. */
export class BatchDepthError extends ReactivityError {
  constructor() {
    super("Batch depth underflow: endBatch() called without startBatch()");
  }
}
