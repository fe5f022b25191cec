/**
 * Global state and batching for the reactive system.
 */

import type { Effect } from "./effect.js";
import type { Observer } from "./graph.js";
import { BatchDepthError, CyclicDependencyError } from "./errors.js";
import { unowned } from "./scope.js";

/** Callback function for subscribers */
export type Subscriber<T = void> = (value: T) => void;

/** The currently executing observer (for dependency tracking) */
export let context: Observer | undefined;

/**
 * Set the current execution context.
 * @returns The previous context, to be restored by the caller.
 */
export function setContext(observer: Observer | undefined): Observer | undefined {
  const prev = context;
  context = observer;
  return prev;
}

/**
 * Run a function without tracking any reactive reads.
 *
 * @example
 * effect(() => {
 *   // Re-runs when `a` changes, but not when `b` changes
 *   console.log(a.value, untracked(() => b.value));
 * });
 */
export function untracked<T>(fn: () => T): T {
  const prev = setContext(undefined);
  try {
    return fn();
  } finally {
    setContext(prev);
  }
}

/** Maximum number of flush rounds before an effect loop is reported */
export const MAX_FLUSH_ROUNDS = 100;

/** Batching: defer effect runs until the outermost batch completes */
let batchDepth = 0;
const batchQueue = new Set<Effect>();

/** Enter a batch. Must be paired with `endBatch()`. */
export function startBatch(): void {
  batchDepth++;
}

/**
 * Leave a batch. When leaving the outermost batch, queued effects are run.
 *
 * The depth is held at one while flushing, so writes performed by effects
 * are queued for the next round instead of running re-entrantly.
 */
export function endBatch(): void {
  if (batchDepth === 0) throw new BatchDepthError();
  if (batchDepth > 1) {
    batchDepth--;
    return;
  }

  let failed = false;
  let error: unknown;
  let rounds = 0;
  try {
    while (batchQueue.size) {
      if (++rounds > MAX_FLUSH_ROUNDS) {
        const dropped = [...batchQueue];
        batchQueue.clear();
        // Dirty computeds would stop forwarding to the dropped effects
        for (const job of dropped) unowned(() => job.settle());
        batchQueue.clear();
        throw new CyclicDependencyError(
          `Effects did not settle after ${MAX_FLUSH_ROUNDS} flush rounds`,
        );
      }
      const pending = [...batchQueue];
      batchQueue.clear();
      for (const job of pending) {
        try {
          // Re-runs belong to the effect, not to a scope that happens to be open
          unowned(() => job.run());
        } catch (e) {
          if (!failed) {
            failed = true;
            error = e;
          }
        }
      }
    }
  } finally {
    batchDepth--;
  }
  if (failed) throw error;
}

/**
 * Batch multiple signal updates into a single notification pass.
 * Effects are only run after the outermost batch function completes,
 * and each effect runs at most once per pass.
 *
 * @example
 * batch(() => {
 *   first.value = 1;
 *   second.value = 2;
 * }); // Effects depending on both run once
 */
export function batch<T>(fn: () => T): T {
  startBatch();
  try {
    return fn();
  } finally {
    endBatch();
  }
}

/** Check if currently batching */
export function isBatching(): boolean {
  return batchDepth > 0;
}

/** Add an effect to the batch queue */
export function enqueueEffect(effect: Effect): void {
  batchQueue.add(effect);
}
