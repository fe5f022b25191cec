/**
 * Effect - Run side effects reactively.
 */

import {
  setContext,
  untracked,
  startBatch,
  endBatch,
  enqueueEffect,
} from "./context.js";
import {
  prepareSources,
  cleanupSources,
  disposeSources,
  refreshSources,
  sourcesChanged,
  type Node,
  type Observer,
} from "./graph.js";
import { registerDisposer } from "./scope.js";

/** Cleanup callback an effect may return */
export type EffectCleanup = () => void;

/** Effect body. A returned function is called before the next run and on dispose. */
export type EffectFn = () => void | EffectCleanup;

/**
 * A side-effecting subscriber. Runs once on creation, then again whenever
 * one of the values it read changes.
 *
 * Lifecycle: created → running → idle → running → ... → disposed.
 * Disposal is terminal: a disposed effect is never scheduled or run again.
 */
export class Effect implements Observer {
  readonly kind = "effect";

  #fn: EffectFn | undefined; // undefined once disposed
  #cleanup: EffectCleanup | undefined;
  #running = false;

  /** Head of linked list of Nodes where this effect is the target */
  sources: Node | undefined;

  constructor(fn: EffectFn) {
    this.#fn = fn;

    // Auto-register disposal in current scope, ahead of anything the first run creates
    registerDisposer(() => this.dispose());

    // Writes made by the first run are flushed once it completes. If either
    // fails, the caller gets no dispose function: the effect stops here.
    try {
      startBatch();
      try {
        this.#execute(fn);
      } finally {
        endBatch();
      }
    } catch (e) {
      this.dispose();
      throw e;
    }
  }

  /** Whether the effect has been disposed */
  get disposed(): boolean {
    return !this.#fn;
  }

  /**
   * Stop the effect: run its pending cleanup and drop all dependencies.
   * Safe to call more than once, and from inside the effect itself.
   */
  dispose(): void {
    if (!this.#fn) return;
    this.#fn = undefined;
    // Torn down when the running body returns
    if (this.#running) return;
    this.#teardown();
  }

  /**
   * Called by sources when they may have changed.
   * @internal
   */
  notify(): boolean {
    if (this.#fn) enqueueEffect(this);
    return false;
  }

  /**
   * Re-run the effect if one of its sources actually changed.
   * Called by the batch queue.
   * @internal
   */
  run(): void {
    const fn = this.#fn;
    if (!fn || !sourcesChanged(this)) return;
    // A source may have disposed this effect while refreshing
    if (!this.#fn) return;
    this.#execute(fn);
  }

  /**
   * Bring the computeds this effect reads up to date without running it.
   * Used when the batch queue drops the effect, so that later writes are
   * forwarded to it again.
   * @internal
   */
  settle(): void {
    if (this.#fn) refreshSources(this);
  }

  #execute(fn: EffectFn): void {
    this.#runCleanup();
    this.#running = true;
    prepareSources(this);
    const prev = setContext(this);
    try {
      const cleanup = fn();
      if (typeof cleanup === "function") this.#cleanup = cleanup;
    } finally {
      setContext(prev);
      cleanupSources(this);
      this.#running = false;
      if (!this.#fn) this.#teardown();
    }
  }

  #runCleanup(): void {
    const cleanup = this.#cleanup;
    if (!cleanup) return;
    this.#cleanup = undefined;
    untracked(cleanup);
  }

  #teardown(): void {
    disposeSources(this);
    this.#runCleanup();
  }
}

/**
 * Create a reactive effect that automatically tracks dependencies
 * and re-runs when they change.
 *
 * @param fn - The effect function to run, optionally returning a cleanup
 * @returns A dispose function to stop the effect
 *
 * @example
 * const count = signal(0);
 * const dispose = effect(() => {
 *   console.log("Count is:", count.value);
 * });
 *
 * count.value = 1; // logs: "Count is: 1"
 * dispose(); // stop the effect
 */
export function effect(fn: EffectFn): () => void {
  const e = new Effect(fn);
  return () => e.dispose();
}
