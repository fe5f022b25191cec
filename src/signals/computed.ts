/**
 * Computed - A derived reactive value.
 */

import { setContext } from "./context.js";
import {
  prepareSources,
  cleanupSources,
  disposeSources,
  sourcesChanged,
  type Node,
  type Observer,
} from "./graph.js";
import { Reactive, type ReactiveOptions } from "./signal.js";
import { registerDisposer } from "./scope.js";
import { CyclicDependencyError } from "./errors.js";

/**
 * A derived reactive value.
 *
 * Computeds track their dependencies automatically and are evaluated
 * lazily: the function only runs when the value is read and a dependency
 * changed since the last evaluation. When a dependency changes, the computed
 * is only marked dirty and forwards the notification to its own targets.
 *
 * Errors thrown by the function are cached and rethrown on every read until
 * a dependency changes.
 *
 * @example
 * const count = signal(1);
 * const doubled = computed(() => count.value * 2);
 * doubled.value; // 2
 * count.value = 2;
 * doubled.value; // 4 (recomputed because count changed)
 */
export class Computed<T> extends Reactive<T> implements Observer {
  readonly kind = "computed";

  #fn: (() => T) | undefined; // The computation function (undefined when disposed)
  #value: T | undefined; // Cached computed value
  #error: unknown; // Cached error, meaningful only when #failed
  #failed = false;
  #dirty = true; // Whether the cache may be stale
  #computing = false; // Set while the function runs, to detect cycles
  #evaluated = false; // Whether the function ran at least once

  /** Head of linked list of Nodes where this computed is the target */
  sources: Node | undefined;

  constructor(fn: () => T, options?: ReactiveOptions<T>) {
    super(options);
    this.#fn = fn;

    // Auto-register disposal in current scope
    registerDisposer(() => this.dispose());
  }

  get value(): T {
    this.refresh();
    // Tracked before a cached error is rethrown, so readers that catch it
    // are still notified once it goes away
    this.track();
    return this.#current();
  }

  peek(): T {
    this.refresh();
    return this.#current();
  }

  #current(): T {
    if (this.#computing) {
      throw new CyclicDependencyError(
        `Cycle detected: computed ${this.label} depends on itself`,
      );
    }
    if (this.#failed) throw this.#error;
    return this.#value as T;
  }

  /** Whether the computed has been disposed */
  get disposed(): boolean {
    return !this.#fn;
  }

  /**
   * Dispose this computed, removing all dependency links.
   * After disposal, reads return the last value and it never updates again.
   */
  dispose(): void {
    if (!this.#fn) return;
    this.#fn = undefined;
    // Unlinked when the running evaluation completes
    if (this.#computing) return;
    disposeSources(this);
    this.#dirty = false;
  }

  /**
   * Mark this computed as possibly changed.
   * @internal
   */
  notify(): boolean {
    if (this.#dirty) return false;
    this.#dirty = true;
    return true;
  }

  /**
   * Bring the cached value up to date.
   *
   * If the computed was evaluated before, its sources are checked first:
   * when none of them actually changed, the cache is kept as-is.
   * @internal
   */
  refresh(): void {
    if (!this.#dirty || this.#computing) return;
    if (!this.#fn) {
      this.#dirty = false;
      return;
    }
    if (this.#evaluated) {
      // Held while sources refresh: a cycle in the graph must not recurse
      this.#computing = true;
      let changed: boolean;
      try {
        changed = sourcesChanged(this);
      } finally {
        this.#computing = false;
      }
      if (!this.#fn) {
        // Disposed by a source while refreshing
        disposeSources(this);
        this.#dirty = false;
        return;
      }
      if (!changed) {
        this.#dirty = false;
        return;
      }
    }
    this.#recompute(this.#fn);
  }

  /**
   * Recompute this computed's value.
   *
   * The algorithm has three phases:
   * 1. Prepare: Mark all current dependencies for potential removal
   * 2. Execute: Run the function (which will re-track still-needed dependencies)
   * 3. Cleanup: Remove dependencies that weren't re-tracked
   *
   * This allows the dependency set to change dynamically based on conditional logic
   * in the computation function.
   */
  #recompute(fn: () => T): void {
    this.#computing = true;
    prepareSources(this);
    const prev = setContext(this);
    try {
      const value = fn();
      if (
        !this.#evaluated ||
        this.#failed ||
        !this.equals(this.#value as T, value)
      ) {
        this.#value = value;
        this.#failed = false;
        this.#error = undefined;
        this.version++;
      }
    } catch (e) {
      this.#failed = true;
      this.#error = e;
      this.version++;
    } finally {
      setContext(prev);
      cleanupSources(this);
      this.#evaluated = true;
      this.#dirty = false;
      this.#computing = false;
      if (!this.#fn) disposeSources(this);
    }
  }
}

/** Create a new computed from the given function. */
export const computed = <T>(fn: () => T, options?: ReactiveOptions<T>) =>
  new Computed(fn, options);
