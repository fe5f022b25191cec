/**
 * Signal - A reactive value container.
 */

import {
  context,
  startBatch,
  endBatch,
  untracked,
  type Subscriber,
} from "./context.js";
import { track, propagate, type Node, type Source } from "./graph.js";
import { effect } from "./effect.js";

/** Options accepted by signals and computeds. */
export interface ReactiveOptions<T> {
  /**
   * Equality used to skip no-op updates. Defaults to `Object.is`, so writing
   * `NaN` over `NaN` does not notify.
   */
  equals?: (previous: T, next: T) => boolean;
  /** Label used in warnings and error messages */
  name?: string;
}

/** Read-only view of a reactive value. */
export interface ReadonlySignal<T> {
  readonly value: T;
  peek(): T;
  subscribe(fn: Subscriber<T>): () => void;
}

/**
 * Abstract base class for reactive values (Signal and Computed).
 *
 * Holds the graph bookkeeping every source needs: the version counter,
 * the list of dependent edges and the cached edge for the current context.
 */
export abstract class Reactive<T> implements Source, ReadonlySignal<T> {
  /** Version counter, incremented when value changes. */
  #version = 0;

  /** Head of linked list of Nodes where this reactive is the source */
  #targets: Node | undefined;

  /** Cached Node for the current tracking context */
  #node: Node | undefined;

  readonly name: string | undefined;
  protected readonly equals: (previous: T, next: T) => boolean;

  constructor(options: ReactiveOptions<T> = {}) {
    this.name = options.name;
    this.equals = options.equals ?? Object.is;
  }

  abstract get value(): T;

  /** Read the value without tracking it as a dependency. */
  abstract peek(): T;

  /** @internal */
  abstract refresh(): void;

  /**
   * Subscribe to value changes. The callback is not called on subscription,
   * only after each change, and runs untracked.
   * @returns Unsubscribe function
   */
  subscribe(fn: Subscriber<T>): () => void {
    let initialized = false;
    return effect(() => {
      const value = this.value;
      if (!initialized) {
        initialized = true;
        return;
      }
      untracked(() => fn(value));
    });
  }

  toString(): string {
    return String(this.value);
  }

  /** Record a dependency if inside a computed or effect */
  protected track(): void {
    track(this);
  }

  // Accessors for cross-instance access (needed for dependency graph manipulation)
  /** @internal */
  get version(): number {
    return this.#version;
  }
  set version(v: number) {
    this.#version = v;
  }
  /** @internal */
  get targets(): Node | undefined {
    return this.#targets;
  }
  set targets(v: Node | undefined) {
    this.#targets = v;
  }
  /** @internal */
  get node(): Node | undefined {
    return this.#node;
  }
  set node(v: Node | undefined) {
    this.#node = v;
  }

  /** @internal */
  protected get label(): string {
    return this.name ? `"${this.name}"` : "(anonymous)";
  }
}

/**
 * A reactive value container.
 *
 * Signals are the atomic units of reactivity. When a signal's value changes,
 * all computeds that depend on it are marked dirty and every effect reading
 * it, directly or through computeds, is scheduled.
 *
 * @example
 * const count = signal(0);
 * count.value; // 0
 * count.value = 1; // Dependents are notified
 */
export class Signal<T> extends Reactive<T> {
  #value: T;

  constructor(value: T, options?: ReactiveOptions<T>) {
    super(options);
    this.#value = value;
  }

  get value(): T {
    this.track();
    return this.#value;
  }

  set value(v: T) {
    if (this.equals(this.#value, v)) return;
    if (context?.kind === "computed") {
      console.warn(
        `[signal] ${this.label} written while a computed was evaluating. Computeds should not have side effects.`,
      );
    }
    this.#value = v;
    this.version++;

    // A lone write is a batch of one: every dependent is marked before any effect runs
    startBatch();
    try {
      propagate(this.targets);
    } finally {
      endBatch();
    }
  }

  peek(): T {
    return this.#value;
  }

  /** @internal Signals are always up to date. */
  refresh(): void {}
}

/** Create a new signal with the given initial value. */
export const signal = <T>(value: T, options?: ReactiveOptions<T>) =>
  new Signal(value, options);

/** Check if a value is a reactive (Signal or Computed) */
export const isSignal = (value: unknown): value is Reactive<unknown> =>
  value instanceof Reactive;
