/**
 * Reactive signals with automatic dependency tracking.
 *
 * Every read inside a computed or effect records an edge in the dependency
 * graph; the edges are rebuilt on each evaluation, so conditional reads
 * never leave stale subscriptions behind. Writes mark dependents dirty and
 * schedule effects, which run once the outermost batch completes.
 */

export {
  Signal,
  signal,
  isSignal,
  type Reactive,
  type ReactiveOptions,
  type ReadonlySignal,
} from "./signal.js";
export { Computed, computed } from "./computed.js";
export {
  Effect,
  effect,
  type EffectFn,
  type EffectCleanup,
} from "./effect.js";
export { store } from "./store.js";
export { scope } from "./scope.js";
export { batch, untracked, type Subscriber } from "./context.js";
export {
  ReactivityError,
  CyclicDependencyError,
  BatchDepthError,
} from "./errors.js";
