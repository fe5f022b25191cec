export {
  signal,
  computed,
  effect,
  store,
  batch,
  untracked,
  scope,
  isSignal,
  Signal,
  Computed,
  Effect,
  ReactivityError,
  CyclicDependencyError,
  BatchDepthError,
} from "./signals/index.js";
export type {
  Reactive,
  ReactiveOptions,
  ReadonlySignal,
  Subscriber,
  EffectFn,
  EffectCleanup,
} from "./signals/index.js";
