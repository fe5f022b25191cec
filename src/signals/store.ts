/**
 * Store - Reactive wrapper for plain objects.
 */

import { Signal } from "./signal.js";
import { batch } from "./context.js";

/** Symbol to mark objects as already wrapped by store() */
const STORE = Symbol();

/** Check if value is a plain object (not array, null, or class instance) */
const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  value !== null &&
  typeof value === "object" &&
  Object.getPrototypeOf(value) === Object.prototype;

/** Recursively wrap nested objects and arrays */
const wrap = (value: unknown): unknown => {
  if (value !== null && typeof value === "object" && STORE in value) {
    return value; // Already a store
  }
  if (isPlainObject(value)) return store(value);
  if (Array.isArray(value)) return value.map(wrap);
  return value;
};

/**
 * Create a reactive store from a plain object.
 *
 * Each string property is backed by a signal created on first access, and
 * nested plain objects and arrays are recursively wrapped. Adding or deleting
 * a property notifies readers of `in` checks and key enumeration.
 *
 * Array mutators (push, splice...) on a stored array do not notify: assign a
 * new array instead.
 *
 * @example
 * const state = store({ count: 0, user: { name: "Ada" } });
 * const doubled = computed(() => state.count * 2);
 * state.count = 1; // doubled is now 2
 * state.user.name = "Grace"; // nested objects are also reactive
 */
export function store<T extends object>(obj: T): T {
  const signals = new Map<string, Signal<unknown>>();
  // Bumped whenever a key is added or removed
  const shape = new Signal(0);

  /** Get or create a signal for a property */
  const getSignal = (target: T, key: string) => {
    let sig = signals.get(key);
    if (!sig) {
      sig = new Signal(wrap(Reflect.get(target, key)));
      signals.set(key, sig);
    }
    return sig;
  };

  return new Proxy(obj, {
    get(target, key) {
      // Symbols access the original object (for STORE check, etc.)
      if (typeof key === "symbol") return Reflect.get(target, key);
      return getSignal(target, key).value;
    },

    set(target, key, value) {
      if (typeof key === "symbol") return Reflect.set(target, key, value);
      const wrapped = wrap(value);
      const added = !Object.hasOwn(target, key);
      const sig = getSignal(target, key);
      Reflect.set(target, key, wrapped);
      batch(() => {
        sig.value = wrapped;
        if (added) shape.value++;
      });
      return true;
    },

    has(target, key) {
      if (key === STORE) return true;
      if (typeof key === "string") void shape.value;
      return Reflect.has(target, key);
    },

    deleteProperty(target, key) {
      if (typeof key === "symbol") return Reflect.deleteProperty(target, key);
      if (!Object.hasOwn(target, key)) return true;
      Reflect.deleteProperty(target, key);
      batch(() => {
        const sig = signals.get(key);
        if (sig) sig.value = undefined;
        shape.value++;
      });
      return true;
    },

    ownKeys(target) {
      void shape.value;
      return Reflect.ownKeys(target);
    },
  });
}
