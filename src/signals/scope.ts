/**
 * Scope - Collect disposers for everything created inside a function.
 */

/** The innermost active scope's disposer list */
let currentDisposers: (() => void)[] | null = null;

/**
 * Register a disposer with the innermost active scope.
 * Outside of any scope this does nothing.
 * @internal
 */
export function registerDisposer(dispose: () => void): void {
  currentDisposers?.push(dispose);
}

/**
 * Run a function outside of any scope: nothing it creates is owned.
 * @internal
 */
export function unowned<T>(fn: () => T): T {
  const prev = currentDisposers;
  currentDisposers = null;
  try {
    return fn();
  } finally {
    currentDisposers = prev;
  }
}

/**
 * Run a function and collect every computed, effect and nested scope
 * created while it runs.
 *
 * @returns The function's result and a dispose function. Disposal runs in
 * reverse creation order and only happens once.
 *
 * @example
 * const [count, dispose] = scope(() => {
 *   const count = signal(0);
 *   effect(() => console.log(count.value));
 *   return count;
 * });
 *
 * dispose(); // the effect stops
 */
export function scope<T>(fn: () => T): [result: T, dispose: () => void] {
  const disposers: (() => void)[] = [];
  let disposed = false;

  const dispose = () => {
    if (disposed) return;
    disposed = true;
    for (let i = disposers.length - 1; i >= 0; i--) disposers[i]?.();
    disposers.length = 0;
  };

  // A nested scope is disposed along with its parent
  registerDisposer(dispose);

  const prev = currentDisposers;
  currentDisposers = disposers;
  try {
    return [fn(), dispose];
  } catch (e) {
    // Nothing escapes a failed scope
    currentDisposers = prev;
    dispose();
    throw e;
  } finally {
    currentDisposers = prev;
  }
}
