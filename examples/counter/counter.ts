import { signal, computed, effect, batch } from "../../src/index.js";

/**
 * A console counter showcasing signals, computeds and batching
 */
export function runCounter(log: (line: string) => void = console.log): void {
  const count = signal(0, { name: "count" });
  const step = signal(1, { name: "step" });
  const doubled = computed(() => count.value * 2);

  const dispose = effect(() => {
    log(`Count: ${count.value} (doubled: ${doubled.value})`);
  });

  const increment = () => (count.value += step.value);

  increment();
  increment();

  // Same value: nothing is logged
  count.value = 2;

  // One log line for both writes
  batch(() => {
    step.value = 10;
    increment();
  });

  count.value = 0;
  dispose();
}

runCounter();
