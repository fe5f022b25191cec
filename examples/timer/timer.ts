import { Signal, computed, effect, scope } from "../../src/index.js";

/**
 * A stopwatch showcasing computed formatting and effect cleanup:
 * the interval only exists while the watch is running.
 */
export class Stopwatch {
  #ms = new Signal(0);
  #running = new Signal(false);
  #dispose: () => void;

  readonly formatted = computed(() => {
    const total = this.#ms.value;
    const mins = Math.floor(total / 60000);
    const secs = Math.floor((total % 60000) / 1000);
    const ms = total % 1000;
    return `${mins.toString().padStart(2, "0")}:${secs.toString().padStart(2, "0")}.${ms.toString().padStart(3, "0")}`;
  });

  constructor(tickMs = 10) {
    const [, dispose] = scope(() => {
      effect(() => {
        if (!this.#running.value) return;
        const id = setInterval(() => {
          this.#ms.value += tickMs;
        }, tickMs);
        return () => clearInterval(id);
      });
    });
    this.#dispose = dispose;
  }

  get running(): boolean {
    return this.#running.value;
  }

  start(): void {
    this.#running.value = true;
  }

  stop(): void {
    this.#running.value = false;
  }

  reset(): void {
    this.stop();
    this.#ms.value = 0;
  }

  dispose(): void {
    this.#dispose();
    this.formatted.dispose();
  }
}

const watch = new Stopwatch();
const unsubscribe = watch.formatted.subscribe((time) => {
  if (time.endsWith("00")) console.log(time);
});

watch.start();
setTimeout(() => {
  watch.stop();
  console.log(`Stopped at ${watch.formatted.value}`);
  unsubscribe();
  watch.dispose();
}, 1000);
