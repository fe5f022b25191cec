import { describe, it } from "node:test";
import assert from "node:assert";
import {
  Effect,
  signal,
  computed,
  effect,
  batch,
  scope,
  untracked,
  CyclicDependencyError,
} from "../src/signals/index.js";
import { MAX_FLUSH_ROUNDS } from "../src/signals/context.js";

describe("effect", () => {
  it("should run immediately on creation", () => {
    let runs = 0;
    effect(() => {
      runs++;
    });
    assert.strictEqual(runs, 1);
  });

  it("should re-run when a dependency changes", () => {
    const count = signal(0);
    const seen: number[] = [];

    effect(() => {
      seen.push(count.value);
    });

    count.value = 1;
    count.value = 2;
    assert.deepStrictEqual(seen, [0, 1, 2]);
  });

  it("should skip identical writes through a computed", () => {
    const count = signal(0);
    const doubled = computed(() => count.value * 2);
    const log: number[] = [];

    effect(() => {
      log.push(doubled.value);
    });

    count.value = 5;
    count.value = 5;

    assert.deepStrictEqual(log, [0, 10]);
  });

  it("should not re-run when a computed dependency keeps its value", () => {
    const count = signal(1);
    const parity = computed(() => count.value % 2);
    let runs = 0;

    effect(() => {
      void parity.value;
      runs++;
    });

    count.value = 3;
    count.value = 5;
    assert.strictEqual(runs, 1);

    count.value = 6;
    assert.strictEqual(runs, 2);
  });

  /**
   * Diamond: both branches change on the same write, but the effect
   * only runs once and never sees a half-updated graph.
   */
  it("should run once per write in a diamond", () => {
    const a = signal(1);
    const b = computed(() => a.value * 2);
    const c = computed(() => a.value * 3);
    const sums: number[] = [];

    effect(() => {
      sums.push(b.value + c.value);
    });

    a.value = 2;
    assert.deepStrictEqual(sums, [5, 10]);
  });

  it("should run once after a batch writing several dependencies", () => {
    const first = signal(1);
    const second = signal(2);
    const sums: number[] = [];

    effect(() => {
      sums.push(first.value + second.value);
    });

    batch(() => {
      first.value = 10;
      second.value = 20;
      assert.deepStrictEqual(sums, [3]);
    });

    assert.deepStrictEqual(sums, [3, 30]);
  });

  it("should run effects in the order they subscribed", () => {
    const s = signal(0);
    const order: string[] = [];

    effect(() => {
      if (s.value) order.push("first");
    });
    effect(() => {
      if (s.value) order.push("second");
    });
    effect(() => {
      if (s.value) order.push("third");
    });

    s.value = 1;
    assert.deepStrictEqual(order, ["first", "second", "third"]);
  });

  it("should run immediately even inside a batch", () => {
    let runs = 0;
    batch(() => {
      effect(() => {
        runs++;
      });
      assert.strictEqual(runs, 1);
    });
    assert.strictEqual(runs, 1);
  });

  it("should not track values read with peek()", () => {
    const tracked = signal(0);
    const peeked = signal(0);
    let runs = 0;

    effect(() => {
      void tracked.value;
      void peeked.peek();
      runs++;
    });

    peeked.value = 1;
    assert.strictEqual(runs, 1);

    tracked.value = 1;
    assert.strictEqual(runs, 2);
  });

  it("should not track values read inside untracked()", () => {
    const a = signal(1);
    const b = signal(1);
    const seen: number[] = [];

    effect(() => {
      seen.push(a.value + untracked(() => b.value));
    });

    b.value = 10;
    assert.deepStrictEqual(seen, [2]);

    a.value = 2;
    assert.deepStrictEqual(seen, [2, 12]);
  });

  it("should follow conditional dependencies", () => {
    const useA = signal(true);
    const a = signal("a");
    const b = signal("b");
    const seen: string[] = [];

    effect(() => {
      seen.push(useA.value ? a.value : b.value);
    });

    b.value = "b2"; // not a dependency yet
    useA.value = false;
    a.value = "a2"; // no longer a dependency
    b.value = "b3";

    assert.deepStrictEqual(seen, ["a", "b2", "b3"]);
  });

  describe("cleanup", () => {
    it("should run the cleanup once before each re-run and once on dispose", () => {
      const s = signal(0);
      const events: string[] = [];

      const dispose = effect(() => {
        const v = s.value;
        events.push(`run ${v}`);
        return () => events.push(`cleanup ${v}`);
      });

      s.value = 1;
      s.value = 2;
      dispose();
      dispose();
      s.value = 3;

      assert.deepStrictEqual(events, [
        "run 0",
        "cleanup 0",
        "run 1",
        "cleanup 1",
        "run 2",
        "cleanup 2",
      ]);
    });

    it("should not track reads made by the cleanup", () => {
      const trigger = signal(0);
      const other = signal(0);
      let runs = 0;

      effect(() => {
        void trigger.value;
        runs++;
        return () => {
          void other.value;
        };
      });

      trigger.value = 1;
      other.value = 1;
      assert.strictEqual(runs, 2);
    });

    it("should release resources held by the previous run", () => {
      const active = signal(true);
      const listeners = new Set<string>();

      const dispose = effect(() => {
        if (!active.value) return;
        listeners.add("resize");
        return () => listeners.delete("resize");
      });

      assert.deepStrictEqual([...listeners], ["resize"]);

      active.value = false;
      assert.strictEqual(listeners.size, 0);

      active.value = true;
      assert.deepStrictEqual([...listeners], ["resize"]);

      dispose();
      assert.strictEqual(listeners.size, 0);
    });
  });

  describe("dispose", () => {
    it("should never re-run after dispose", () => {
      const s = signal(0);
      let runs = 0;

      const dispose = effect(() => {
        void s.value;
        runs++;
      });

      dispose();
      s.value = 1;
      s.value = 2;
      assert.strictEqual(runs, 1);
    });

    it("should expose its disposed state", () => {
      const e = new Effect(() => {});
      assert.strictEqual(e.disposed, false);
      e.dispose();
      assert.strictEqual(e.disposed, true);
    });

    /**
     * Disposing from inside the body: the run completes, then the effect is
     * torn down and its final cleanup runs.
     */
    it("should handle disposing itself while running", () => {
      const s = signal(0);
      let runs = 0;
      let cleanups = 0;

      const e: Effect = new Effect(() => {
        runs++;
        if (s.value === 1) e.dispose();
        return () => cleanups++;
      });

      s.value = 1;
      assert.strictEqual(e.disposed, true);
      assert.strictEqual(runs, 2);
      assert.strictEqual(cleanups, 2);

      s.value = 2;
      assert.strictEqual(runs, 2);
      assert.strictEqual(cleanups, 2);
    });

    it("should skip an effect disposed by another one in the same flush", () => {
      const s = signal(0);
      let secondRuns = 0;
      let disposeSecond = () => {};

      effect(() => {
        if (s.value === 1) disposeSecond();
      });
      disposeSecond = effect(() => {
        void s.value;
        secondRuns++;
      });

      s.value = 1;
      assert.strictEqual(secondRuns, 1);
    });
  });

  describe("errors", () => {
    it("should dispose the effect when its first run throws", () => {
      const s = signal(0);
      let runs = 0;

      assert.throws(
        () =>
          effect(() => {
            runs++;
            void s.value;
            throw new Error("boom");
          }),
        /boom/,
      );

      s.value = 1;
      assert.strictEqual(runs, 1);
    });

    it("should propagate errors to the writer and still run other effects", () => {
      const s = signal(0);
      const seen: number[] = [];

      effect(() => {
        if (s.value === 1) throw new Error("fail");
      });
      effect(() => {
        seen.push(s.value);
      });

      assert.throws(() => {
        s.value = 1;
      }, /fail/);
      assert.deepStrictEqual(seen, [0, 1]);

      // The failing effect keeps its subscriptions
      s.value = 2;
      assert.deepStrictEqual(seen, [0, 1, 2]);
    });

    it("should re-run once a computed it caught an error from recovers", () => {
      const s = signal(0);
      const c = computed(() => {
        if (s.value === 0) throw new Error("zero");
        return s.value;
      });
      const seen: (number | string)[] = [];

      effect(() => {
        try {
          seen.push(c.value);
        } catch {
          seen.push("err");
        }
      });

      s.value = 7;
      assert.deepStrictEqual(seen, ["err", 7]);
    });

    it("should dispose a new effect when the flush after its first run fails", () => {
      const s = signal(0);
      let runs = 0;

      effect(() => {
        if (s.value === 1) throw new Error("fail");
      });

      assert.throws(
        () =>
          effect(() => {
            runs++;
            void s.value;
            s.value = 1;
          }),
        /fail/,
      );
      assert.strictEqual(runs, 2);

      s.value = 2;
      assert.strictEqual(runs, 2);
    });

    it("should report effects that keep re-triggering themselves", () => {
      const s = signal(0);

      assert.throws(
        () =>
          scope(() =>
            effect(() => {
              s.value = s.value + 1;
            }),
          ),
        CyclicDependencyError,
      );

      // Initial run plus one per allowed flush round
      assert.strictEqual(s.peek(), MAX_FLUSH_ROUNDS + 1);

      // The failed scope disposed the effect
      s.value = 0;
      assert.strictEqual(s.peek(), 0);
    });

    /**
     * Edge case: the flush gives up on an effect reading a computed
     *
     * The computed between the signal and the dropped effect is brought
     * up to date, so later writes still reach the effect.
     */
    it("should keep notifying effects dropped by a runaway flush", () => {
      const s = signal(0);
      const loop = signal(true);
      const c = computed(() => s.value);
      let runs = 0;
      let last = 0;

      effect(() => {
        runs++;
        last = c.value;
        if (loop.peek() && last > 0) s.value = last + 1;
      });

      assert.throws(() => {
        s.value = 1;
      }, CyclicDependencyError);
      assert.strictEqual(runs, MAX_FLUSH_ROUNDS + 1);

      loop.value = false;
      s.value = -5;
      assert.strictEqual(runs, MAX_FLUSH_ROUNDS + 2);
      assert.strictEqual(last, -5);
    });

    it("should let an effect settle after writing its own dependency", () => {
      const s = signal(0);
      const seen: number[] = [];

      effect(() => {
        seen.push(s.value);
        if (s.value < 3) s.value = s.value + 1;
      });

      assert.deepStrictEqual(seen, [0, 1, 2, 3]);
    });
  });
});
