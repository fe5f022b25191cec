/**
 * Dependency graph bookkeeping shared by signals, computeds and effects.
 *
 * Each edge of the graph is a standalone Node linking one source (a Signal
 * or Computed) to one target (a Computed or Effect). Nodes live in two
 * doubly-linked lists at once:
 * - prevS/nextS: Links between all sources of a single target (horizontal chain)
 * - prevT/nextT: Links between all targets of a single source (vertical chain)
 *
 * This allows O(1) insertion and removal of dependencies.
 *
 * Example: If computed C depends on signals A and B:
 *
 *   Signal A                  Signal B
 *      │                          │
 *      ▼                          ▼
 *   Node(A→C) ←─prevS/nextS─→ Node(B→C)
 *      │                          │
 *      ▼ (prevT/nextT)            ▼
 *   (other targets of A)     (other targets of B)
 *
 * The source list of a target is rebuilt on every evaluation: edges are
 * marked stale before the body runs, re-validated when read again, and
 * unlinked afterwards if they were not.
 */

import { context } from "./context.js";

/** Something that can be depended upon (Signal or Computed). */
export interface Source {
  /** Incremented every time the observable value changes. Never negative. */
  version: number;
  /** Head of the list of edges where this is the source */
  targets: Node | undefined;
  /** Cached edge for the current tracking context */
  node: Node | undefined;
  /** Bring the value up to date (a no-op for plain signals). */
  refresh(): void;
}

/** Something that depends on sources (Computed or Effect). */
export interface Observer {
  readonly kind: "computed" | "effect";
  /** Head of the list of edges where this is the target */
  sources: Node | undefined;
  /** Edges where this observer is itself a source (computeds only) */
  readonly targets?: Node | undefined;
  /**
   * Called when a source may have changed.
   * @returns true when the change must be forwarded to this observer's targets
   */
  notify(): boolean;
}

/** An edge in the dependency graph. */
export interface Node {
  source: Source; // The signal/computed being depended upon
  target: Observer; // The computed/effect that depends on source
  version: number; // Version of source when last accessed, -1 while possibly stale
  prevS: Node | undefined; // Previous node in target's source list
  nextS: Node | undefined; // Next node in target's source list
  prevT: Node | undefined; // Previous node in source's target list
  nextT: Node | undefined; // Next node in source's target list
  rollback: Node | undefined; // Used during evaluation to restore source.node
}

/**
 * Track a source as a dependency of the current context.
 *
 * Two cases are handled:
 * 1. Re-tracking: the context already has an edge to this source, either from
 *    its previous evaluation (version === -1) or from an earlier read in this
 *    one. The edge is re-validated and moved to the tail of the source list.
 * 2. New tracking: a new edge is created and linked in both lists.
 */
export function track(source: Source): void {
  const target = context;
  if (!target) return;

  let node = source.node;

  // Case 1: Re-tracking an existing dependency
  if (node?.target === target) {
    if (node.version === -1) {
      node.version = source.version;
      // Move to the tail of the target's sources so cleanup keeps it
      if (node.nextS) {
        node.nextS.prevS = node.prevS;
        if (node.prevS) node.prevS.nextS = node.nextS;
        node.prevS = target.sources;
        node.nextS = undefined;
        if (target.sources) target.sources.nextS = node;
        target.sources = node;
      }
    }
    return;
  }

  // Case 2: New dependency
  node = {
    source,
    target,
    version: source.version,
    prevS: target.sources,
    nextS: undefined,
    prevT: undefined,
    nextT: source.targets,
    rollback: source.node,
  };

  if (target.sources) target.sources.nextS = node;
  target.sources = node;

  if (source.targets) source.targets.prevT = node;
  source.targets = node;

  source.node = node;
}

/** Remove an edge from its source's target list. */
function unlinkTarget(node: Node): void {
  if (node.prevT) node.prevT.nextT = node.nextT;
  else node.source.targets = node.nextT;
  if (node.nextT) node.nextT.prevT = node.prevT;
  node.prevT = undefined;
  node.nextT = undefined;
}

/**
 * Mark every edge of an observer as possibly stale before it re-evaluates.
 *
 * The source list is left pointing at its tail, where track() appends.
 */
export function prepareSources(observer: Observer): void {
  for (let node = observer.sources; node; node = node.nextS) {
    node.rollback = node.source.node;
    node.source.node = node;
    node.version = -1;
    if (!node.nextS) {
      observer.sources = node;
      break;
    }
  }
}

/**
 * Unlink every edge that was not re-tracked during the evaluation and
 * point the source list back at its head.
 */
export function cleanupSources(observer: Observer): void {
  let node = observer.sources;
  let head: Node | undefined;
  while (node) {
    const prev = node.prevS;
    if (node.version === -1) {
      unlinkTarget(node);
      if (prev) prev.nextS = node.nextS;
      if (node.nextS) node.nextS.prevS = prev;
    } else {
      head = node;
    }
    node.source.node = node.rollback;
    node.rollback = undefined;
    node = prev;
  }
  observer.sources = head;
}

/** Unlink all edges of an observer. */
export function disposeSources(observer: Observer): void {
  for (let node = observer.sources; node; node = node.nextS) {
    unlinkTarget(node);
  }
  observer.sources = undefined;
}

/**
 * Check whether any source of an observer changed since it last read it.
 * Sources are refreshed in the order they were read, so a computed that is
 * no longer needed past a changed branch is never evaluated.
 */
export function sourcesChanged(observer: Observer): boolean {
  for (let node = observer.sources; node; node = node.nextS) {
    if (node.source.version !== node.version) return true;
    node.source.refresh();
    if (node.source.version !== node.version) return true;
  }
  return false;
}

/**
 * Refresh every source of an observer, without stopping at the first change.
 * Leaves no dirty computed between the observer and the signals it reads.
 */
export function refreshSources(observer: Observer): void {
  for (let node = observer.sources; node; node = node.nextS) {
    node.source.refresh();
  }
}

/**
 * Notify every target of a source, breadth-first.
 *
 * Computeds are marked dirty and forward the notification to their own
 * targets; effects are queued. Targets are visited oldest edge first, so
 * effects queue up in the order they subscribed. Iterative, so deep chains
 * cannot overflow the stack.
 */
export function propagate(targets: Node | undefined): void {
  const queue: Observer[] = [];
  const visit = (head: Node | undefined) => {
    // New edges are linked at the head: walk back from the tail
    let node = head;
    while (node?.nextT) node = node.nextT;
    for (; node; node = node.prevT) queue.push(node.target);
  };
  visit(targets);
  for (const observer of queue) {
    if (observer.notify()) visit(observer.targets);
  }
}
