import type { CyclePolicy, Descriptor } from "./types.js";
import { CyclicOrderError } from "./errors.js";
import { identityOf } from "./descriptor.js";

/**
 * Options for `DescriptorGraph.sort()`.
 */
export type SortOptions<T extends Descriptor> = {
  /** @default "break" */
  cycles?: CyclePolicy;
  /**
   * Called each time the `break` policy has to force a descriptor out of a
   * stalled sort.
   * @param members The descriptors on the broken cycle, in input order.
   * @param brokenAt The descriptor emitted to resume the sort.
   */
  onCycleBroken?: (members: T[], brokenAt: T) => void;
};

/**
 * A directed "load before" graph over descriptors. Every node remembers the
 * position at which it was added, and that position is the only tie-breaker
 * the sort uses, so equal input always yields the same order.
 *
 * Nodes are the caller's descriptor objects; the graph never copies them.
 */
export class DescriptorGraph<T extends Descriptor> {
  // Node -> insertion position.
  private nodes: Map<T, number> = new Map();
  // Node -> nodes that must be ordered after it.
  private successors: Map<T, Set<T>> = new Map();
  // Node -> nodes that must be ordered before it.
  private predecessors: Map<T, Set<T>> = new Map();
  #nextPosition = 0;

  /**
   * Gets the total number of descriptors (nodes) in the graph.
   */
  public getNodesCount(): number {
    return this.nodes.size;
  }

  /**
   * Returns all nodes in insertion order.
   */
  public getNodes(): T[] {
    return Array.from(this.nodes.keys());
  }

  /** Checks whether the node is still in the graph. */
  public has(node: T): boolean {
    return this.nodes.has(node);
  }

  /**
   * Returns the insertion position of a node, or `undefined` if it is absent.
   */
  public positionOf(node: T): number | undefined {
    return this.nodes.get(node);
  }

  /**
   * Adds a node without edges. Adding a node twice keeps its first position.
   */
  public add(node: T): void {
    if (this.has(node)) return;
    this.nodes.set(node, this.#nextPosition++);
    this.successors.set(node, new Set());
    this.predecessors.set(node, new Set());
  }

  /**
   * Records that `before` must be ordered ahead of `after`.
   * Self-edges and edges touching absent nodes are ignored.
   * @returns `true` if a new edge was recorded.
   */
  public addEdge(before: T, after: T): boolean {
    if (before === after) return false;
    const out = this.successors.get(before);
    const into = this.predecessors.get(after);
    if (!out || !into || out.has(after)) return false;
    out.add(after);
    into.add(before);
    return true;
  }

  /**
   * Nodes that must be ordered after `node`, in insertion order.
   */
  public getSuccessors(node: T): T[] {
    return this.#inOrder(this.successors.get(node));
  }

  /**
   * Nodes that must be ordered before `node`, in insertion order.
   */
  public getPredecessors(node: T): T[] {
    return this.#inOrder(this.predecessors.get(node));
  }

  /**
   * Lists every edge as a `[before, after]` pair.
   */
  public getEdges(): [T, T][] {
    const edges: [T, T][] = [];
    for (const node of this.nodes.keys()) {
      for (const after of this.getSuccessors(node)) {
        edges.push([node, after]);
      }
    }
    return edges;
  }

  /**
   * Removes a node along with every edge touching it.
   */
  public remove(node: T): void {
    if (!this.has(node)) return;
    for (const after of this.successors.get(node) ?? []) {
      this.predecessors.get(after)?.delete(node);
    }
    for (const before of this.predecessors.get(node) ?? []) {
      this.successors.get(before)?.delete(node);
    }
    this.successors.delete(node);
    this.predecessors.delete(node);
    this.nodes.delete(node);
  }

  /**
   * Performs a stable topological sort (Kahn's algorithm). Among the nodes
   * whose predecessors have all been emitted, the one added first always goes
   * next, so a released node can overtake ready nodes added after it.
   *
   * If the sort stalls because the remaining nodes form (or wait on) a cycle,
   * the `break` policy emits the earliest-added node that lies on a cycle,
   * ignoring its pending predecessors, and carries on. The `reject` policy
   * throws instead.
   *
   * @returns Every node exactly once.
   * @throws A `CyclicOrderError` under the `reject` policy when a cycle exists.
   */
  public sort(options: SortOptions<T> = {}): T[] {
    const policy = options.cycles ?? "break";
    const order = this.getNodes();
    const sorted: T[] = [];
    const emitted = new Set<T>();

    // Step 1: Count the pending predecessors of every node.
    const inDegree = new Map<T, number>();
    const ready: T[] = [];
    for (const node of order) {
      const degree = this.predecessors.get(node)?.size ?? 0;
      inDegree.set(node, degree);
      if (degree === 0) ready.push(node);
    }

    while (sorted.length < order.length) {
      let next = ready.shift();

      if (next === undefined) {
        // Step 2: No node is ready, so the rest is blocked by a cycle.
        const remaining = order.filter((n) => !emitted.has(n));
        const [brokenAt, members] = this.#earliestCycle(remaining, emitted);
        if (policy === "reject") {
          throw new CyclicOrderError(members.map(identityOf));
        }
        next = brokenAt;
        options.onCycleBroken?.(members, brokenAt);
      }

      // Step 3: Emit, then release the successors that no longer wait.
      emitted.add(next);
      sorted.push(next);
      for (const after of this.successors.get(next) ?? []) {
        if (emitted.has(after)) continue;
        const degree = (inDegree.get(after) ?? 1) - 1;
        inDegree.set(after, degree);
        if (degree === 0) this.#enqueue(ready, after);
      }
    }

    return sorted;
  }

  /**
   * Finds the earliest-added node that lies on a cycle among the nodes not
   * yet emitted, together with every node on a cycle with it.
   */
  #earliestCycle(remaining: T[], emitted: Set<T>): [T, T[]] {
    for (const candidate of remaining) {
      const forward = this.#reach(candidate, this.successors, emitted);
      if (!forward.has(candidate)) continue;
      const backward = this.#reach(candidate, this.predecessors, emitted);
      return [
        candidate,
        remaining.filter((n) => forward.has(n) && backward.has(n)),
      ];
    }
    // Unreachable while every remaining node still waits on another one.
    return [remaining[0], [remaining[0]]];
  }

  #reach(start: T, edges: Map<T, Set<T>>, emitted: Set<T>): Set<T> {
    const seen = new Set<T>();
    const stack = [start];
    for (let n = stack.pop(); n !== undefined; n = stack.pop()) {
      for (const m of edges.get(n) ?? []) {
        if (emitted.has(m) || seen.has(m)) continue;
        seen.add(m);
        stack.push(m);
      }
    }
    return seen;
  }

  /**
   * Inserts a node into the ready queue, keeping it sorted by position.
   */
  #enqueue(ready: T[], node: T): void {
    const position = this.positionOf(node) ?? Number.MAX_SAFE_INTEGER;
    let index = ready.length;
    while (index > 0 && (this.positionOf(ready[index - 1]) ?? 0) > position) {
      index--;
    }
    ready.splice(index, 0, node);
  }

  #inOrder(set: Set<T> | undefined): T[] {
    if (!set) return [];
    return Array.from(set).sort(
      (a, b) => (this.positionOf(a) ?? 0) - (this.positionOf(b) ?? 0)
    );
  }
}
