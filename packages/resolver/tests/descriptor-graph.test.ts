import { describe, it, expect, vi } from "vitest";
import { CyclicOrderError, DescriptorGraph, identityOf } from "../src/index.js";
import { names, node, type TestDescriptor } from "./helpers.js";

function graphOf(...nodes: TestDescriptor[]): DescriptorGraph<TestDescriptor> {
  const graph = new DescriptorGraph<TestDescriptor>();
  for (const n of nodes) graph.add(n);
  return graph;
}

describe("DescriptorGraph", () => {
  const a = node("A");
  const b = node("B");
  const c = node("C");
  const d = node("D");

  it("keeps input order when there are no edges", () => {
    expect(names(graphOf(a, b, c).sort())).toEqual(["A", "B", "C"]);
  });

  it("emits a node only after its predecessors", () => {
    const graph = graphOf(a, b, c);
    graph.addEdge(c, a);

    expect(names(graph.sort())).toEqual(["B", "C", "A"]);
  });

  it("releases waiting nodes by input position", () => {
    const graph = graphOf(a, b, c, d);
    graph.addEdge(d, c);
    graph.addEdge(d, a);

    expect(names(graph.sort())).toEqual(["B", "D", "A", "C"]);
  });

  it("lets a released node overtake later ready nodes", () => {
    const graph = graphOf(c, a, b);
    graph.addEdge(a, c);

    expect(names(graph.sort())).toEqual(["A", "C", "B"]);
  });

  it("remembers insertion positions", () => {
    const graph = graphOf(c, a, b);
    graph.add(c);
    graph.remove(a);

    expect(graph.positionOf(c)).toBe(0);
    expect(graph.positionOf(b)).toBe(2);
    expect(graph.positionOf(a)).toBeUndefined();
    expect(graph.has(a)).toBe(false);
    expect(graph.has(b)).toBe(true);
  });

  it("ignores self edges and repeated edges", () => {
    const graph = graphOf(a, b);

    expect(graph.addEdge(a, a)).toBe(false);
    expect(graph.addEdge(a, b)).toBe(true);
    expect(graph.addEdge(a, b)).toBe(false);
    expect(graph.getEdges()).toEqual([[a, b]]);
  });

  it("drops edges together with a removed node", () => {
    const graph = graphOf(a, b, c);
    graph.addEdge(a, b);
    graph.addEdge(b, c);
    graph.remove(b);

    expect(graph.getNodesCount()).toBe(2);
    expect(graph.getSuccessors(a)).toEqual([]);
    expect(graph.getPredecessors(c)).toEqual([]);
    expect(names(graph.sort())).toEqual(["A", "C"]);
  });

  it("breaks a cycle at the earliest blocked node", () => {
    const graph = graphOf(a, b, c);
    graph.addEdge(a, b);
    graph.addEdge(b, a);
    const onCycleBroken = vi.fn();

    expect(names(graph.sort({ onCycleBroken }))).toEqual(["C", "A", "B"]);
    expect(onCycleBroken).toHaveBeenCalledTimes(1);
    expect(onCycleBroken).toHaveBeenCalledWith([a, b], a);
  });

  it("still honours edges that leave a broken cycle", () => {
    const graph = graphOf(a, b, c);
    graph.addEdge(b, c);
    graph.addEdge(c, b);
    graph.addEdge(c, a);

    // A waits on C, C and B wait on each other.
    expect(names(graph.sort())).toEqual(["B", "C", "A"]);
  });

  it("throws under the reject policy", () => {
    const graph = graphOf(a, b, c);
    graph.addEdge(a, b);
    graph.addEdge(b, a);

    expect(() => graph.sort({ cycles: "reject" })).toThrow(CyclicOrderError);
    try {
      graph.sort({ cycles: "reject" });
    } catch (error) {
      expect(error).toBeInstanceOf(CyclicOrderError);
      if (error instanceof CyclicOrderError) {
        expect(error.members).toEqual([identityOf(a), identityOf(b)]);
      }
    }
  });
});
