import { describe, it, expect } from "vitest";
import type { ComponentGraphData, ComponentNode, ComponentSpec } from "../../graph";
import { InvalidCatalogData } from "../../../errors";
import { InMemoryComponentGraphStore } from "../InMemoryComponentGraphStore";

function component(id: string, name: string, spec: ComponentSpec): ComponentNode {
  return {
    id,
    kind: "component",
    name,
    category: spec.category,
    brand: "Generic",
    price: 1000,
    tier: "Mainstream",
    spec,
    raw: name.toUpperCase(),
  };
}

const data: ComponentGraphData = {
  nodes: [
    component("cpu_1", "Chip One", { category: "cpu", socket: "AM5" }),
    component("mb_1", "Board One", { category: "motherboard", socket: "AM5" }),
    component("mb_2", "Board Two", { category: "motherboard", socket: "AM5" }),
    { id: "cat_cpu", kind: "category", name: "cpu", category: "cpu" },
  ],
  edges: [
    { source: "cpu_1", target: "mb_1", kind: "COMPATIBLE_WITH", weight: 1, rule: "socket" },
    { source: "cpu_1", target: "mb_2", kind: "COMPATIBLE_WITH", weight: 1, rule: "socket" },
    { source: "cpu_1", target: "mb_1", kind: "COMPATIBLE_WITH", weight: 1, rule: "socket" },
    { source: "cpu_1", target: "cat_cpu", kind: "BELONGS_TO", weight: 1 },
  ],
};

describe("InMemoryComponentGraphStore", () => {
  it("indexes nodes and components by category", () => {
    const store = InMemoryComponentGraphStore.fromGraph(data);
    expect(store.nodeCount).toBe(4);
    expect(store.getComponent("mb_2")?.name).toBe("Board Two");
    expect(store.getComponent("cat_cpu")).toBeNull();
    expect(store.getNode("missing")).toBeNull();
    expect(store.componentsOf("motherboard").map((n) => n.id)).toEqual(["mb_1", "mb_2"]);
    expect(store.componentsOf("gpu")).toEqual([]);
    expect(store.indexOf("mb_1")).toBe(1);
    expect(store.indexOf("missing")).toBe(-1);
    expect(store.nodeAt(3).id).toBe("cat_cpu");
  });

  it("drops repeated edges and filters outgoing by kind", () => {
    const store = InMemoryComponentGraphStore.fromGraph(data);
    expect(store.outgoing("cpu_1", "COMPATIBLE_WITH")).toEqual([
      { source: "cpu_1", target: "mb_1", kind: "COMPATIBLE_WITH", weight: 1, rule: "socket" },
      { source: "cpu_1", target: "mb_2", kind: "COMPATIBLE_WITH", weight: 1, rule: "socket" },
    ]);
    expect(store.neighbors("cpu_1").map((n) => n.id)).toEqual(["mb_1", "mb_2", "cat_cpu"]);
    expect(store.hasEdge("cpu_1", "mb_2", "COMPATIBLE_WITH")).toBe(true);
    expect(store.hasEdge("mb_2", "cpu_1", "COMPATIBLE_WITH")).toBe(false);
  });

  it("summarizes counts", () => {
    const stats = InMemoryComponentGraphStore.fromGraph(data).stats();
    expect(stats.totalNodes).toBe(4);
    expect(stats.totalEdges).toBe(3);
    expect(stats.nodesByKind).toEqual({ component: 3, category: 1, attribute: 0, purpose: 0 });
    expect(stats.componentsByCategory).toEqual({ cpu: 1, motherboard: 2 });
    expect(stats.edgesByRule).toEqual({ socket: 2 });
    expect(stats.edgesByKind.BELONGS_TO).toBe(1);
  });

  it("resolves names with the configured fuzzy default", () => {
    const fuzzy = InMemoryComponentGraphStore.fromGraph(data);
    const strict = InMemoryComponentGraphStore.fromGraph(data, { fuzzyNames: false });
    expect(fuzzy.resolveName("board two")).toBe("mb_2");
    expect(fuzzy.resolveName("Board Two Rev2", { category: "motherboard" })).toBe("mb_2");
    expect(strict.resolveName("Board Two Rev2", { category: "motherboard" })).toBeNull();
  });

  it("rejects duplicate node ids", () => {
    const dup = { nodes: [...data.nodes, data.nodes[0]], edges: [] };
    expect(() => InMemoryComponentGraphStore.fromGraph(dup)).toThrow(InvalidCatalogData);
  });

  it("rejects edges to missing nodes", () => {
    const dangling: ComponentGraphData = {
      nodes: data.nodes,
      edges: [{ source: "cpu_1", target: "ghost", kind: "SYNERGY_WITH", weight: 1 }],
    };
    expect(() => InMemoryComponentGraphStore.fromGraph(dangling)).toThrow(/ghost/);
  });
});
