import type { ComponentCategory, ComponentNode, EdgeKind, GraphEdge, GraphNode } from "../graph";
import type { NameLookupOptions } from "./NameIndex";
import type { GraphStats } from "./types";

/**
 * ComponentGraphStore is the read-only view over a built graph.
 *
 * Rules:
 * - Immutable after construction; safe to share across sessions
 * - Lookups by id are O(1)
 * - Nodes live in an arena; `indexOf` / `nodeAt` expose the integer handles
 *   so hot loops can precompute per-node data in typed arrays
 */
export interface ComponentGraphStore {
  // ---- Nodes ----

  getNode(id: string): GraphNode | null;

  getComponent(id: string): ComponentNode | null;

  componentsOf(category: ComponentCategory): readonly ComponentNode[];

  indexOf(id: string): number;

  nodeAt(index: number): GraphNode;

  readonly nodeCount: number;

  // ---- Edges ----

  outgoing(id: string, kind?: EdgeKind): readonly GraphEdge[];

  hasEdge(source: string, target: string, kind: EdgeKind): boolean;

  neighbors(id: string, kind?: EdgeKind): readonly GraphNode[];

  // ---- Lookup ----

  resolveName(name: string, opts?: NameLookupOptions): string | null;

  stats(): GraphStats;
}
