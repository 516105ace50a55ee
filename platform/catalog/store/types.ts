import type { ComponentCategory, EdgeKind, NodeKind } from "../graph";

export type GraphStats = Readonly<{
  totalNodes: number;
  totalEdges: number;
  nodesByKind: Readonly<Record<NodeKind, number>>;
  edgesByKind: Readonly<Record<EdgeKind, number>>;
  componentsByCategory: Readonly<Partial<Record<ComponentCategory, number>>>;
  edgesByRule: Readonly<Record<string, number>>;
}>;

export type GraphStoreOptions = Readonly<{
  /** Substring fallback for name resolution. Defaults to true. */
  fuzzyNames?: boolean;
}>;
