import type {
  ComponentCategory,
  ComponentGraphData,
  ComponentNode,
  EdgeKind,
  GraphEdge,
  GraphNode,
  NodeKind,
} from "../graph";
import { isComponentNode } from "../graph";
import { InvalidCatalogData } from "../../errors";
import type { ComponentGraphStore } from "./ComponentGraphStore";
import { NameIndex, type NameLookupOptions } from "./NameIndex";
import type { GraphStats, GraphStoreOptions } from "./types";

type IndexedEdge = {
  source: number;
  target: number;
  kind: EdgeKind;
  weight: number;
  rule?: string;
};

const EMPTY_COMPONENTS: readonly ComponentNode[] = [];

function edgeKey(source: number, target: number, kind: EdgeKind): string {
  return `${source}:${target}:${kind}`;
}

export class InMemoryComponentGraphStore implements ComponentGraphStore {
  private readonly nodes: GraphNode[] = [];
  private readonly indexById = new Map<string, number>();
  private readonly edges: IndexedEdge[] = [];
  private readonly outgoingByNode: number[][] = [];
  private readonly edgeKeys = new Set<string>();
  private readonly componentsByCategory = new Map<ComponentCategory, ComponentNode[]>();
  private readonly names = new NameIndex();
  private readonly fuzzyNames: boolean;

  private constructor(opts?: GraphStoreOptions) {
    this.fuzzyNames = opts?.fuzzyNames ?? true;
  }

  /**
   * Builds the arena from string-keyed graph data. Ids resolve to indices
   * once here; a duplicate node id or an edge pointing at a missing node
   * aborts the load.
   */
  static fromGraph(data: ComponentGraphData, opts?: GraphStoreOptions): InMemoryComponentGraphStore {
    const store = new InMemoryComponentGraphStore(opts);

    for (const node of data.nodes) {
      if (store.indexById.has(node.id)) {
        throw new InvalidCatalogData(`Duplicate node id: ${node.id}`);
      }
      store.indexById.set(node.id, store.nodes.length);
      store.nodes.push(node);
      store.outgoingByNode.push([]);

      if (isComponentNode(node)) {
        let bucket = store.componentsByCategory.get(node.category);
        if (!bucket) {
          bucket = [];
          store.componentsByCategory.set(node.category, bucket);
        }
        bucket.push(node);
        store.names.add(node.id, node.name, node.category);
      }
    }

    for (const edge of data.edges) {
      const source = store.indexById.get(edge.source);
      const target = store.indexById.get(edge.target);
      if (source === undefined || target === undefined) {
        throw new InvalidCatalogData(
          `Edge ${edge.kind} ${edge.source} -> ${edge.target} references a missing node`,
        );
      }
      const key = edgeKey(source, target, edge.kind);
      if (store.edgeKeys.has(key)) continue;
      store.edgeKeys.add(key);

      const idx = store.edges.length;
      store.edges.push({ source, target, kind: edge.kind, weight: edge.weight, rule: edge.rule });
      store.outgoingByNode[source].push(idx);
    }

    return store;
  }

  get nodeCount(): number {
    return this.nodes.length;
  }

  getNode(id: string): GraphNode | null {
    const idx = this.indexById.get(id);
    return idx === undefined ? null : this.nodes[idx];
  }

  getComponent(id: string): ComponentNode | null {
    const node = this.getNode(id);
    return node && isComponentNode(node) ? node : null;
  }

  componentsOf(category: ComponentCategory): readonly ComponentNode[] {
    return this.componentsByCategory.get(category) ?? EMPTY_COMPONENTS;
  }

  indexOf(id: string): number {
    return this.indexById.get(id) ?? -1;
  }

  nodeAt(index: number): GraphNode {
    const node = this.nodes[index];
    if (!node) throw new RangeError(`No node at index ${index}`);
    return node;
  }

  outgoing(id: string, kind?: EdgeKind): readonly GraphEdge[] {
    const idx = this.indexById.get(id);
    if (idx === undefined) return [];

    const result: GraphEdge[] = [];
    for (const edgeIdx of this.outgoingByNode[idx]) {
      const edge = this.edges[edgeIdx];
      if (kind !== undefined && edge.kind !== kind) continue;
      result.push(this.toGraphEdge(edge));
    }
    return result;
  }

  hasEdge(source: string, target: string, kind: EdgeKind): boolean {
    const s = this.indexById.get(source);
    const t = this.indexById.get(target);
    if (s === undefined || t === undefined) return false;
    return this.edgeKeys.has(edgeKey(s, t, kind));
  }

  neighbors(id: string, kind?: EdgeKind): readonly GraphNode[] {
    const idx = this.indexById.get(id);
    if (idx === undefined) return [];

    const result: GraphNode[] = [];
    for (const edgeIdx of this.outgoingByNode[idx]) {
      const edge = this.edges[edgeIdx];
      if (kind !== undefined && edge.kind !== kind) continue;
      result.push(this.nodes[edge.target]);
    }
    return result;
  }

  resolveName(name: string, opts?: NameLookupOptions): string | null {
    const match = this.names.resolve(name, {
      category: opts?.category,
      fuzzy: opts?.fuzzy ?? this.fuzzyNames,
    });
    return match?.id ?? null;
  }

  stats(): GraphStats {
    const nodesByKind: Record<NodeKind, number> = {
      component: 0,
      category: 0,
      attribute: 0,
      purpose: 0,
    };
    for (const node of this.nodes) nodesByKind[node.kind]++;

    const edgesByKind: Record<EdgeKind, number> = {
      BELONGS_TO: 0,
      HAS_ATTRIBUTE: 0,
      COMPATIBLE_WITH: 0,
      SYNERGY_WITH: 0,
      SUITABLE_FOR: 0,
    };
    const edgesByRule: Record<string, number> = {};
    for (const edge of this.edges) {
      edgesByKind[edge.kind]++;
      if (edge.rule) edgesByRule[edge.rule] = (edgesByRule[edge.rule] ?? 0) + 1;
    }

    const componentsByCategory: Partial<Record<ComponentCategory, number>> = {};
    this.componentsByCategory.forEach((bucket, category) => {
      componentsByCategory[category] = bucket.length;
    });

    return {
      totalNodes: this.nodes.length,
      totalEdges: this.edges.length,
      nodesByKind,
      edgesByKind,
      componentsByCategory,
      edgesByRule,
    };
  }

  private toGraphEdge(edge: IndexedEdge): GraphEdge {
    const result: GraphEdge = {
      source: this.nodes[edge.source].id,
      target: this.nodes[edge.target].id,
      kind: edge.kind,
      weight: edge.weight,
    };
    return edge.rule !== undefined ? { ...result, rule: edge.rule } : result;
  }
}
