import fs from "fs/promises";
import path from "path";
import {
  artifactFileSchema,
  attributeEdgeRecordSchema,
  compatibilityEdgeRecordSchema,
  nodeRecordSchema,
  synergyEdgeRecordSchema,
  type AttributeEdgeRecord,
  type CompatibilityEdgeRecord,
  type NodeRecord,
  type SynergyEdgeRecord,
} from "@shared/schema";
import type { ComponentGraphData, GraphEdge, GraphNode } from "../../platform/catalog/graph";
import { parseWithSchema, readJsonFile } from "./catalogLoader";
import { specFromPersisted, specToPersisted } from "./specCodec";

export const ARTIFACT_FILES = {
  nodes: "component_nodes.json",
  compatibility: "compatibility_edges.json",
  synergy: "synergy_edges.json",
  attributes: "attribute_mappings.json",
} as const;

export const ARTIFACT_VERSION = "1.0.0";

export type ArtifactWriteOptions = Readonly<{
  version?: string;
  now?: Date;
}>;

export function toNodeRecord(node: GraphNode): NodeRecord {
  switch (node.kind) {
    case "component":
      return {
        id: node.id,
        type: "component",
        name: node.name,
        category: node.category,
        brand: node.brand,
        price: node.price,
        tier: node.tier,
        specs: specToPersisted(node.spec),
        raw: node.raw,
      };
    case "category":
      return { id: node.id, type: "category", name: node.name, category: node.category };
    case "attribute":
      return { id: node.id, type: "attribute", name: node.name, attr_type: node.attrKey, value: node.value };
    case "purpose":
      return node.tier !== undefined
        ? { id: node.id, type: "purpose", name: node.name, tier: node.tier }
        : { id: node.id, type: "purpose", name: node.name };
  }
}

export function fromNodeRecord(rec: NodeRecord): GraphNode {
  switch (rec.type) {
    case "component":
      return {
        id: rec.id,
        kind: "component",
        name: rec.name,
        category: rec.category,
        brand: rec.brand,
        price: rec.price,
        tier: rec.tier,
        spec: specFromPersisted(rec.category, rec.specs),
        raw: rec.raw,
      };
    case "category":
      return { id: rec.id, kind: "category", name: rec.name, category: rec.category };
    case "attribute":
      return { id: rec.id, kind: "attribute", name: rec.name, attrKey: rec.attr_type, value: rec.value };
    case "purpose":
      return { id: rec.id, kind: "purpose", name: rec.name, tier: rec.tier };
  }
}

type EdgeFiles = {
  compatibility: CompatibilityEdgeRecord[];
  synergy: SynergyEdgeRecord[];
  attributes: AttributeEdgeRecord[];
};

/** Routes each edge to the artifact file its kind belongs in. */
export function splitEdges(edges: readonly GraphEdge[]): EdgeFiles {
  const files: EdgeFiles = { compatibility: [], synergy: [], attributes: [] };
  for (const e of edges) {
    switch (e.kind) {
      case "COMPATIBLE_WITH":
        files.compatibility.push({ source: e.source, target: e.target, type: e.kind, rule: e.rule ?? "unspecified" });
        break;
      case "SYNERGY_WITH":
      case "SUITABLE_FOR": {
        const record: SynergyEdgeRecord = { source: e.source, target: e.target, type: e.kind, score: e.weight };
        files.synergy.push(e.rule !== undefined ? { ...record, rule: e.rule } : record);
        break;
      }
      case "BELONGS_TO":
      case "HAS_ATTRIBUTE":
        files.attributes.push({ source: e.source, target: e.target, type: e.kind });
        break;
    }
  }
  return files;
}

function envelope<T>(data: T[], opts?: ArtifactWriteOptions) {
  return {
    version: opts?.version ?? ARTIFACT_VERSION,
    updated_at: (opts?.now ?? new Date()).toISOString().slice(0, 10),
    data,
  };
}

export async function writeGraphArtifacts(
  dir: string,
  graph: ComponentGraphData,
  opts?: ArtifactWriteOptions,
): Promise<string[]> {
  await fs.mkdir(dir, { recursive: true });
  const edges = splitEdges(graph.edges);
  const contents: Array<[string, unknown]> = [
    [ARTIFACT_FILES.nodes, envelope(graph.nodes.map(toNodeRecord), opts)],
    [ARTIFACT_FILES.compatibility, envelope(edges.compatibility, opts)],
    [ARTIFACT_FILES.synergy, envelope(edges.synergy, opts)],
    [ARTIFACT_FILES.attributes, envelope(edges.attributes, opts)],
  ];

  const written: string[] = [];
  for (const [file, body] of contents) {
    const target = path.join(dir, file);
    await fs.writeFile(target, JSON.stringify(body, null, 2), "utf-8");
    written.push(target);
  }
  return written;
}

/**
 * Loads all four artifact files. Any missing or malformed file aborts the
 * load; there is no partial graph.
 */
export async function readGraphArtifacts(dir: string): Promise<ComponentGraphData> {
  const load = async <T>(file: string, parse: (raw: unknown, label: string) => T): Promise<T> => {
    const target = path.join(dir, file);
    return parse(await readJsonFile(target), target);
  };

  const nodes = await load(ARTIFACT_FILES.nodes, (raw, label) =>
    parseWithSchema(artifactFileSchema(nodeRecordSchema), raw, label).data,
  );
  const compatibility = await load(ARTIFACT_FILES.compatibility, (raw, label) =>
    parseWithSchema(artifactFileSchema(compatibilityEdgeRecordSchema), raw, label).data,
  );
  const synergy = await load(ARTIFACT_FILES.synergy, (raw, label) =>
    parseWithSchema(artifactFileSchema(synergyEdgeRecordSchema), raw, label).data,
  );
  const attributes = await load(ARTIFACT_FILES.attributes, (raw, label) =>
    parseWithSchema(artifactFileSchema(attributeEdgeRecordSchema), raw, label).data,
  );

  const edges: GraphEdge[] = [
    ...compatibility.map((e): GraphEdge => ({ source: e.source, target: e.target, kind: e.type, weight: 1.0, rule: e.rule })),
    ...synergy.map((e): GraphEdge => ({ source: e.source, target: e.target, kind: e.type, weight: e.score, rule: e.rule })),
    ...attributes.map((e): GraphEdge => ({ source: e.source, target: e.target, kind: e.type, weight: 1.0 })),
  ];

  return { nodes: nodes.map(fromNodeRecord), edges };
}
