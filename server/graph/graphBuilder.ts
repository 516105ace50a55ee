import type { GameRequirement, PopularBuild, RawPartRecord } from "@shared/schema";
import type {
  AttributeNode,
  CategoryNode,
  ComponentCategory,
  ComponentGraphData,
  ComponentNode,
  GraphEdge,
  GraphNode,
  SpecKey,
} from "../../platform/catalog/graph";
import { NameIndex } from "../../platform/catalog/store";
import type { EngineConfig } from "../config";
import { parsePrice, rawText } from "./catalogLoader";
import {
  generateCompatibilityEdges,
  generateSuitabilityEdges,
  generateSynergyEdges,
  type NameResolver,
} from "./edgeGenerator";
import { classifyTier, detectBrand, mapCategory } from "./partClassifier";
import { extractSpec, specEntries } from "./specExtractor";

export type GraphBuildInput = Readonly<{
  parts: readonly RawPartRecord[];
  popularBuilds: readonly PopularBuild[];
  games: readonly GameRequirement[];
}>;

export type GraphBuildOptions = Pick<
  EngineConfig,
  "maxEdgesPerNode" | "psu" | "defaultCaseCoolerMm" | "fuzzyNameMatch"
>;

export type GraphBuildReport = Readonly<{
  components: number;
  duplicateIds: number;
  unknownCategories: Readonly<Record<string, number>>;
  specGaps: Readonly<Partial<Record<SpecKey, number>>>;
  unresolvedNames: number;
  nodes: number;
  edges: number;
}>;

export type GraphBuildResult = Readonly<{
  graph: ComponentGraphData;
  report: GraphBuildReport;
}>;

export function categoryNodeId(category: ComponentCategory): string {
  return `cat_${category}`;
}

export function attributeNodeId(key: SpecKey, value: string | number): string {
  return `attr_${key}_${value}`;
}

/**
 * Single-pass batch build: classify and extract every part, then derive
 * category, attribute and purpose nodes and all edge families.
 *
 * Unknown categories and spec gaps are counted, never fatal.
 */
export function buildComponentGraph(input: GraphBuildInput, opts: GraphBuildOptions): GraphBuildResult {
  const byId = new Map<string, ComponentNode>();
  const unknownCategories = new Map<string, number>();
  const specGaps: Partial<Record<SpecKey, number>> = {};
  let duplicateIds = 0;

  for (const record of input.parts) {
    const category = mapCategory(record.table);
    if (category === "unknown") {
      unknownCategories.set(record.table, (unknownCategories.get(record.table) ?? 0) + 1);
    }

    const raw = rawText(record);
    const { spec, gaps } = extractSpec(category, raw, opts);
    for (const gap of gaps) specGaps[gap] = (specGaps[gap] ?? 0) + 1;

    const id = `${category}_${record.id}`;
    if (byId.has(id)) duplicateIds++;
    byId.set(id, {
      id,
      kind: "component",
      name: record.name,
      category,
      brand: detectBrand(record.name),
      price: parsePrice(record.price),
      tier: classifyTier(category, record.name),
      spec,
      raw,
    });
  }

  const components = Array.from(byId.values());

  const names = new NameIndex();
  for (const c of components) names.add(c.id, c.name, c.category);
  const resolve: NameResolver = (name, category) =>
    names.resolve(name, { category, fuzzy: opts.fuzzyNameMatch })?.id ?? null;

  const categoryNodes = new Map<ComponentCategory, CategoryNode>();
  const attributeNodes = new Map<string, AttributeNode>();
  const attributeEdges: GraphEdge[] = [];

  for (const c of components) {
    if (!categoryNodes.has(c.category)) {
      categoryNodes.set(c.category, {
        id: categoryNodeId(c.category),
        kind: "category",
        name: c.category,
        category: c.category,
      });
    }
    attributeEdges.push({ source: c.id, target: categoryNodeId(c.category), kind: "BELONGS_TO", weight: 1.0 });

    for (const [key, value] of specEntries(c.spec)) {
      const attrId = attributeNodeId(key, value);
      if (!attributeNodes.has(attrId)) {
        attributeNodes.set(attrId, { id: attrId, kind: "attribute", name: String(value), attrKey: key, value });
      }
      attributeEdges.push({ source: c.id, target: attrId, kind: "HAS_ATTRIBUTE", weight: 1.0 });
    }
  }

  const compatibility = generateCompatibilityEdges(components, opts);
  const synergy = generateSynergyEdges(components, input.popularBuilds, resolve, opts);
  const suitability = generateSuitabilityEdges(input.games, resolve);

  const nodes: GraphNode[] = [
    ...components,
    ...categoryNodes.values(),
    ...attributeNodes.values(),
    ...suitability.purposes,
  ];
  const edges: GraphEdge[] = [
    ...compatibility,
    ...synergy.edges,
    ...suitability.edges,
    ...attributeEdges,
  ];

  const report: GraphBuildReport = {
    components: components.length,
    duplicateIds,
    unknownCategories: Object.fromEntries(unknownCategories),
    specGaps,
    unresolvedNames: synergy.unresolvedNames + suitability.unresolvedNames,
    nodes: nodes.length,
    edges: edges.length,
  };
  logBuildReport(report);

  return { graph: { nodes, edges }, report };
}

function logBuildReport(report: GraphBuildReport): void {
  console.log(
    `[graph-builder] ${report.components} components, ${report.nodes} nodes, ${report.edges} edges`,
  );
  for (const [table, count] of Object.entries(report.unknownCategories)) {
    console.warn(`[graph-builder] ${count} part(s) from unrecognized table "${table}" filed as unknown`);
  }
  const gaps = Object.entries(report.specGaps)
    .map(([key, count]) => `${key}=${count}`)
    .join(", ");
  if (gaps) console.log(`[graph-builder] spec extraction gaps: ${gaps}`);
  if (report.duplicateIds > 0) {
    console.warn(`[graph-builder] ${report.duplicateIds} duplicate part id(s); last record kept`);
  }
  if (report.unresolvedNames > 0) {
    console.warn(`[graph-builder] ${report.unresolvedNames} reference name(s) did not resolve`);
  }
}
