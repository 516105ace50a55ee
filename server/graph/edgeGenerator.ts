import type { GameRequirement, PopularBuild } from "@shared/schema";
import type {
  ComponentCategory,
  ComponentNode,
  GraphEdge,
  PurposeNode,
} from "../../platform/catalog/graph";
import { FORM_FACTORS, specFields } from "../../platform/catalog/graph";
import { requiredPsuWattage, type PsuRuleConfig } from "../config";
import { caseMentionsFormFactor } from "./compatibilityRules";

export type EdgeRuleOptions = Readonly<{
  maxEdgesPerNode: number;
  psu: PsuRuleConfig;
}>;

export type NameResolver = (name: string, category: ComponentCategory) => string | null;

export type CompatibilityRule =
  | "socket"
  | "memory_type"
  | "gpu_length"
  | "form_factor"
  | "psu_capacity"
  | "cooler_height";

// Popular-build keys in pairing order.
const BUILD_SLOTS: ReadonlyArray<readonly [keyof PopularBuild, ComponentCategory]> = [
  ["cpu", "cpu"],
  ["gpu", "gpu"],
  ["mb", "motherboard"],
  ["ram", "memory"],
  ["psu", "psu"],
];

// Game requirement placeholder for integrated graphics.
const INTEGRATED_GPU = "INTERNAL";

/**
 * Caps outgoing edges per (source, rule) and drops repeated
 * (source, target, kind) triples.
 */
export class FanoutLimiter {
  private readonly counts = new Map<string, number>();
  private readonly seen = new Set<string>();

  constructor(private readonly max: number) {}

  add(out: GraphEdge[], edge: GraphEdge): boolean {
    const triple = `${edge.source}|${edge.target}|${edge.kind}`;
    if (this.seen.has(triple)) return false;

    const slot = `${edge.source}|${edge.kind}|${edge.rule ?? ""}`;
    const count = this.counts.get(slot) ?? 0;
    if (count >= this.max) return false;

    this.seen.add(triple);
    this.counts.set(slot, count + 1);
    out.push(edge);
    return true;
  }
}

/** Lowest index whose value is >= x. `sorted` must be ascending. */
export function bisectLeft(sorted: readonly number[], x: number): number {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (sorted[mid] < x) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

export function partitionByCategory(
  components: readonly ComponentNode[],
): Map<ComponentCategory, ComponentNode[]> {
  const byCategory = new Map<ComponentCategory, ComponentNode[]>();
  for (const node of components) {
    let bucket = byCategory.get(node.category);
    if (!bucket) {
      bucket = [];
      byCategory.set(node.category, bucket);
    }
    bucket.push(node);
  }
  return byCategory;
}

type SortedIndex = { values: number[]; nodes: ComponentNode[] };

function sortedBy(
  nodes: readonly ComponentNode[],
  pick: (node: ComponentNode) => number | undefined,
): SortedIndex {
  const pairs: Array<[number, ComponentNode]> = [];
  for (const node of nodes) {
    const value = pick(node);
    if (value !== undefined) pairs.push([value, node]);
  }
  pairs.sort((a, b) => a[0] - b[0]);
  return { values: pairs.map((p) => p[0]), nodes: pairs.map((p) => p[1]) };
}

function bucketBy(
  nodes: readonly ComponentNode[],
  pick: (node: ComponentNode) => string | undefined,
): Map<string, ComponentNode[]> {
  const buckets = new Map<string, ComponentNode[]>();
  for (const node of nodes) {
    const key = pick(node);
    if (key === undefined) continue;
    let bucket = buckets.get(key);
    if (!bucket) {
      bucket = [];
      buckets.set(key, bucket);
    }
    bucket.push(node);
  }
  return buckets;
}

function compatible(source: string, target: string, rule: CompatibilityRule): GraphEdge {
  return { source, target, kind: "COMPATIBLE_WITH", weight: 1.0, rule };
}

/**
 * Hard compatibility edges. Equality rules bucket the target category once;
 * threshold rules sort it once and bisect per source, so each rule costs
 * O(n log n) plus the capped output.
 */
export function generateCompatibilityEdges(
  components: readonly ComponentNode[],
  opts: EdgeRuleOptions,
): GraphEdge[] {
  const byCategory = partitionByCategory(components);
  const of = (category: ComponentCategory) => byCategory.get(category) ?? [];
  const max = opts.maxEdgesPerNode;
  const limiter = new FanoutLimiter(max);
  const edges: GraphEdge[] = [];

  const boards = of("motherboard");
  const cases = of("case");

  // socket: CPU -> motherboard
  const boardsBySocket = bucketBy(boards, (n) => specFields(n.spec).socket);
  for (const cpu of of("cpu")) {
    const socket = specFields(cpu.spec).socket;
    if (socket === undefined) continue;
    for (const mb of (boardsBySocket.get(socket) ?? []).slice(0, max)) {
      limiter.add(edges, compatible(cpu.id, mb.id, "socket"));
    }
  }

  // memory_type: memory -> motherboard
  const boardsByMemory = bucketBy(boards, (n) => specFields(n.spec).memoryType);
  for (const mem of of("memory")) {
    const memoryType = specFields(mem.spec).memoryType;
    if (memoryType === undefined) continue;
    for (const mb of (boardsByMemory.get(memoryType) ?? []).slice(0, max)) {
      limiter.add(edges, compatible(mem.id, mb.id, "memory_type"));
    }
  }

  // gpu_length: GPU -> case with enough clearance
  const casesByGpuLimit = sortedBy(cases, (n) => specFields(n.spec).maxGpuMm);
  for (const gpu of of("gpu")) {
    const length = specFields(gpu.spec).lengthMm;
    if (length === undefined) continue;
    const start = bisectLeft(casesByGpuLimit.values, length);
    for (const c of casesByGpuLimit.nodes.slice(start, start + max)) {
      limiter.add(edges, compatible(gpu.id, c.id, "gpu_length"));
    }
  }

  // form_factor: motherboard -> case mentioning the board's form factor
  const casesByFormFactor = new Map<string, ComponentNode[]>();
  for (const formFactor of FORM_FACTORS) {
    casesByFormFactor.set(formFactor, cases.filter((c) => caseMentionsFormFactor(c.raw, formFactor)));
  }
  for (const mb of boards) {
    const formFactor = specFields(mb.spec).formFactor;
    if (formFactor === undefined) continue;
    for (const c of (casesByFormFactor.get(formFactor) ?? []).slice(0, max)) {
      limiter.add(edges, compatible(mb.id, c.id, "form_factor"));
    }
  }

  // psu_capacity: GPU -> PSU with headroom over the card's TDP
  const psusByWattage = sortedBy(of("psu"), (n) => specFields(n.spec).wattage);
  for (const gpu of of("gpu")) {
    const minimum = requiredPsuWattage(specFields(gpu.spec).tdp, opts.psu);
    const start = bisectLeft(psusByWattage.values, minimum);
    for (const p of psusByWattage.nodes.slice(start, start + max)) {
      limiter.add(edges, compatible(gpu.id, p.id, "psu_capacity"));
    }
  }

  // cooler_height: cooler -> case with enough clearance
  const casesByCoolerLimit = sortedBy(cases, (n) => specFields(n.spec).maxCoolerMm);
  for (const cooler of of("cooler")) {
    const height = specFields(cooler.spec).heightMm;
    if (height === undefined) continue;
    const start = bisectLeft(casesByCoolerLimit.values, height);
    for (const c of casesByCoolerLimit.nodes.slice(start, start + max)) {
      limiter.add(edges, compatible(cooler.id, c.id, "cooler_height"));
    }
  }

  return edges;
}

export type SynergyResult = Readonly<{
  edges: GraphEdge[];
  unresolvedNames: number;
}>;

/**
 * Soft affinity edges: every pair of parts that co-occur in a curated build,
 * plus CPU -> GPU pairs of equal tier.
 */
export function generateSynergyEdges(
  components: readonly ComponentNode[],
  builds: readonly PopularBuild[],
  resolve: NameResolver,
  opts: EdgeRuleOptions,
): SynergyResult {
  const limiter = new FanoutLimiter(opts.maxEdgesPerNode);
  const edges: GraphEdge[] = [];
  let unresolvedNames = 0;

  for (const build of builds) {
    const ids: string[] = [];
    for (const [slot, category] of BUILD_SLOTS) {
      const name = build[slot];
      if (!name) continue;
      const id = resolve(name, category);
      if (id) ids.push(id);
      else unresolvedNames++;
    }
    for (let i = 0; i < ids.length; i++) {
      for (let j = i + 1; j < ids.length; j++) {
        limiter.add(edges, {
          source: ids[i],
          target: ids[j],
          kind: "SYNERGY_WITH",
          weight: 1.0,
          rule: "popular_build",
        });
      }
    }
  }

  const byCategory = partitionByCategory(components);
  const gpusByTier = bucketBy(byCategory.get("gpu") ?? [], (n) => n.tier);
  for (const cpu of byCategory.get("cpu") ?? []) {
    for (const gpu of (gpusByTier.get(cpu.tier) ?? []).slice(0, opts.maxEdgesPerNode)) {
      limiter.add(edges, {
        source: cpu.id,
        target: gpu.id,
        kind: "SYNERGY_WITH",
        weight: 1.0,
        rule: "tier_match",
      });
    }
  }

  return { edges, unresolvedNames };
}

export type SuitabilityResult = Readonly<{
  purposes: PurposeNode[];
  edges: GraphEdge[];
  unresolvedNames: number;
}>;

/**
 * One purpose node per game; the GPU named as the game's minimum gets a
 * SUITABLE_FOR edge to it.
 */
export function generateSuitabilityEdges(
  games: readonly GameRequirement[],
  resolve: NameResolver,
): SuitabilityResult {
  const purposes: PurposeNode[] = [];
  const seen = new Set<string>();
  const edges: GraphEdge[] = [];
  let unresolvedNames = 0;

  for (const game of games) {
    const purposeId = `game_${game.id}`;
    if (!seen.has(purposeId)) {
      seen.add(purposeId);
      purposes.push({ id: purposeId, kind: "purpose", name: game.name, tier: game.tier });
    }

    const gpuName = game.gpu_min;
    if (!gpuName || gpuName.trim().toUpperCase() === INTEGRATED_GPU) continue;

    const gpuId = resolve(gpuName, "gpu");
    if (!gpuId) {
      unresolvedNames++;
      continue;
    }
    edges.push({ source: gpuId, target: purposeId, kind: "SUITABLE_FOR", weight: 1.0, rule: "min_requirement" });
  }

  return { purposes, edges, unresolvedNames };
}
