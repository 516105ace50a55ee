import type { ComponentNode, ComponentSpec, PerformanceTier } from "../../platform/catalog/graph";
import type { SimilarityScorer } from "./similarityScorer";

export type RankedCandidate = Readonly<{
  rank: number;
  componentId: string;
  name: string;
  brand: string;
  price: number;
  tier: PerformanceTier;
  score: number;
  spec: ComponentSpec;
}>;

export function clampScore(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/**
 * Orders hard-filtered candidates by score (desc), then price (asc), then
 * id, and assigns ranks 1..N over the kept prefix.
 */
export function rankCandidates(
  candidates: readonly ComponentNode[],
  selectionIds: readonly string[],
  scorer: SimilarityScorer,
  topK: number,
): RankedCandidate[] {
  const scored = candidates.map((node) => ({
    node,
    score: clampScore(scorer.score(selectionIds, node.id)),
  }));

  scored.sort((a, b) => {
    if (a.score !== b.score) return b.score - a.score;
    if (a.node.price !== b.node.price) return a.node.price - b.node.price;
    return a.node.id < b.node.id ? -1 : a.node.id > b.node.id ? 1 : 0;
  });

  return scored.slice(0, Math.max(0, topK)).map(({ node, score }, i) => ({
    rank: i + 1,
    componentId: node.id,
    name: node.name,
    brand: node.brand,
    price: node.price,
    tier: node.tier,
    score,
    spec: node.spec,
  }));
}
