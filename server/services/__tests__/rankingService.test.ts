import { describe, it, expect } from "vitest";
import { clampScore, rankCandidates } from "../rankingService";
import type { SimilarityScorer } from "../similarityScorer";
import { part } from "../../__tests__/fixtures/components";

function fixedScores(scores: Record<string, number>): SimilarityScorer {
  const table = new Map(Object.entries(scores));
  return { score: (_selections, candidateId) => table.get(candidateId) ?? 0 };
}

const candidates = [
  part("a", { category: "gpu" }, { price: 300 }),
  part("c", { category: "gpu" }, { price: 100 }),
  part("b", { category: "gpu" }, { price: 100 }),
  part("d", { category: "gpu" }, { price: 50 }),
  part("e", { category: "gpu" }, { price: 900 }),
  part("f", { category: "gpu" }, { price: 90 }),
];

const scorer = fixedScores({ a: 0.9, b: 0.5, c: 0.5, d: Number.NaN, e: 1.7, f: 0.5 });

describe("rankingService", () => {
  it("clamps scores into [0, 1] and maps NaN to 0", () => {
    expect(clampScore(1.7)).toBe(1);
    expect(clampScore(-0.2)).toBe(0);
    expect(clampScore(Number.NaN)).toBe(0);
    expect(clampScore(0.42)).toBe(0.42);
  });

  it("orders by score, then price, then id", () => {
    const ranked = rankCandidates(candidates, [], scorer, 10);
    expect(ranked.map((r) => [r.rank, r.componentId, r.score])).toEqual([
      [1, "e", 1],
      [2, "a", 0.9],
      [3, "f", 0.5],
      [4, "b", 0.5],
      [5, "c", 0.5],
      [6, "d", 0],
    ]);
  });

  it("keeps only the top K", () => {
    const ranked = rankCandidates(candidates, [], scorer, 2);
    expect(ranked.map((r) => r.componentId)).toEqual(["e", "a"]);
  });

  it("returns nothing for an empty candidate list", () => {
    expect(rankCandidates([], ["x"], scorer, 5)).toEqual([]);
  });

  it("carries display fields from the node", () => {
    const [top] = rankCandidates([part("g", { category: "gpu", tdp: 200 }, { name: "Card G", brand: "NVIDIA" })], [], scorer, 1);
    expect(top).toEqual({
      rank: 1,
      componentId: "g",
      name: "Card G",
      brand: "NVIDIA",
      price: 100_000,
      tier: "Mainstream",
      score: 0,
      spec: { category: "gpu", tdp: 200 },
    });
  });
});
