import { tierOrdinal, PERFORMANCE_TIERS } from "../../platform/catalog/graph";
import type { ComponentGraphStore } from "../../platform/catalog/store";

/**
 * Pluggable affinity between a partial build and one candidate. Results
 * outside [0, 1] are clamped by the ranking stage.
 */
export interface SimilarityScorer {
  score(selectionIds: readonly string[], candidateId: string): number;
}

export const NEUTRAL_SCORE = 0.5;

/**
 * Cosine similarity between two equal-length vectors.
 * Returns 0 for zero-magnitude vectors.
 */
export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  let dot = 0;
  let magA = 0;
  let magB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    magA += a[i] * a[i];
    magB += b[i] * b[i];
  }
  const denom = Math.sqrt(magA) * Math.sqrt(magB);
  if (denom === 0) return 0;
  return dot / denom;
}

const DIMENSIONS = 2;

/**
 * Scores by cosine similarity of precomputed feature vectors
 * `[tier, price percentile within category]` against the mean vector of
 * the current selections.
 *
 * Vectors live in one Float64Array indexed by the store's node handles.
 */
export class FeatureVectorScorer implements SimilarityScorer {
  private readonly vectors: Float64Array;
  private readonly present: Uint8Array;

  constructor(private readonly store: ComponentGraphStore) {
    this.vectors = new Float64Array(store.nodeCount * DIMENSIONS);
    this.present = new Uint8Array(store.nodeCount);
    this.precompute();
  }

  vectorOf(id: string): number[] | null {
    const idx = this.store.indexOf(id);
    if (idx < 0 || !this.present[idx]) return null;
    return Array.from(this.vectors.subarray(idx * DIMENSIONS, (idx + 1) * DIMENSIONS));
  }

  score(selectionIds: readonly string[], candidateId: string): number {
    const candidate = this.vectorOf(candidateId);
    if (!candidate) return 0;

    const mean = new Array<number>(DIMENSIONS).fill(0);
    let count = 0;
    for (const id of selectionIds) {
      const v = this.vectorOf(id);
      if (!v) continue;
      for (let d = 0; d < DIMENSIONS; d++) mean[d] += v[d];
      count++;
    }
    if (count === 0) return NEUTRAL_SCORE;
    for (let d = 0; d < DIMENSIONS; d++) mean[d] /= count;

    return cosineSimilarity(mean, candidate);
  }

  private precompute(): void {
    const byCategory = new Map<string, Array<{ idx: number; price: number }>>();
    for (let idx = 0; idx < this.store.nodeCount; idx++) {
      const node = this.store.nodeAt(idx);
      if (node.kind !== "component") continue;

      this.present[idx] = 1;
      this.vectors[idx * DIMENSIONS] = (tierOrdinal(node.tier) + 1) / PERFORMANCE_TIERS.length;
      this.vectors[idx * DIMENSIONS + 1] = NEUTRAL_SCORE;

      if (node.price > 0) {
        let bucket = byCategory.get(node.category);
        if (!bucket) {
          bucket = [];
          byCategory.set(node.category, bucket);
        }
        bucket.push({ idx, price: node.price });
      }
    }

    // Percentile is (rank + 1) / n; equal prices share the lowest rank.
    byCategory.forEach((bucket) => {
      bucket.sort((a, b) => a.price - b.price);
      let rank = 0;
      for (let i = 0; i < bucket.length; i++) {
        if (i > 0 && bucket[i].price !== bucket[i - 1].price) rank = i;
        this.vectors[bucket[i].idx * DIMENSIONS + 1] = (rank + 1) / bucket.length;
      }
    });
  }
}

/**
 * Adds `boost` to the base score when a SYNERGY_WITH edge links the
 * candidate with any current selection, in either direction.
 */
export class SynergyBoostScorer implements SimilarityScorer {
  constructor(
    private readonly base: SimilarityScorer,
    private readonly store: ComponentGraphStore,
    private readonly boost: number,
  ) {}

  score(selectionIds: readonly string[], candidateId: string): number {
    const base = this.base.score(selectionIds, candidateId);
    const linked = selectionIds.some(
      (id) =>
        this.store.hasEdge(id, candidateId, "SYNERGY_WITH") ||
        this.store.hasEdge(candidateId, id, "SYNERGY_WITH"),
    );
    return linked ? Math.min(1, base + this.boost) : base;
  }
}

export function createDefaultScorer(store: ComponentGraphStore, synergyBoost: number): SimilarityScorer {
  return new SynergyBoostScorer(new FeatureVectorScorer(store), store, synergyBoost);
}
