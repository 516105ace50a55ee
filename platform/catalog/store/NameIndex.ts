import type { ComponentCategory } from "../graph";

export type NameMatch = Readonly<{
  id: string;
  matchType: "exact" | "fuzzy";
}>;

export type NameLookupOptions = Readonly<{
  category?: ComponentCategory;
  /** Allow substring fallback when no exact match exists. Defaults to true. */
  fuzzy?: boolean;
}>;

type Entry = { id: string; normalized: string; category: ComponentCategory };

// Shorter keys match too much under substring containment.
const MIN_FUZZY_LENGTH = 3;

export function normalizeName(name: string): string {
  return name.replace(/[\s-]+/g, "").toUpperCase();
}

/**
 * Normalized product-name index.
 *
 * Exact lookup is O(1). The substring fallback scans one category bucket
 * (or every entry without a category) and prefers the candidate whose
 * length is closest to the query; ties go to catalog order.
 */
export class NameIndex {
  private readonly entries: Entry[] = [];
  private readonly exact = new Map<string, number[]>();
  private readonly byCategory = new Map<ComponentCategory, number[]>();

  add(id: string, name: string, category: ComponentCategory): void {
    const normalized = normalizeName(name);
    if (!normalized) return;

    const idx = this.entries.length;
    this.entries.push({ id, normalized, category });

    let bucket = this.exact.get(normalized);
    if (!bucket) {
      bucket = [];
      this.exact.set(normalized, bucket);
    }
    bucket.push(idx);

    let cat = this.byCategory.get(category);
    if (!cat) {
      cat = [];
      this.byCategory.set(category, cat);
    }
    cat.push(idx);
  }

  get size(): number {
    return this.entries.length;
  }

  resolve(name: string, opts?: NameLookupOptions): NameMatch | null {
    const query = normalizeName(name);
    if (!query) return null;

    const category = opts?.category;
    const exactHits = this.exact.get(query) ?? [];
    for (const idx of exactHits) {
      const entry = this.entries[idx];
      if (category === undefined || entry.category === category) {
        return { id: entry.id, matchType: "exact" };
      }
    }

    if (opts?.fuzzy === false || query.length < MIN_FUZZY_LENGTH) return null;

    const scope = category !== undefined
      ? this.byCategory.get(category) ?? []
      : this.entries.map((_, i) => i);

    let best: Entry | null = null;
    let bestDistance = Number.POSITIVE_INFINITY;
    for (const idx of scope) {
      const entry = this.entries[idx];
      if (entry.normalized.length < MIN_FUZZY_LENGTH) continue;
      if (!entry.normalized.includes(query) && !query.includes(entry.normalized)) continue;
      const distance = Math.abs(entry.normalized.length - query.length);
      if (distance < bestDistance) {
        best = entry;
        bestDistance = distance;
      }
    }

    if (!best) return null;
    console.log(`[name-index] fuzzy match "${name}" -> ${best.id}`);
    return { id: best.id, matchType: "fuzzy" };
  }
}
