import type { ComponentCategory, PerformanceTier } from "../../platform/catalog/graph";

const CATEGORY_ALIASES = new Map<string, ComponentCategory>([
  ["cpu", "cpu"],
  ["motherboard", "motherboard"],
  ["memory", "memory"],
  ["ram", "memory"],
  ["video_card", "gpu"],
  ["gpu", "gpu"],
  ["power_supply", "psu"],
  ["psu", "psu"],
  ["case", "case"],
  ["cooler", "cooler"],
  ["cpu_cooler", "cooler"],
  ["storage", "storage"],
  ["internal_hard_drive", "storage"],
]);

// Checked in order; the first brand with a matching keyword wins.
const BRAND_KEYWORDS: ReadonlyArray<readonly [string, readonly string[]]> = [
  ["Intel", ["INTEL"]],
  ["AMD", ["AMD", "RYZEN", "RADEON"]],
  ["NVIDIA", ["NVIDIA", "GEFORCE", "RTX", "GTX"]],
  ["Samsung", ["SAMSUNG"]],
  ["ASUS", ["ASUS", "ROG", "TUF", "PRIME"]],
  ["MSI", ["MSI", "MAG", "MPG", "MEG"]],
  ["Gigabyte", ["GIGABYTE", "AORUS", "AERO"]],
  ["SK hynix", ["HYNIX"]],
];

const CPU_TIERS: ReadonlyArray<readonly [PerformanceTier, readonly string[]]> = [
  ["Enthusiast", ["I9", "R9", "RYZEN9", "7800X3D", "7950X"]],
  ["High-End", ["I7", "R7", "RYZEN7"]],
  ["Performance", ["I5", "R5", "RYZEN5"]],
];

const GPU_TIERS: ReadonlyArray<readonly [PerformanceTier, readonly string[]]> = [
  ["Enthusiast", ["4090", "4080", "7900XT"]],
  ["High-End", ["4070", "7800XT"]],
  ["Performance", ["4060", "7600"]],
];

/**
 * Maps a raw table or category name onto a canonical category. Anything
 * unrecognized lands in `unknown`.
 */
export function mapCategory(raw: string): ComponentCategory {
  return CATEGORY_ALIASES.get(raw.trim().toLowerCase()) ?? "unknown";
}

export function detectBrand(name: string): string {
  const upper = name.toUpperCase();
  for (const [brand, keywords] of BRAND_KEYWORDS) {
    if (keywords.some((kw) => upper.includes(kw))) return brand;
  }
  return "Generic";
}

/**
 * Tier by model family. Matching runs on the name with whitespace removed,
 * so "RX 7900 XT" and "RX 7900XT" classify alike.
 */
export function classifyTier(category: ComponentCategory, name: string): PerformanceTier {
  const compact = name.toUpperCase().replace(/\s+/g, "");
  if (category === "cpu") return firstTier(CPU_TIERS, compact) ?? "Mainstream";
  if (category === "gpu") return firstTier(GPU_TIERS, compact) ?? "Entry";
  return "Mainstream";
}

function firstTier(
  table: ReadonlyArray<readonly [PerformanceTier, readonly string[]]>,
  compact: string,
): PerformanceTier | undefined {
  for (const [tier, markers] of table) {
    if (markers.some((m) => compact.includes(m))) return tier;
  }
  return undefined;
}
