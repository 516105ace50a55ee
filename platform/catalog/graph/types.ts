/**
 * Component Graph Contract
 *
 * This module defines the graph primitives for the PC component catalog:
 * typed nodes (components, categories, attributes, purposes) and typed edges
 * (membership, attributes, compatibility, synergy, suitability).
 *
 * Invariants:
 * - Node ids are globally unique
 * - A component node belongs to exactly one category
 * - Edge endpoints reference existing nodes
 * - Outgoing COMPATIBLE_WITH / SYNERGY_WITH edges are bounded per source and rule
 *
 * This contract intentionally excludes:
 * - Storage and indexing
 * - Edge generation rules
 * - Session state
 */

// ============================================================================
// Enumerations
// ============================================================================

export const COMPONENT_CATEGORIES = [
  "cpu",
  "motherboard",
  "memory",
  "gpu",
  "storage",
  "psu",
  "case",
  "cooler",
  "unknown",
] as const;

/**
 * Canonical component category. `unknown` absorbs raw categories the
 * catalog mapping does not recognize.
 */
export type ComponentCategory = (typeof COMPONENT_CATEGORIES)[number];

/**
 * Performance tier, ordered from lowest to highest.
 */
export const PERFORMANCE_TIERS = [
  "Entry",
  "Mainstream",
  "Performance",
  "High-End",
  "Enthusiast",
] as const;

export type PerformanceTier = (typeof PERFORMANCE_TIERS)[number];

export type NodeKind = "component" | "category" | "attribute" | "purpose";

/**
 * Relationship carried by an edge.
 * - BELONGS_TO: component → category node
 * - HAS_ATTRIBUTE: component → attribute node
 * - COMPATIBLE_WITH: hard compatibility produced by a rule
 * - SYNERGY_WITH: soft affinity (curated builds, tier match)
 * - SUITABLE_FOR: component → purpose node
 */
export type EdgeKind =
  | "BELONGS_TO"
  | "HAS_ATTRIBUTE"
  | "COMPATIBLE_WITH"
  | "SYNERGY_WITH"
  | "SUITABLE_FOR";

export const FORM_FACTORS = ["E-ATX", "ATX", "MATX", "ITX"] as const;

export type FormFactor = (typeof FORM_FACTORS)[number];

// ============================================================================
// Extracted specs
// ============================================================================

export type CpuSpec = Readonly<{
  category: "cpu";
  socket?: string;
  memoryType?: string;
  tdp?: number;
}>;

export type MotherboardSpec = Readonly<{
  category: "motherboard";
  socket?: string;
  memoryType?: string;
  formFactor?: FormFactor;
}>;

export type MemorySpec = Readonly<{
  category: "memory";
  memoryType?: string;
}>;

export type GpuSpec = Readonly<{
  category: "gpu";
  tdp?: number;
  lengthMm?: number;
}>;

export type StorageSpec = Readonly<{
  category: "storage";
}>;

export type PsuSpec = Readonly<{
  category: "psu";
  wattage?: number;
  formFactor?: FormFactor;
}>;

export type CaseSpec = Readonly<{
  category: "case";
  formFactor?: FormFactor;
  maxGpuMm?: number;
  maxCoolerMm?: number;
}>;

export type CoolerSpec = Readonly<{
  category: "cooler";
  socket?: string;
  tdp?: number;
  heightMm?: number;
}>;

export type UnknownSpec = Readonly<{
  category: "unknown";
  socket?: string;
  memoryType?: string;
  formFactor?: FormFactor;
  tdp?: number;
}>;

/**
 * Normalized specification of a component, tagged by category.
 *
 * Every field is optional: absence means the raw text did not carry the
 * value, never that extraction failed.
 */
export type ComponentSpec =
  | CpuSpec
  | MotherboardSpec
  | MemorySpec
  | GpuSpec
  | StorageSpec
  | PsuSpec
  | CaseSpec
  | CoolerSpec
  | UnknownSpec;

/**
 * Category-independent read view of a spec. Every variant is assignable to
 * it, so rule code can ask for `tdp` without switching on the category.
 */
export type SpecFields = Readonly<{
  category: ComponentCategory;
  socket?: string;
  memoryType?: string;
  formFactor?: FormFactor;
  wattage?: number;
  tdp?: number;
  lengthMm?: number;
  maxGpuMm?: number;
  maxCoolerMm?: number;
  heightMm?: number;
}>;

export function specFields(spec: ComponentSpec): SpecFields {
  return spec;
}

/**
 * Flat key names used when a spec value becomes an attribute node or is
 * persisted.
 */
export type SpecKey =
  | "socket"
  | "memory_type"
  | "form_factor"
  | "wattage"
  | "tdp"
  | "length_mm"
  | "max_gpu_mm"
  | "max_cooler_mm"
  | "height_mm";

// ============================================================================
// Nodes
// ============================================================================

/**
 * A purchasable part.
 *
 * `raw` keeps the uppercased source text; the form-factor rule for cases
 * matches against it.
 *
 * @example
 * ```ts
 * const cpu: ComponentNode = {
 *   id: 'cpu_101',
 *   kind: 'component',
 *   name: 'Intel Core i5-13400F',
 *   category: 'cpu',
 *   brand: 'Intel',
 *   price: 245000,
 *   tier: 'Performance',
 *   spec: { category: 'cpu', socket: 'LGA1700', memoryType: 'DDR5', tdp: 65 },
 *   raw: '101 INTEL CORE I5-13400F LGA1700 DDR5 65W 245000',
 * };
 * ```
 */
export type ComponentNode = Readonly<{
  id: string;
  kind: "component";
  name: string;
  category: ComponentCategory;
  brand: string;
  /** Integer currency units; 0 when unknown. */
  price: number;
  tier: PerformanceTier;
  spec: ComponentSpec;
  raw: string;
}>;

export type CategoryNode = Readonly<{
  id: string;
  kind: "category";
  name: string;
  category: ComponentCategory;
}>;

export type AttributeNode = Readonly<{
  id: string;
  kind: "attribute";
  name: string;
  attrKey: SpecKey;
  value: string | number;
}>;

export type PurposeNode = Readonly<{
  id: string;
  kind: "purpose";
  name: string;
  tier?: string;
}>;

export type GraphNode = ComponentNode | CategoryNode | AttributeNode | PurposeNode;

// ============================================================================
// Edges
// ============================================================================

export type GraphEdge = Readonly<{
  source: string;
  target: string;
  kind: EdgeKind;
  /** Defaults to 1.0. */
  weight: number;
  /** Name of the rule that produced the edge, when one did. */
  rule?: string;
}>;

/**
 * Complete output of graph construction, keyed by string ids.
 */
export type ComponentGraphData = Readonly<{
  nodes: readonly GraphNode[];
  edges: readonly GraphEdge[];
}>;

// ============================================================================
// Type Guards
// ============================================================================

export function isComponentNode(node: GraphNode): node is ComponentNode {
  return node.kind === "component";
}

export function tierOrdinal(tier: PerformanceTier): number {
  return PERFORMANCE_TIERS.indexOf(tier);
}
