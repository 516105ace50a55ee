import { z } from "zod";
import {
  COMPONENT_CATEGORIES,
  FORM_FACTORS,
  PERFORMANCE_TIERS,
} from "../platform/catalog/graph";
import { SESSION_PURPOSES } from "../platform/session";

// ============================================================================
// Shared primitives
// ============================================================================

const idSchema = z.union([z.string().min(1), z.number()]).transform(String);

const isoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");

export const componentCategorySchema = z.enum(COMPONENT_CATEGORIES);
export const formFactorSchema = z.enum(FORM_FACTORS);
export const performanceTierSchema = z.enum(PERFORMANCE_TIERS);
export const sessionPurposeSchema = z.enum(SESSION_PURPOSES);

export const SPEC_KEYS = [
  "socket",
  "memory_type",
  "form_factor",
  "wattage",
  "tdp",
  "length_mm",
  "max_gpu_mm",
  "max_cooler_mm",
  "height_mm",
] as const;

export const specKeySchema = z.enum(SPEC_KEYS);

/**
 * Spec values as persisted and as accepted from callers. Keys are flat and
 * snake_case; the in-memory tagged variant is rebuilt from the category.
 */
export const persistedSpecSchema = z.object({
  socket: z.string().min(1).optional(),
  memory_type: z.string().min(1).optional(),
  form_factor: formFactorSchema.optional(),
  wattage: z.number().nonnegative().optional(),
  tdp: z.number().nonnegative().optional(),
  length_mm: z.number().nonnegative().optional(),
  max_gpu_mm: z.number().nonnegative().optional(),
  max_cooler_mm: z.number().nonnegative().optional(),
  height_mm: z.number().nonnegative().optional(),
}).strict();

export type PersistedSpec = z.infer<typeof persistedSpecSchema>;

/**
 * Wraps a list in the `{version, updated_at, data}` envelope shared by the
 * catalog input and the graph artifacts.
 */
export function artifactFileSchema<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    version: z.string().min(1),
    updated_at: isoDateSchema,
    data: z.array(item),
  });
}

// ============================================================================
// Catalog input
// ============================================================================

export const rawPartRecordSchema = z.object({
  table: z.string().min(1),
  id: idSchema,
  name: z.string().min(1),
  price: z.union([z.number(), z.string()]).optional(),
  fields: z.record(z.union([z.string(), z.number(), z.null()])).optional(),
});

export type RawPartRecord = z.infer<typeof rawPartRecordSchema>;

export const rawCatalogSchema = z.union([
  z.array(rawPartRecordSchema),
  artifactFileSchema(rawPartRecordSchema),
]);

export const popularBuildSchema = z.object({
  cpu: z.string().optional(),
  gpu: z.string().optional(),
  mb: z.string().optional(),
  ram: z.string().optional(),
  psu: z.string().optional(),
});

export type PopularBuild = z.infer<typeof popularBuildSchema>;

export const gameRequirementSchema = z.object({
  id: idSchema,
  name: z.string().min(1),
  tier: z.string().optional(),
  gpu_min: z.string().optional(),
});

export type GameRequirement = z.infer<typeof gameRequirementSchema>;

// ============================================================================
// Graph artifacts
// ============================================================================

const componentNodeRecordSchema = z.object({
  id: z.string().min(1),
  type: z.literal("component"),
  name: z.string(),
  category: componentCategorySchema,
  brand: z.string(),
  price: z.number().int().nonnegative(),
  tier: performanceTierSchema,
  specs: persistedSpecSchema,
  raw: z.string(),
}).strict();

const categoryNodeRecordSchema = z.object({
  id: z.string().min(1),
  type: z.literal("category"),
  name: z.string(),
  category: componentCategorySchema,
}).strict();

const attributeNodeRecordSchema = z.object({
  id: z.string().min(1),
  type: z.literal("attribute"),
  name: z.string(),
  attr_type: specKeySchema,
  value: z.union([z.string(), z.number()]),
}).strict();

const purposeNodeRecordSchema = z.object({
  id: z.string().min(1),
  type: z.literal("purpose"),
  name: z.string(),
  tier: z.string().optional(),
}).strict();

export const nodeRecordSchema = z.discriminatedUnion("type", [
  componentNodeRecordSchema,
  categoryNodeRecordSchema,
  attributeNodeRecordSchema,
  purposeNodeRecordSchema,
]);

export type NodeRecord = z.infer<typeof nodeRecordSchema>;

export const compatibilityEdgeRecordSchema = z.object({
  source: z.string().min(1),
  target: z.string().min(1),
  type: z.literal("COMPATIBLE_WITH"),
  rule: z.string().min(1),
}).strict();

export type CompatibilityEdgeRecord = z.infer<typeof compatibilityEdgeRecordSchema>;

export const synergyEdgeRecordSchema = z.object({
  source: z.string().min(1),
  target: z.string().min(1),
  type: z.enum(["SYNERGY_WITH", "SUITABLE_FOR"]),
  score: z.number(),
  rule: z.string().min(1).optional(),
}).strict();

export type SynergyEdgeRecord = z.infer<typeof synergyEdgeRecordSchema>;

export const attributeEdgeRecordSchema = z.object({
  source: z.string().min(1),
  target: z.string().min(1),
  type: z.enum(["BELONGS_TO", "HAS_ATTRIBUTE"]),
}).strict();

export type AttributeEdgeRecord = z.infer<typeof attributeEdgeRecordSchema>;

// ============================================================================
// Session API
// ============================================================================

export const CONSTRAINT_KEYS = [
  "socket",
  "memory_type",
  "form_factor",
  "psu_capacity",
  "gpu_length",
  "cooler_height",
  "budget",
] as const;

export type ConstraintKey = (typeof CONSTRAINT_KEYS)[number];

export const startSessionRequestSchema = z.object({
  budget: z.number(),
  purpose: z.string().optional(),
});

export const componentDataSchema = z.object({
  name: z.string().min(1).optional(),
  price: z.number().int().nonnegative().optional(),
  specs: persistedSpecSchema.optional(),
}).strict();

export type ComponentData = z.infer<typeof componentDataSchema>;

export const selectComponentRequestSchema = z.object({
  step: z.number().int(),
  componentId: z.string().min(1),
  componentData: componentDataSchema.optional(),
});

export const stepQuerySchema = z.object({
  topK: z.coerce.number().int().min(1).max(50).optional(),
  relax: z
    .string()
    .optional()
    .transform((v) => (v ? v.split(",").map((s) => s.trim()).filter(Boolean) : []))
    .pipe(z.array(z.enum(CONSTRAINT_KEYS))),
});

export const resolveNameQuerySchema = z.object({
  name: z.string().min(1),
  category: componentCategorySchema.optional(),
});
