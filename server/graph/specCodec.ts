import type { PersistedSpec } from "@shared/schema";
import type { ComponentCategory, ComponentSpec } from "../../platform/catalog/graph";
import { specFields } from "../../platform/catalog/graph";
import { extractMemoryType, extractSocket } from "./specExtractor";

export function specToPersisted(spec: ComponentSpec): PersistedSpec {
  const f = specFields(spec);
  const out: PersistedSpec = {};
  if (f.socket !== undefined) out.socket = f.socket;
  if (f.memoryType !== undefined) out.memory_type = f.memoryType;
  if (f.formFactor !== undefined) out.form_factor = f.formFactor;
  if (f.wattage !== undefined) out.wattage = f.wattage;
  if (f.tdp !== undefined) out.tdp = f.tdp;
  if (f.lengthMm !== undefined) out.length_mm = f.lengthMm;
  if (f.maxGpuMm !== undefined) out.max_gpu_mm = f.maxGpuMm;
  if (f.maxCoolerMm !== undefined) out.max_cooler_mm = f.maxCoolerMm;
  if (f.heightMm !== undefined) out.height_mm = f.heightMm;
  return out;
}

/**
 * Rebuilds the tagged variant for `category`. Keys that do not belong to
 * the category are dropped.
 */
export function specFromPersisted(category: ComponentCategory, p: PersistedSpec): ComponentSpec {
  switch (category) {
    case "cpu":
      return { category, socket: p.socket, memoryType: p.memory_type, tdp: p.tdp };
    case "motherboard":
      return { category, socket: p.socket, memoryType: p.memory_type, formFactor: p.form_factor };
    case "memory":
      return { category, memoryType: p.memory_type };
    case "gpu":
      return { category, tdp: p.tdp, lengthMm: p.length_mm };
    case "storage":
      return { category };
    case "psu":
      return { category, wattage: p.wattage, formFactor: p.form_factor };
    case "case":
      return {
        category,
        formFactor: p.form_factor,
        maxGpuMm: p.max_gpu_mm,
        maxCoolerMm: p.max_cooler_mm,
      };
    case "cooler":
      return { category, socket: p.socket, tdp: p.tdp, heightMm: p.height_mm };
    case "unknown":
      return {
        category,
        socket: p.socket,
        memoryType: p.memory_type,
        formFactor: p.form_factor,
        tdp: p.tdp,
      };
  }
}

/**
 * Folds caller-supplied socket and memory type to the spelling the extractor
 * produces for catalog parts. Unrecognized values are kept, uppercased.
 */
export function normalizePersistedSpec(p: PersistedSpec): PersistedSpec {
  const out: PersistedSpec = { ...p };
  if (p.socket !== undefined) {
    const text = p.socket.trim().toUpperCase();
    out.socket = extractSocket(text) ?? text;
  }
  if (p.memory_type !== undefined) {
    const text = p.memory_type.trim().toUpperCase();
    out.memory_type = extractMemoryType(text) ?? text;
  }
  return out;
}

/** Values in `override` win; unset override keys keep the base value. */
export function mergeSpec(base: ComponentSpec, override: PersistedSpec): ComponentSpec {
  const cleaned = specToPersisted(specFromPersisted(base.category, override));
  return specFromPersisted(base.category, { ...specToPersisted(base), ...cleaned });
}
