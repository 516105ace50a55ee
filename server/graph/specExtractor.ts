import type { ComponentCategory, ComponentSpec, FormFactor, SpecKey } from "../../platform/catalog/graph";

/**
 * Spec extraction over uppercased raw part text.
 *
 * Each pattern is an independent extractor returning undefined on a miss.
 * Precedence when a text carries several candidates:
 * - socket, memory type, power: first match in reading order
 * - form factor: first match in reading order; at one position the longer
 *   spelling wins (E-ATX before ATX, MINI-ITX before ITX)
 * - dimensions: every `NNNMM` token, interpreted per category
 */

export type SpecExtraction = Readonly<{
  spec: ComponentSpec;
  /** Keys the category expects that the text did not carry. */
  gaps: readonly SpecKey[];
}>;

export type ExtractOptions = Readonly<{
  defaultCaseCoolerMm: number;
}>;

const SOCKET_PATTERN = /(LGA\d+|AM\d|TR\d|WRX\d)/;
const MEMORY_TYPE_PATTERN = /(DDR\d)/;
const FORM_FACTOR_PATTERN = /(E-ATX|EATX|M-ATX|MATX|MINI-ITX|ITX|ATX)/;
const POWER_PATTERN = /(\d+)W(?![A-Z])/;
const DIMENSION_PATTERN = /(\d+)MM/g;

const FORM_FACTOR_ALIASES: Record<string, FormFactor> = {
  "E-ATX": "E-ATX",
  EATX: "E-ATX",
  "M-ATX": "MATX",
  MATX: "MATX",
  "MINI-ITX": "ITX",
  ITX: "ITX",
  ATX: "ATX",
};

const EXPECTED_KEYS: Record<ComponentCategory, readonly SpecKey[]> = {
  cpu: ["socket", "tdp"],
  motherboard: ["socket", "memory_type", "form_factor"],
  memory: ["memory_type"],
  gpu: ["tdp", "length_mm"],
  storage: [],
  psu: ["wattage"],
  case: ["form_factor", "max_gpu_mm"],
  cooler: ["height_mm"],
  unknown: [],
};

export function extractSocket(raw: string): string | undefined {
  return SOCKET_PATTERN.exec(raw)?.[1];
}

export function extractMemoryType(raw: string): string | undefined {
  return MEMORY_TYPE_PATTERN.exec(raw)?.[1];
}

export function extractFormFactor(raw: string): FormFactor | undefined {
  const match = FORM_FACTOR_PATTERN.exec(raw)?.[1];
  return match ? FORM_FACTOR_ALIASES[match] : undefined;
}

/** Wattage for a PSU, TDP for everything else. */
export function extractPower(raw: string): number | undefined {
  const match = POWER_PATTERN.exec(raw);
  return match ? parseInt(match[1], 10) : undefined;
}

export function extractDimensions(raw: string): number[] {
  return Array.from(raw.matchAll(DIMENSION_PATTERN), (m) => parseInt(m[1], 10));
}

// Reduce instead of spreading: a record may carry any number of MM tokens.
function largest(values: readonly number[]): number | undefined {
  return values.length > 0 ? values.reduce((a, b) => (b > a ? b : a)) : undefined;
}

function smallest(values: readonly number[]): number | undefined {
  return values.length > 0 ? values.reduce((a, b) => (b < a ? b : a)) : undefined;
}

export function extractSpec(
  category: ComponentCategory,
  raw: string,
  opts: ExtractOptions,
): SpecExtraction {
  const text = raw.toUpperCase();
  const spec = buildSpec(category, text, opts);
  const present = specEntries(spec).map(([key]) => key);
  const gaps = EXPECTED_KEYS[category].filter((key) => !present.includes(key));
  return { spec, gaps };
}

function buildSpec(category: ComponentCategory, text: string, opts: ExtractOptions): ComponentSpec {
  switch (category) {
    case "cpu":
      return {
        category,
        socket: extractSocket(text),
        memoryType: extractMemoryType(text),
        tdp: extractPower(text),
      };
    case "motherboard":
      return {
        category,
        socket: extractSocket(text),
        memoryType: extractMemoryType(text),
        formFactor: extractFormFactor(text),
      };
    case "memory":
      return { category, memoryType: extractMemoryType(text) };
    case "gpu": {
      const dims = extractDimensions(text);
      return {
        category,
        tdp: extractPower(text),
        lengthMm: largest(dims),
      };
    }
    case "storage":
      return { category };
    case "psu":
      return {
        category,
        wattage: extractPower(text),
        formFactor: extractFormFactor(text),
      };
    case "case": {
      const dims = extractDimensions(text);
      if (dims.length === 0) {
        return { category, formFactor: extractFormFactor(text) };
      }
      return {
        category,
        formFactor: extractFormFactor(text),
        maxGpuMm: largest(dims),
        maxCoolerMm: dims.length >= 2 ? smallest(dims) : opts.defaultCaseCoolerMm,
      };
    }
    case "cooler": {
      const dims = extractDimensions(text);
      return {
        category,
        socket: extractSocket(text),
        tdp: extractPower(text),
        heightMm: smallest(dims),
      };
    }
    case "unknown":
      return {
        category,
        socket: extractSocket(text),
        memoryType: extractMemoryType(text),
        formFactor: extractFormFactor(text),
        tdp: extractPower(text),
      };
  }
}

/**
 * Flattens a tagged spec into its known (key, value) pairs, skipping
 * unknown values.
 */
export function specEntries(spec: ComponentSpec): Array<[SpecKey, string | number]> {
  const entries: Array<[SpecKey, string | number | undefined]> = [];
  switch (spec.category) {
    case "cpu":
      entries.push(["socket", spec.socket], ["memory_type", spec.memoryType], ["tdp", spec.tdp]);
      break;
    case "motherboard":
      entries.push(["socket", spec.socket], ["memory_type", spec.memoryType], ["form_factor", spec.formFactor]);
      break;
    case "memory":
      entries.push(["memory_type", spec.memoryType]);
      break;
    case "gpu":
      entries.push(["tdp", spec.tdp], ["length_mm", spec.lengthMm]);
      break;
    case "storage":
      break;
    case "psu":
      entries.push(["wattage", spec.wattage], ["form_factor", spec.formFactor]);
      break;
    case "case":
      entries.push(["form_factor", spec.formFactor], ["max_gpu_mm", spec.maxGpuMm], ["max_cooler_mm", spec.maxCoolerMm]);
      break;
    case "cooler":
      entries.push(["socket", spec.socket], ["tdp", spec.tdp], ["height_mm", spec.heightMm]);
      break;
    case "unknown":
      entries.push(["socket", spec.socket], ["memory_type", spec.memoryType], ["form_factor", spec.formFactor], ["tdp", spec.tdp]);
      break;
  }
  return entries.filter((e): e is [SpecKey, string | number] => e[1] !== undefined);
}
