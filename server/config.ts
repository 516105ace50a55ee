import path from "path";

/**
 * Engine tunables. Built once at the process entrypoint and passed down
 * through the engine context; nothing below the entrypoint reads
 * process.env.
 */
export type EngineConfig = Readonly<{
  port: number;
  graphDataDir: string;
  catalogPath: string;
  referenceDataDir: string;
  /** Cap on outgoing COMPATIBLE_WITH / SYNERGY_WITH edges per source and rule. */
  maxEdgesPerNode: number;
  psu: PsuRuleConfig;
  /** Cooler clearance assumed for a case that lists a single dimension. */
  defaultCaseCoolerMm: number;
  minSessionBudget: number;
  defaultTopK: number;
  synergyBoost: number;
  fuzzyNameMatch: boolean;
  retrievalTimeoutMs: number;
}>;

export type PsuRuleConfig = Readonly<{
  /** Assumed when a GPU's TDP is unknown. */
  defaultGpuTdp: number;
  marginW: number;
  highTdpThreshold: number;
  highTdpMarginW: number;
}>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  port: 5000,
  graphDataDir: path.resolve("data", "graph"),
  catalogPath: path.resolve("data", "catalog", "parts.json"),
  referenceDataDir: path.resolve("data", "reference"),
  maxEdgesPerNode: 20,
  psu: {
    defaultGpuTdp: 250,
    marginW: 300,
    highTdpThreshold: 400,
    highTdpMarginW: 400,
  },
  defaultCaseCoolerMm: 160,
  minSessionBudget: 300_000,
  defaultTopK: 5,
  synergyBoost: 0.1,
  fuzzyNameMatch: true,
  retrievalTimeoutMs: 3_000,
};

function positiveInt(val: string | undefined, fallback: number): number {
  if (val) {
    const parsed = parseInt(val, 10);
    if (!isNaN(parsed) && parsed > 0) return parsed;
  }
  return fallback;
}

function fraction(val: string | undefined, fallback: number): number {
  if (val) {
    const parsed = parseFloat(val);
    if (!isNaN(parsed) && parsed >= 0 && parsed <= 1) return parsed;
  }
  return fallback;
}

function flag(val: string | undefined, fallback: boolean): boolean {
  if (val === undefined || val === "") return fallback;
  return !["0", "false", "no", "off"].includes(val.toLowerCase());
}

export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const d = DEFAULT_ENGINE_CONFIG;
  return {
    port: positiveInt(env.PORT, d.port),
    graphDataDir: env.GRAPH_DATA_DIR ? path.resolve(env.GRAPH_DATA_DIR) : d.graphDataDir,
    catalogPath: env.CATALOG_PATH ? path.resolve(env.CATALOG_PATH) : d.catalogPath,
    referenceDataDir: env.REFERENCE_DATA_DIR ? path.resolve(env.REFERENCE_DATA_DIR) : d.referenceDataDir,
    maxEdgesPerNode: positiveInt(env.MAX_EDGES_PER_NODE, d.maxEdgesPerNode),
    psu: {
      defaultGpuTdp: positiveInt(env.PSU_DEFAULT_GPU_TDP, d.psu.defaultGpuTdp),
      marginW: positiveInt(env.PSU_MARGIN_W, d.psu.marginW),
      highTdpThreshold: positiveInt(env.PSU_HIGH_TDP_THRESHOLD, d.psu.highTdpThreshold),
      highTdpMarginW: positiveInt(env.PSU_HIGH_TDP_MARGIN_W, d.psu.highTdpMarginW),
    },
    defaultCaseCoolerMm: positiveInt(env.DEFAULT_CASE_COOLER_MM, d.defaultCaseCoolerMm),
    minSessionBudget: positiveInt(env.MIN_SESSION_BUDGET, d.minSessionBudget),
    defaultTopK: positiveInt(env.DEFAULT_TOP_K, d.defaultTopK),
    synergyBoost: fraction(env.SYNERGY_BOOST, d.synergyBoost),
    fuzzyNameMatch: flag(env.NAME_MATCH_FUZZY, d.fuzzyNameMatch),
    retrievalTimeoutMs: positiveInt(env.RETRIEVAL_TIMEOUT_MS, d.retrievalTimeoutMs),
  };
}

/**
 * Minimum PSU wattage for a GPU drawing `gpuTdp` watts. High-draw cards get
 * the larger margin.
 */
export function requiredPsuWattage(gpuTdp: number | undefined, psu: PsuRuleConfig): number {
  const tdp = gpuTdp ?? psu.defaultGpuTdp;
  return tdp + (tdp >= psu.highTdpThreshold ? psu.highTdpMarginW : psu.marginW);
}
